import type { TextClassifier } from '../tasks/TextClassifier';
import type { LabeledExample } from '../utils/IO';

export interface AccuracyResult {
    total: number;
    correct: number;
    accuracy: number;
    perClass: Record<string, { total: number; correct: number }>;
}

export function evaluateAccuracy(
    classifier: TextClassifier,
    examples: LabeledExample[]
): AccuracyResult {
    const perClass = new Map<string, { total: number; correct: number }>();
    let correct = 0;

    for (const { text, label } of examples) {
        const bucket = perClass.get(label) ?? { total: 0, correct: 0 };
        bucket.total++;

        if (classifier.classify(text) === label) {
            bucket.correct++;
            correct++;
        }
        perClass.set(label, bucket);
    }

    const total = examples.length;
    return {
        total,
        correct,
        accuracy: total === 0 ? 0 : correct / total,
        perClass: Object.fromEntries(perClass),
    };
}

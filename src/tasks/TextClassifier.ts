// TextClassifier.ts - n-gram Naive Bayes text classification task

import { NaiveBayes } from '../core/NaiveBayes';
import type { NaiveBayesConfig } from '../core/NaiveBayesConfig';
import { IO, type LabeledExample, type DataFormat } from '../utils/IO';

export interface PredictResult {
    label: string;
    score: number;
}

export class TextClassifier {
    private model: NaiveBayes;

    constructor(config: NaiveBayesConfig = {}) {
        this.model = new NaiveBayes({
            ...config,
            log: {
                modelName: config.log?.modelName ?? 'TextClassifier',
                verbose: config.log?.verbose,
            },
        });
    }

    get naiveBayes(): NaiveBayes {
        return this.model;
    }

    loadTrainingData(raw: string, format: DataFormat = 'json'): LabeledExample[] {
        return IO.load(raw, format);
    }

    train(data: LabeledExample[]): void {
        this.model.trainBatch(data);
    }

    /** Ranks every trained label by its raw score, highest first. */
    predict(text: string, topK = 1): PredictResult[] {
        return Object.entries(this.model.classify(text))
            .map(([label, score]) => ({ label, score }))
            .sort((a, b) => b.score - a.score)
            .slice(0, topK);
    }

    predictBatch(texts: string[], topK = 1): PredictResult[][] {
        return texts.map(text => this.predict(text, topK));
    }

    /** Best label for `text`, or null when nothing has been trained. */
    classify(text: string): string | null {
        const [best] = this.predict(text, 1);
        return best ? best.label : null;
    }
}

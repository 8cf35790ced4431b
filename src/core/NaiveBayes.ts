// NaiveBayes.ts - n-gram Naive Bayes model with add-one smoothing

import { ClassModel } from './ClassModel';
import { EmptyModelError, UnknownClassError } from './Errors';
import { type NaiveBayesConfig, defaultConfig } from './NaiveBayesConfig';
import { Tokenizer } from '../preprocessing/Tokenizer';

export interface ClassSnapshot {
    readonly documentCount: number;
    readonly wordSequence: readonly string[];
    readonly wordFrequency: ReadonlyMap<string, number>;
}

export interface ModelStats {
    totalDocuments: number;
    vocabularySize: number;
    classes: Record<string, { documentCount: number; gramCount: number; distinctGrams: number }>;
}

export class NaiveBayes {
    public readonly nSplit: number;
    public verbose: boolean;
    public modelName: string;

    private tokenizer: Tokenizer;
    private totalDocuments = 0;
    private classes = new Map<string, ClassModel>();
    // Occurrences per distinct gram across every class; only the key count feeds scoring.
    private vocabulary = new Map<string, number>();

    constructor(config: NaiveBayesConfig | number = {}) {
        const options: NaiveBayesConfig = typeof config === 'number' ? { nSplit: config } : config;
        const nSplit = options.nSplit ?? defaultConfig.nSplit;

        this.tokenizer = new Tokenizer(nSplit);
        this.nSplit = nSplit;
        this.verbose = options.log?.verbose ?? true;
        this.modelName = options.log?.modelName ?? 'NaiveBayes';

        if (this.verbose) console.log(`✨ ${this.modelName} initialized with n=${this.nSplit}`);
    }

    train(label: string, sentence: string): void {
        this.totalDocuments++;

        let model = this.classes.get(label);
        if (!model) {
            model = new ClassModel();
            this.classes.set(label, model);
        }
        model.recordDocument();

        for (const gram of this.tokenizer.tokenize(sentence)) {
            this.vocabulary.set(gram, (this.vocabulary.get(gram) ?? 0) + 1);
            model.addGram(gram);
        }
    }

    trainBatch(examples: { text: string; label: string }[]): void {
        examples.forEach(({ text, label }) => this.train(label, text));
        if (this.verbose) {
            console.log(`✅ ${this.modelName} trained on ${examples.length} documents (${this.classes.size} classes, ${this.vocabulary.size} grams).`);
        }
    }

    getPrior(label: string): number {
        if (this.totalDocuments === 0) throw new EmptyModelError();
        const model = this.classes.get(label);
        if (!model) throw new UnknownClassError(label);
        return model.documentCount / this.totalDocuments;
    }

    /**
     * Scores a sentence against every trained class.
     *
     * Each score is P(class) multiplied by the smoothed P(gram|class) of every
     * distinct gram in the sentence:
     *
     *   P(gram|class) = (count(gram in class) + 1) / (grams in class + vocabulary size)
     *
     * Scores are not normalized; compare them, do not read them as probabilities.
     * Returns an empty record when nothing has been trained.
     */
    classify(sentence: string): Record<string, number> {
        if (this.classes.size === 0) {
            if (this.verbose) console.warn(`⚠️ ${this.modelName} has no trained classes to score against.`);
            return {};
        }

        const vocabularySize = this.vocabulary.size;
        const grams = new Set(this.tokenizer.tokenize(sentence));
        const scores: [string, number][] = [];

        for (const [label, model] of this.classes) {
            const denominator = model.size + vocabularySize;
            let score = this.getPrior(label);
            for (const gram of grams) {
                score *= (model.frequencyOf(gram) + 1) / denominator;
            }
            scores.push([label, score]);
        }

        return Object.fromEntries(scores);
    }

    /** Copy of a class's counts; later training does not show through it. */
    getClass(label: string): ClassSnapshot | undefined {
        const model = this.classes.get(label);
        if (!model) return undefined;
        return {
            documentCount: model.documentCount,
            wordSequence: [...model.wordSequence],
            wordFrequency: new Map(model.wordFrequency),
        };
    }

    get labels(): string[] {
        return [...this.classes.keys()];
    }

    get documentCount(): number {
        return this.totalDocuments;
    }

    get vocabularySize(): number {
        return this.vocabulary.size;
    }

    getStats(): ModelStats {
        return {
            totalDocuments: this.totalDocuments,
            vocabularySize: this.vocabulary.size,
            classes: Object.fromEntries(
                [...this.classes].map(([label, model]) => [label, {
                    documentCount: model.documentCount,
                    gramCount: model.size,
                    distinctGrams: model.wordFrequency.size,
                }])
            ),
        };
    }
}

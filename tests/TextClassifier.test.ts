import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TextClassifier } from '../src/tasks/TextClassifier';
import { BigramPreset } from '../src/config/Presets';
import { sentimentCorpus } from './fixtures';

describe('TextClassifier', () => {
    let classifier: TextClassifier;

    beforeEach(() => {
        classifier = new TextClassifier({ nSplit: 1, log: { verbose: false } });
    });

    it('names the underlying model after the task', () => {
        expect(classifier.naiveBayes.modelName).toBe('TextClassifier');
        expect(classifier.naiveBayes.verbose).toBe(false);
    });

    it('loads training data from JSON', () => {
        const raw = '[{"text":"eu te amo","label":"bom"}]';
        expect(classifier.loadTrainingData(raw)).toEqual([{ text: 'eu te amo', label: 'bom' }]);
    });

    it('loads training data from CSV and TSV', () => {
        expect(classifier.loadTrainingData('text,label\neu te amo,bom', 'csv'))
            .toEqual([{ text: 'eu te amo', label: 'bom' }]);
        expect(classifier.loadTrainingData('text\tlabel\neu te odeio\truim', 'tsv'))
            .toEqual([{ text: 'eu te odeio', label: 'ruim' }]);
    });

    it('returns no training data for malformed CSV', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        expect(classifier.loadTrainingData('text,label\n"oi,bom', 'csv')).toEqual([]);
        error.mockRestore();
    });

    it('ranks labels by score, highest first', () => {
        classifier.train(sentimentCorpus);
        const ranked = classifier.predict('nao achei o filme ruim', 2);
        expect(ranked.map(r => r.label)).toEqual(['ruim', 'bom']);
        expect(ranked[0].score).toBeGreaterThan(ranked[1].score);
        expect(ranked[0].score).toBeCloseTo(0.5 * (1 / 50) ** 4 * (3 / 50), 15);
    });

    it('returns only the best label by default', () => {
        classifier.train(sentimentCorpus);
        const ranked = classifier.predict('eu amo bolo');
        expect(ranked).toHaveLength(1);
        expect(ranked[0].label).toBe('bom');
    });

    it('predicts in batch', () => {
        classifier.train(sentimentCorpus);
        const results = classifier.predictBatch(['eu amo bolo', 'nao achei o filme ruim']);
        expect(results.map(r => r[0].label)).toEqual(['bom', 'ruim']);
    });

    it('classifies to the best label', () => {
        classifier.train(sentimentCorpus);
        expect(classifier.classify('eu te odeio')).toBe('ruim');
    });

    it('returns null or nothing before training', () => {
        expect(classifier.predict('eu amo bolo')).toEqual([]);
        expect(classifier.classify('eu amo bolo')).toBeNull();
    });

    it('logs a training summary when verbose', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const verbose = new TextClassifier(BigramPreset);
        verbose.train([{ text: 'eu te amo', label: 'bom' }]);
        expect(log).toHaveBeenLastCalledWith('✅ Bigram NaiveBayes trained on 1 documents (1 classes, 2 grams).');
        log.mockRestore();
    });
});

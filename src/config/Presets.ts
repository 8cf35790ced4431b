// Presets.ts - Reusable configuration presets for NaiveBayes

import type { NaiveBayesConfig } from '../core/NaiveBayesConfig';

export const UnigramPreset: NaiveBayesConfig = {
    nSplit: 1,
    log: {
        modelName: 'Unigram NaiveBayes',
    }
};

export const BigramPreset: NaiveBayesConfig = {
    nSplit: 2,
    log: {
        modelName: 'Bigram NaiveBayes',
    }
};

export const TrigramPreset: NaiveBayesConfig = {
    nSplit: 3,
    log: {
        modelName: 'Trigram NaiveBayes',
    }
};

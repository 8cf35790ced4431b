// NaiveBayesConfig.ts - Configuration interface and defaults for the n-gram model

export interface NaiveBayesConfig {
    // n-gram window size
    nSplit?: number;

    // Logging
    log?: {
        modelName?: string,
        verbose?: boolean,
    }
}

export const defaultConfig: Required<Pick<NaiveBayesConfig, 'nSplit'>> = {
    nSplit: 1,
};

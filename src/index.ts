export { splitWords, Tokenizer } from './preprocessing/Tokenizer';
export { ClassModel } from './core/ClassModel';
export { NaiveBayes } from './core/NaiveBayes';
export type { ClassSnapshot, ModelStats } from './core/NaiveBayes';
export { defaultConfig } from './core/NaiveBayesConfig';
export type { NaiveBayesConfig } from './core/NaiveBayesConfig';
export {
    NaiveBayesError,
    EmptyModelError,
    UnknownClassError,
    InvalidConfigError,
} from './core/Errors';
export { evaluateAccuracy } from './core/Evaluation';
export type { AccuracyResult } from './core/Evaluation';
export { TextClassifier } from './tasks/TextClassifier';
export type { PredictResult } from './tasks/TextClassifier';
export { IO } from './utils/IO';
export type { LabeledExample, DataFormat } from './utils/IO';
export { UnigramPreset, BigramPreset, TrigramPreset } from './config/Presets';

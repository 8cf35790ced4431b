// Errors.ts - Typed failures raised by the Naive Bayes model

export class NaiveBayesError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class EmptyModelError extends NaiveBayesError {
    constructor() {
        super('Model has no training documents yet.');
    }
}

export class UnknownClassError extends NaiveBayesError {
    constructor(public readonly label: string) {
        super(`Unknown class "${label}": it has never been trained.`);
    }
}

export class InvalidConfigError extends NaiveBayesError {
    constructor(public readonly value: unknown) {
        super(`n-gram size must be a positive integer, got ${String(value)}.`);
    }
}

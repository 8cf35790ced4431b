import { InvalidConfigError } from '../core/Errors';

/**
 * Splits a sentence on single spaces and returns its n-grams of `size` tokens.
 *
 * splitWords(1, "this outputs words") -> ["this", "outputs", "words"]
 * splitWords(2, "this outputs words") -> ["this outputs", "outputs words"]
 *
 * A sentence with no more than `size` tokens is returned whole, as a single gram.
 * Runs of spaces are kept as empty tokens.
 */
export function splitWords(size: number, sentence: string): string[] {
    const words = sentence.split(' ');

    if (words.length <= size) {
        return [words.join(' ')];
    }

    const grams: string[] = [];
    for (let i = 0; i + size <= words.length; i++) {
        grams.push(words.slice(i, i + size).join(' '));
    }
    return grams;
}

export class Tokenizer {
    constructor(size = 1) {
        if (!Number.isInteger(size) || size < 1) {
            throw new InvalidConfigError(size);
        }
        this.size = size;
    }

    tokenize(sentence: string): string[] {
        return splitWords(this.size, sentence);
    }

    get windowSize(): number {
        return this.size;
    }

    private size: number;
}

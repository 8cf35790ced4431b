// ClassModel.ts - Per-class n-gram counts accumulated during training

export class ClassModel {
    public documentCount = 0;
    public readonly wordSequence: string[] = [];
    public readonly wordFrequency = new Map<string, number>();

    recordDocument(): void {
        this.documentCount++;
    }

    addGram(gram: string): void {
        this.wordSequence.push(gram);
        this.wordFrequency.set(gram, this.frequencyOf(gram) + 1);
    }

    frequencyOf(gram: string): number {
        return this.wordFrequency.get(gram) ?? 0;
    }

    /** Total n-gram occurrences, duplicates included. */
    get size(): number {
        return this.wordSequence.length;
    }
}

// IO.ts - Import/export utilities for labeled training data

import { parse } from 'csv-parse/sync';

export interface LabeledExample {
    text: string;
    label: string;
}

export type DataFormat = 'json' | 'csv' | 'tsv';

function isLabeledExample(item: unknown): item is LabeledExample {
    return typeof item === 'object' && item !== null
        && 'text' in item && typeof item.text === 'string'
        && 'label' in item && typeof item.label === 'string';
}

function isRow(row: unknown): row is string[] {
    return Array.isArray(row) && row.every(cell => typeof cell === 'string');
}

function quote(field: string, delimiter: string): string {
    if (field.includes(delimiter) || field.includes('"') || /[\r\n]/.test(field)) {
        return `"${field.replace(/"/g, '""')}"`;
    }
    return field;
}

export class IO {
    static importJSON(json: string): LabeledExample[] {
        try {
            const data: unknown = JSON.parse(json);
            if (!Array.isArray(data)) throw new Error('Invalid format');
            return data
                .filter(isLabeledExample)
                .map(({ text, label }) => ({ text, label }));
        } catch (err) {
            console.error('Failed to parse training data JSON:', err);
            return [];
        }
    }

    static exportJSON(pairs: LabeledExample[]): string {
        return JSON.stringify(pairs, null, 2);
    }

    /**
     * Reads `text`/`label` rows. With a header, columns are located by name
     * (case-insensitive) and fall back to the first two; without one the first
     * column is the text and the second the label. Rows lacking either are dropped.
     */
    static importDelimited(input: string, delimiter: ',' | '\t' = ',', hasHeader = true): LabeledExample[] {
        let rows: unknown;
        try {
            rows = parse(input, {
                delimiter,
                skip_empty_lines: true,
                relax_column_count: true,
                relax_quotes: true,
            });
        } catch (err) {
            console.error('Failed to parse delimited training data:', err);
            return [];
        }
        if (!Array.isArray(rows)) return [];

        const table = rows.filter(isRow);
        if (table.length === 0) return [];

        let textIdx = 0;
        let labelIdx = 1;
        if (hasHeader) {
            const headers = table[0].map(h => h.trim().toLowerCase());
            if (headers.includes('text')) textIdx = headers.indexOf('text');
            if (headers.includes('label')) labelIdx = headers.indexOf('label');
        }

        const examples: LabeledExample[] = [];
        for (const row of hasHeader ? table.slice(1) : table) {
            const text = row[textIdx]?.trim();
            const label = row[labelIdx]?.trim();
            if (text && label) {
                examples.push({ text, label });
            }
        }
        return examples;
    }

    static exportDelimited(pairs: LabeledExample[], delimiter: ',' | '\t' = ',', includeHeader = true): string {
        const header = includeHeader ? `text${delimiter}label\n` : '';
        const rows = pairs.map(p => `${quote(p.text, delimiter)}${delimiter}${quote(p.label, delimiter)}`);
        return header + rows.join('\n');
    }

    static importCSV(csv: string, hasHeader = true): LabeledExample[] {
        return this.importDelimited(csv, ',', hasHeader);
    }

    static exportCSV(pairs: LabeledExample[], includeHeader = true): string {
        return this.exportDelimited(pairs, ',', includeHeader);
    }

    static importTSV(tsv: string, hasHeader = true): LabeledExample[] {
        return this.importDelimited(tsv, '\t', hasHeader);
    }

    static exportTSV(pairs: LabeledExample[], includeHeader = true): string {
        return this.exportDelimited(pairs, '\t', includeHeader);
    }

    static load(raw: string, format: DataFormat = 'json'): LabeledExample[] {
        switch (format) {
            case 'csv':
                return IO.importCSV(raw);
            case 'tsv':
                return IO.importTSV(raw);
            case 'json':
            default:
                return IO.importJSON(raw);
        }
    }
}

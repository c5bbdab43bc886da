import { readFileSync } from 'node:fs';
import type { AgeReporter, ExtractSource, RawRatingRow } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { fileAge } from './file-age.js';

/**
 * Split one CSV record. Fields may be double-quoted; "" escapes a quote.
 */
export function parseCsvLine(line: string): string[] {
    const fields: string[] = [];
    let field = '';
    let quoted = false;

    for (let i = 0; i < line.length; i++) {
        const ch = line.charAt(i);
        if (quoted) {
            if (ch === '"' && line.charAt(i + 1) === '"') {
                field += '"';
                i++;
            } else if (ch === '"') {
                quoted = false;
            } else {
                field += ch;
            }
        } else if (ch === '"') {
            quoted = true;
        } else if (ch === ',') {
            fields.push(field);
            field = '';
        } else {
            field += ch;
        }
    }

    fields.push(field);
    return fields;
}

/**
 * Parse a ratings CSV with a `distribution,rating,review_count` header.
 * Records without a distribution or a numeric rating are skipped; an empty
 * rating is missing, not zero.
 */
export function parseRatingsCsv(content: string): RawRatingRow[] {
    const lines = content.split(/\r?\n/).filter((line) => line.trim() !== '');
    const header = lines.shift();
    if (header === undefined) return [];

    const columns = parseCsvLine(header).map((name) => name.trim().toLowerCase());
    const distIdx = columns.indexOf('distribution');
    const ratingIdx = columns.indexOf('rating');
    const countIdx = columns.indexOf('review_count');
    if (distIdx < 0 || ratingIdx < 0) {
        throw new Error(`Ratings CSV header lacks distribution/rating columns: ${header}`);
    }

    const rows: RawRatingRow[] = [];
    let skipped = 0;
    for (const line of lines) {
        const fields = parseCsvLine(line);
        const distribution = fields[distIdx]?.trim() ?? '';
        const ratingField = fields[ratingIdx]?.trim() ?? '';
        const rating = Number(ratingField);
        const reviewCount = countIdx < 0 ? 0 : Number(fields[countIdx] ?? 0);

        if (distribution === '' || ratingField === '' || !Number.isFinite(rating)) {
            skipped++;
            continue;
        }
        rows.push({
            distribution,
            rating,
            reviewCount: Number.isInteger(reviewCount) ? reviewCount : 0,
        });
    }

    if (skipped > 0) {
        getLogger().debug({ skipped }, 'Skipped malformed rating records');
    }
    return rows;
}

/**
 * Community ratings read from a CSV export.
 */
export class CsvRatingsSource implements ExtractSource<RawRatingRow> {
    readonly name = 'ratings';
    readonly age: AgeReporter;

    constructor(private readonly csvPath: string) {
        this.age = fileAge(csvPath);
    }

    read(): Iterable<RawRatingRow> {
        return parseRatingsCsv(readFileSync(this.csvPath, 'utf-8'));
    }
}

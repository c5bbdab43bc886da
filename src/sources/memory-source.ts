import { UNKNOWN_AGE, type AgeReporter, type ExtractSource } from '../types/index.js';

/**
 * Array-backed extract, for programmatic callers that already hold the rows.
 */
export class MemoryExtractSource<Row> implements ExtractSource<Row> {
    constructor(
        readonly name: string,
        private readonly rows: readonly Row[],
        readonly age: AgeReporter = UNKNOWN_AGE
    ) {}

    read(): Iterable<Row> {
        return this.rows;
    }
}

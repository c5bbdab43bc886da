/**
 * A statement against the index store failed.
 */
export class StoreError extends Error {
    constructor(
        message: string,
        public readonly statement?: string,
        public readonly table?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'StoreError';
    }
}

/**
 * A required raw extract is absent or unreadable.
 */
export class MissingExtractError extends Error {
    constructor(
        public readonly source: string,
        detail?: string,
        options?: { cause?: unknown }
    ) {
        super(`Required extract '${source}' is unavailable${detail ? `: ${detail}` : ''}`, options);
        this.name = 'MissingExtractError';
    }
}

/**
 * Configuration is incomplete or invalid.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * A pipeline stage failed; wraps the underlying error with the stage name.
 */
export class PipelineError extends Error {
    constructor(
        public readonly stage: string,
        cause: unknown
    ) {
        super(`Stage '${stage}' failed: ${describeError(cause)}`, { cause });
        this.name = 'PipelineError';
    }

    /** Failing statement, when the cause is a store error */
    get statement(): string | undefined {
        return this.cause instanceof StoreError ? this.cause.statement : undefined;
    }

    /** Failing table, when the cause is a store error */
    get table(): string | undefined {
        return this.cause instanceof StoreError ? this.cause.table : undefined;
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

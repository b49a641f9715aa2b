/**
 * Error taxonomy
 *
 * Each class maps to one recovery policy:
 *   - InitializationError  fatal for the component (never half-initialized)
 *   - ConnectivityError    the operation that needed the connection becomes a no-op
 *   - QueryCapabilityError fall back to a reduced result, surface a warning
 *   - BatchWriteError      the file batch is reported failed, earlier batches stay
 *
 * Unreadable or unparsable files are not thrown; the scanner returns them
 * as ExtractionFailure entries.
 */

export type ErrorCode =
    | 'INITIALIZATION'
    | 'CONNECTIVITY'
    | 'QUERY_CAPABILITY'
    | 'BATCH_WRITE';

export class GraphRagError extends Error {
    constructor(
        readonly code: ErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class InitializationError extends GraphRagError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('INITIALIZATION', message, options);
    }
}

export class ConnectivityError extends GraphRagError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('CONNECTIVITY', message, options);
    }
}

export class QueryCapabilityError extends GraphRagError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('QUERY_CAPABILITY', message, options);
    }
}

export class BatchWriteError extends GraphRagError {
    constructor(readonly batchId: string, message: string, options?: { cause?: unknown }) {
        super('BATCH_WRITE', message, options);
    }
}

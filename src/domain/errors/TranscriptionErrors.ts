export type TranscriptionErrorKind = 'transport' | 'parse';

/**
 * Base class for failures delivered through a TranscriptionOutcome.
 */
export class TranscriptionError extends Error {
    constructor(
        public readonly kind: TranscriptionErrorKind,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'TranscriptionError';
    }
}

/**
 * The request never produced a response (refused, reset, DNS, timeout).
 */
export class TranscriptionTransportError extends TranscriptionError {
    /** Underlying error code, e.g. ECONNREFUSED or ETIMEDOUT */
    public readonly code?: string;

    constructor(message: string, options?: { cause?: unknown; code?: string }) {
        super('transport', message, { cause: options?.cause });
        this.name = 'TranscriptionTransportError';
        this.code = options?.code;
    }
}

/**
 * A response arrived but its body was absent, malformed or incomplete.
 * Server-side failures (non-2xx with a detail body) land here too.
 */
export class TranscriptionParseError extends TranscriptionError {
    public readonly statusCode?: number;
    public readonly serviceDetail?: string;

    constructor(
        message: string,
        options?: { cause?: unknown; statusCode?: number; serviceDetail?: string }
    ) {
        super('parse', message, { cause: options?.cause });
        this.name = 'TranscriptionParseError';
        this.statusCode = options?.statusCode;
        this.serviceDetail = options?.serviceDetail;
    }
}

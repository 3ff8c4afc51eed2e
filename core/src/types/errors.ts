// core/src/types/errors.ts
// Error taxonomy and result type shared by the codec, transport and crypto layers

/**
 * Broad error classes. Every MdocError carries exactly one of these.
 */
export enum ErrorKind {
    /** Framing violations on the wire: bad chunk marker, missing characteristic, malformed CBOR */
    PROTOCOL = 'protocol',

    /** Radio or platform failures: failed write, failed read, lost link */
    PLATFORM = 'platform',

    /** AEAD tag mismatch, invalid key material, malformed signature structure */
    CRYPTO = 'crypto',

    /** Programming-contract violations, raised immediately */
    PRECONDITION = 'precondition'
}

/**
 * Error codes
 */
export enum MdocErrorCode {
    // Framing errors
    INVALID_CHUNK = 'INVALID_CHUNK',
    INVALID_CHUNK_MARKER = 'INVALID_CHUNK_MARKER',
    INVALID_FORMAT = 'INVALID_FORMAT',
    SERVICE_NOT_FOUND = 'SERVICE_NOT_FOUND',
    CHARACTERISTIC_NOT_FOUND = 'CHARACTERISTIC_NOT_FOUND',
    UNEXPECTED_EVENT = 'UNEXPECTED_EVENT',
    INVALID_STATE_VALUE = 'INVALID_STATE_VALUE',
    INVALID_PSM = 'INVALID_PSM',

    // Platform errors
    CONNECTION_FAILED = 'CONNECTION_FAILED',
    CONNECTION_LOST = 'CONNECTION_LOST',
    WRITE_FAILED = 'WRITE_FAILED',
    READ_FAILED = 'READ_FAILED',
    NOTIFICATION_SETUP_FAILED = 'NOTIFICATION_SETUP_FAILED',
    SOCKET_FAILED = 'SOCKET_FAILED',
    MTU_NEGOTIATION_FAILED = 'MTU_NEGOTIATION_FAILED',
    SCAN_FAILED = 'SCAN_FAILED',
    ADVERTISING_FAILED = 'ADVERTISING_FAILED',

    // Cryptographic errors
    INVALID_KEY = 'INVALID_KEY',
    KEY_AGREEMENT_FAILED = 'KEY_AGREEMENT_FAILED',
    DECRYPTION_FAILED = 'DECRYPTION_FAILED',
    INVALID_SIGNATURE = 'INVALID_SIGNATURE',
    UNSUPPORTED_ALGORITHM = 'UNSUPPORTED_ALGORITHM',
    SESSION_EXHAUSTED = 'SESSION_EXHAUSTED',
    INVALID_INPUT = 'INVALID_INPUT',

    // Contract violations
    KEYS_NOT_DERIVED = 'KEYS_NOT_DERIVED',
    TRANSCRIPT_ALREADY_SET = 'TRANSCRIPT_ALREADY_SET',
    INVALID_OPERATION = 'INVALID_OPERATION',
    SESSION_DESTROYED = 'SESSION_DESTROYED'
}

export class MdocError extends Error {
    readonly code: MdocErrorCode;
    readonly kind: ErrorKind;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(kind: ErrorKind, code: MdocErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'MdocError';
        this.kind = kind;
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();
    }

    static protocol(code: MdocErrorCode, message: string, details?: unknown): MdocError {
        return new MdocError(ErrorKind.PROTOCOL, code, message, details);
    }

    static platform(code: MdocErrorCode, message: string, details?: unknown): MdocError {
        return new MdocError(ErrorKind.PLATFORM, code, message, details);
    }

    static crypto(code: MdocErrorCode, message: string, details?: unknown): MdocError {
        return new MdocError(ErrorKind.CRYPTO, code, message, details);
    }

    static precondition(code: MdocErrorCode, message: string, details?: unknown): MdocError {
        return new MdocError(ErrorKind.PRECONDITION, code, message, details);
    }
}

// ===== RESULT TYPE =====

export type Result<T> =
    | { ok: true; value: T }
    | { ok: false; error: MdocError };

export function ok<T>(value: T): Result<T> {
    return { ok: true, value };
}

export function err<T = never>(error: MdocError): Result<T> {
    return { ok: false, error };
}

/**
 * Run `fn` and capture a thrown MdocError as a failed result.
 * Precondition violations are rethrown so they still fail loudly.
 */
export function attempt<T>(fn: () => T, fallback: (cause: unknown) => MdocError): Result<T> {
    try {
        return ok(fn());
    } catch (cause) {
        if (cause instanceof MdocError) {
            if (cause.kind === ErrorKind.PRECONDITION) {
                throw cause;
            }
            return err(cause);
        }
        return err(fallback(cause));
    }
}

export function describeError(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}

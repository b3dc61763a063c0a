/**
 * @file DSL Error Taxonomy
 *
 * Single error type raised by every component of the semantic layer.
 * Callers branch on `code`; `message` stays human-readable and stable
 * enough to be asserted on.
 *
 * @module errors/DslError
 */

export const DSL_ERROR_CODES = [
    'VERB_NOT_FOUND',
    'EMPTY_DOCUMENT',
    'MALFORMED_DOCUMENT',
    'ILLEGAL_TRANSITION',
    'ATTRIBUTE_NOT_FOUND',
    'INVALID_ATTRIBUTE_REFERENCE',
    'NO_DICTIONARY',
    'LOOKUP_ABORTED',
    'UNSUPPORTED_INSTRUCTION',
    'INVALID_REQUEST',
    'GENERATION_FAILED',
    'VOCABULARY_INVALID',
    'DOMAIN_NOT_FOUND',
    'DOMAIN_ALREADY_REGISTERED',
    'SESSION_CONFLICT',
] as const;

export type DslErrorCode = (typeof DSL_ERROR_CODES)[number];

export interface DslErrorOptions {
    details?: Record<string, unknown>;
    cause?: unknown;
}

/**
 * Error raised by the DSL layer.
 *
 * @property code - Machine-readable failure kind.
 * @property details - Structured context (verb name, state pair, attribute id).
 */
export class DslError extends Error {
    readonly name: string = 'DslError';
    readonly code: DslErrorCode;
    readonly details: Readonly<Record<string, unknown>>;

    constructor(code: DslErrorCode, message: string, options: DslErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.code = code;
        this.details = Object.freeze({ ...(options.details ?? {}) });
    }
}

/**
 * Type guard for DslError, optionally narrowed to one code.
 */
export function dslError_is(error: unknown, code?: DslErrorCode): error is DslError {
    if (!(error instanceof DslError)) return false;
    return code === undefined || error.code === code;
}

/**
 * Render any thrown value as a message string.
 */
export function errorMessage_get(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Daily Weather Archive — Error Kinds
 *
 * Protocol failures (`upstream`, `malformed_response`) abort a fetch. A response with
 * no per-day block is not an error: it yields an empty result.
 */

export type ArchiveErrorKind = 'invalid_input' | 'upstream' | 'malformed_response';

export abstract class ArchiveError extends Error {
    abstract readonly kind: ArchiveErrorKind;
}

/** Bad caller input: empty catalog, out-of-range coordinate, `start > end`. */
export class InvalidInputError extends ArchiveError {
    readonly kind = 'invalid_input' as const;

    constructor(message: string) {
        super(message);
        this.name = 'InvalidInputError';
    }
}

/**
 * Non-2xx status from the provider, or a transport failure (`status` is null then).
 */
export class UpstreamError extends ArchiveError {
    readonly kind = 'upstream' as const;

    constructor(
        readonly status: number | null,
        readonly bodyExcerpt: string,
        message?: string
    ) {
        super(message ?? `Archive request failed: HTTP ${status ?? 'n/a'}`);
        this.name = 'UpstreamError';
    }
}

export class MalformedResponseError extends ArchiveError {
    readonly kind = 'malformed_response' as const;

    constructor(readonly detail: string) {
        super(`Malformed archive response: ${detail}`);
        this.name = 'MalformedResponseError';
    }
}

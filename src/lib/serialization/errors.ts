import type { ZodIssue } from 'zod';

export type DecodeErrorCode = 'unknown-type' | 'invalid-record';

/**
 * A record that cannot become a primitive or project.
 */
export class DecodeError extends Error {
    readonly code: DecodeErrorCode;
    /** Location of the offending record inside the decoded input. */
    readonly path: (string | number)[];
    readonly issues: ZodIssue[];

    constructor(code: DecodeErrorCode, message: string, path: (string | number)[] = [], issues: ZodIssue[] = []) {
        super(message);
        this.name = 'DecodeError';
        this.code = code;
        this.path = path;
        this.issues = issues;
    }

    /** Same error reported under `prefix`. */
    at(...prefix: (string | number)[]): DecodeError {
        const issues = this.issues.map(issue => ({ ...issue, path: [...prefix, ...issue.path] }));
        return new DecodeError(this.code, this.message, [...prefix, ...this.path], issues);
    }
}

export type DecodeResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: DecodeError };

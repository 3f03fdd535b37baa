/**
 * src/utils/errors.ts
 *
 * Error types shared by the HTTP client and the crawl loop.
 */

/** Thrown by the HTTP client when the server answers outside 2xx. */
export class HttpStatusError extends Error {
    readonly statusCode: number;
    readonly url: string;

    constructor(statusCode: number, url: string) {
        super(`HTTP ${statusCode} for ${url}`);
        this.name = 'HttpStatusError';
        this.statusCode = statusCode;
        this.url = url;
    }
}

/** Turns any thrown value into a single log-friendly line. */
export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === 'string') return err;
    try {
        return JSON.stringify(err) ?? String(err);
    } catch {
        return String(err);
    }
}

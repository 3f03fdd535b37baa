/**
 * src/utils/httpClient.ts
 *
 * Sequential HTTP client used for both listing pages and ad detail pages.
 *
 * Every attempt is preceded by a politeness sleep of
 * `baseDelayMs + random() × jitterMs`. Transport errors and non-2xx answers
 * are retried per `planRetry()`; once the budget is spent the client logs
 * the failure and hands back `{ ok: false }` instead of throwing.
 */

import { log } from 'crawlee';
import { describeError, HttpStatusError } from './errors.js';
import { planRetry, type RetryPolicy } from './retryPolicy.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface TransportRequest {
    url: string;
    headers: Record<string, string>;
    timeoutMs: number;
    proxyUrl?: string;
}

export interface TransportResponse {
    statusCode: number;
    body: string;
}

/** One network round trip, no retrying. Swappable for tests. */
export type HttpTransport = (request: TransportRequest) => Promise<TransportResponse>;

export type FetchOutcome =
    | { ok: true; url: string; statusCode: number; body: string }
    | { ok: false; url: string; error: string; attempts: number };

export interface HttpClientOptions {
    userAgent: string;
    acceptLanguage: string;
    timeoutMs: number;
    baseDelayMs: number;
    jitterMs: number;
    retry: RetryPolicy;
    proxyUrl?: string;
    transport?: HttpTransport;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

// ─── Default Transport ────────────────────────────────────────────────────────

export const gotScrapingTransport: HttpTransport = async (request) => {
    const { gotScraping } = await import('got-scraping');
    const response = await gotScraping({
        url: request.url,
        proxyUrl: request.proxyUrl,
        headers: request.headers,
        timeout: { request: request.timeoutMs },
        retry: { limit: 0 },
        throwHttpErrors: false,
    });
    return { statusCode: response.statusCode, body: response.body };
};

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

// ─── Client ───────────────────────────────────────────────────────────────────

export class HttpClient {
    private readonly headers: Record<string, string>;
    private readonly transport: HttpTransport;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly random: () => number;

    constructor(private readonly options: HttpClientOptions) {
        this.headers = {
            'User-Agent': options.userAgent,
            'Accept-Language': options.acceptLanguage,
            'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
        };
        this.transport = options.transport ?? gotScrapingTransport;
        this.sleep = options.sleep ?? sleep;
        this.random = options.random ?? Math.random;
    }

    async fetch(url: string): Promise<FetchOutcome> {
        const { maxRetries } = this.options.retry;

        for (let attempt = 0; ; attempt++) {
            await this.sleep(this.options.baseDelayMs + this.random() * this.options.jitterMs);

            try {
                const response = await this.transport({
                    url,
                    headers: this.headers,
                    timeoutMs: this.options.timeoutMs,
                    proxyUrl: this.options.proxyUrl,
                });
                if (response.statusCode < 200 || response.statusCode >= 300) {
                    throw new HttpStatusError(response.statusCode, url);
                }
                return { ok: true, url, statusCode: response.statusCode, body: response.body };
            } catch (err) {
                const cause = describeError(err);
                const decision = planRetry(attempt, this.options.retry, this.random);

                if (!decision.shouldRetry) {
                    log.error(`[HttpClient] Failed to retrieve ${url} after ${maxRetries} retries: ${cause}`);
                    return { ok: false, url, error: cause, attempts: attempt + 1 };
                }

                log.warning(
                    `[HttpClient] Request failed for ${url}: ${cause}. ` +
                    `Retrying in ${(decision.delayMs / 1000).toFixed(2)} seconds...`
                );
                await this.sleep(decision.delayMs);
            }
        }
    }
}

import { ZodError } from 'zod';
import { envSchema, type Env } from './envSchema.js';
import type { CrawlConfig } from '../orchestrator.js';
import type { HttpClientOptions } from '../utils/httpClient.js';

export interface AppConfig {
    crawl: CrawlConfig;
    http: HttpClientOptions;
    cacheFile: string;
    snapshotFile: string;
    logDir: string;
    logLevel: string;
}

/** Validates `raw` and throws one Error listing every bad variable. */
export function parseEnv(raw: NodeJS.ProcessEnv): Env {
    try {
        return envSchema.parse(raw);
    } catch (err) {
        if (err instanceof ZodError) {
            const lines = err.issues.map((i) => {
                const key = i.path.join('.') || '(root)';
                return `- ${key}: ${i.message}`;
            });
            throw new Error('Invalid environment variables:\n' + lines.join('\n'));
        }
        throw err;
    }
}

export function toAppConfig(env: Env): AppConfig {
    const proxyUrl = env.PROXY_URLS.split(',')[0]?.trim();
    return {
        crawl: {
            baseUrl: env.LISTING_BASE_URL,
            siteOrigin: env.SITE_ORIGIN,
            maxPages: env.MAX_PAGES,
            flushEvery: env.FLUSH_EVERY,
        },
        http: {
            userAgent: env.USER_AGENT,
            acceptLanguage: env.ACCEPT_LANGUAGE,
            timeoutMs: env.REQUEST_TIMEOUT_MS,
            baseDelayMs: env.BASE_DELAY_MS,
            jitterMs: env.RANDOM_DELAY_RANGE_MS,
            retry: {
                maxRetries: env.MAX_RETRIES,
                backoffBaseMs: env.BACKOFF_BASE_MS,
                backoffJitterMs: 1000,
            },
            proxyUrl: proxyUrl || undefined,
        },
        cacheFile: env.CACHE_FILE,
        snapshotFile: env.SNAPSHOT_FILE,
        logDir: env.LOG_DIR,
        logLevel: env.CRAWLEE_LOG_LEVEL,
    };
}

/** Parses `process.env`; prints the problems and exits on invalid config. */
export function loadConfig(raw: NodeJS.ProcessEnv = process.env): AppConfig {
    try {
        return toAppConfig(parseEnv(raw));
    } catch (err) {
        console.error(err instanceof Error ? err.message : String(err));
        process.exit(1);
    }
}

export type { Env };

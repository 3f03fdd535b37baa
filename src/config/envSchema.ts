import { z } from 'zod';

const numFromEnv = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().finite());

const positiveIntFromEnv = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().int().positive());

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36';

export const envSchema = z.object({
    LISTING_BASE_URL: z.string().url().default('https://www.unegui.mn/l-hdlh/l-hdlh-zarna/oron-suuts-zarna/'),
    SITE_ORIGIN: z.string().url().default('https://www.unegui.mn'),
    MAX_PAGES: positiveIntFromEnv.default(165),
    FLUSH_EVERY: positiveIntFromEnv.default(20),

    MAX_RETRIES: numFromEnv.pipe(z.number().int().min(0)).default(3),
    BASE_DELAY_MS: numFromEnv.pipe(z.number().min(0)).default(2000),
    RANDOM_DELAY_RANGE_MS: numFromEnv.pipe(z.number().min(0)).default(1000),
    BACKOFF_BASE_MS: numFromEnv.pipe(z.number().min(0)).default(1000),
    REQUEST_TIMEOUT_MS: positiveIntFromEnv.default(30_000),
    USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
    ACCEPT_LANGUAGE: z.string().min(1).default('en-US,en;q=0.9'),
    PROXY_URLS: z.string().default(''),

    CACHE_FILE: z.string().min(1).default('data/scraped_sales_urls.txt'),
    SNAPSHOT_FILE: z.string().min(1).default('data/unegui_sales_data.csv'),
    LOG_DIR: z.string().min(1).default('logs'),

    CRAWLEE_LOG_LEVEL: z.string().default(''),
}).passthrough();

export type Env = z.infer<typeof envSchema>;

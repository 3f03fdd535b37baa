/**
 * src/main.ts
 *
 * ENTRY POINT — listing crawl
 *
 * Builds one CrawlSession from the environment and runs it to completion.
 *
 * LOGGING
 * ───────
 *  • All stdout/stderr is mirrored to <LOG_DIR>/crawl_YYYYMMDD.log.
 *  • CRAWLEE_LOG_LEVEL sets the level; `--verbose` / `-v` forces DEBUG.
 *
 * RESUMING
 * ────────
 *  • Killing the process is the only way to stop a run. Ads processed since
 *    the last checkpoint are not in the dedup cache yet, so the next run
 *    fetches them again.
 */

import 'dotenv/config';
import { log, LogLevel } from 'crawlee';
import { loadConfig } from './config/env.js';
import { Crawler } from './orchestrator.js';
import { DedupStore } from './utils/dedupStore.js';
import { describeError } from './utils/errors.js';
import { closeFileLogger, initFileLogger } from './utils/fileLogger.js';
import { HttpClient } from './utils/httpClient.js';
import { createRunContext, formatElapsed } from './utils/runContext.js';
import { SnapshotStore } from './utils/snapshotStore.js';

const LOG_LEVELS: Record<string, LogLevel> = {
    ERROR: LogLevel.ERROR,
    WARNING: LogLevel.WARNING,
    INFO: LogLevel.INFO,
    DEBUG: LogLevel.DEBUG,
    PERF: LogLevel.PERF,
};

async function main(): Promise<void> {
    const config = loadConfig();
    const ctx = createRunContext(config.crawl.baseUrl);
    const logFile = initFileLogger(config.logDir, ctx);

    const isVerbose = process.argv.includes('--verbose') || process.argv.includes('-v');
    const level = isVerbose ? 'DEBUG' : config.logLevel.toUpperCase();
    log.setLevel(LOG_LEVELS[level] ?? LogLevel.INFO);

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.once(signal, () => {
            log.warning(`Received ${signal} after ${formatElapsed(ctx)} — stopping. Unsaved ads will be re-fetched next run.`);
            void closeFileLogger().then(() => process.exit(130));
        });
    }

    log.info(`Starting listing crawl ${ctx.runId} at ${ctx.startedAt.toISOString()}`);
    log.info(`  Target:   ${config.crawl.baseUrl} (max ${config.crawl.maxPages} pages)`);
    log.info(`  Snapshot: ${config.snapshotFile}`);
    log.info(`  Cache:    ${config.cacheFile}`);
    log.info(`  Log file: ${logFile}`);

    try {
        const crawler = new Crawler({
            config: config.crawl,
            client: new HttpClient(config.http),
            cache: new DedupStore(config.cacheFile),
            store: new SnapshotStore(config.snapshotFile),
        });
        const summary = await crawler.run();
        log.info(`Scraping completed in ${formatElapsed(ctx)} (${summary.totalRows} rows in snapshot)`);
    } finally {
        await closeFileLogger();
    }
}

main().catch((err) => {
    log.error(`Crawl aborted: ${describeError(err)}`);
    process.exitCode = 1;
});

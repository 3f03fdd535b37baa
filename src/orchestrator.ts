/**
 * src/orchestrator.ts
 *
 * LISTING CRAWL ORCHESTRATOR
 *
 * Runs one crawl over a CrawlSession in two strictly sequential phases:
 *
 *   PHASE 1 (LINKS)  → listing pages 1..maxPages, stopping at the first page
 *                      that yields no ad links (or cannot be fetched).
 *   PHASE 2 (ADS)    → every discovered ad not already in the dedup cache is
 *                      fetched and extracted; failures are logged and skipped.
 *
 * CHECKPOINTS
 * ───────────
 * Every `flushEvery` links (skipped ones included) and once more at the end,
 * the full table (prior rows + this run's records) is written. Only AFTER a
 * write succeeds are the URLs it covered added to the dedup cache, so an
 * interrupted run re-fetches its unflushed ads instead of dropping them.
 *
 * Nothing thrown inside the page or ad loops escapes `run()`.
 */

import { log } from 'crawlee';
import { buildListingPageUrl, toAbsoluteUrl } from './config/unegui.js';
import { extractListingFromHtml } from './extractors/adDetail.js';
import { extractAdLinks } from './extractors/listingPage.js';
import type { ListingRecord, Snapshot, SnapshotRow } from './sources/types.js';
import type { DedupStore } from './utils/dedupStore.js';
import { describeError } from './utils/errors.js';
import type { HttpClient } from './utils/httpClient.js';
import type { SnapshotStore } from './utils/snapshotStore.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface CrawlConfig {
    /** Category URL; page N > 1 is requested with `?page=N`. */
    baseUrl: string;
    /** Prefixed to relative ad links. */
    siteOrigin: string;
    maxPages: number;
    /** Links processed between checkpoints. */
    flushEvery: number;
}

/** Everything one run needs, built by the caller. No module-level state. */
export interface CrawlSession {
    config: CrawlConfig;
    client: Pick<HttpClient, 'fetch'>;
    cache: Pick<DedupStore, 'load' | 'contains' | 'record' | 'size'>;
    store: Pick<SnapshotStore, 'load' | 'write'>;
    clock?: () => Date;
}

export interface CrawlSummary {
    pagesVisited: number;
    linksFound: number;
    skippedCached: number;
    fetched: number;
    failed: number;
    stored: number;
    flushes: number;
    totalRows: number;
    durationMs: number;
}

// ─── Crawler ──────────────────────────────────────────────────────────────────

export class Crawler {
    private prior: Snapshot = [];
    private readonly batch: ListingRecord[] = [];
    /** URLs of batch records not yet covered by a successful write. */
    private readonly uncached: string[] = [];
    private readonly clock: () => Date;
    private summary: CrawlSummary = emptySummary();

    constructor(private readonly session: CrawlSession) {
        this.clock = session.clock ?? (() => new Date());
    }

    async run(): Promise<CrawlSummary> {
        const start = Date.now();
        const { cache, store, config } = this.session;

        this.summary = emptySummary();
        this.batch.length = 0;
        this.uncached.length = 0;

        cache.load();
        this.prior = store.load();
        if (this.prior.length > 0) {
            log.info(`[Crawler] Loaded ${this.prior.length} existing records`);
        }

        const links = await this.collectLinks();
        log.info(`[Crawler] Found ${links.length} links. Starting to scrape individual ads...`);

        for (const [index, url] of links.entries()) {
            const position = index + 1;
            log.info(`[Crawler] Scraping ad ${position}/${links.length}: ${url}`);

            await this.processAd(url);

            if (position % config.flushEvery === 0) {
                this.checkpoint();
                log.info(`[Crawler] Progress saved: ${position}/${links.length} ads processed`);
            }
        }

        if (this.prior.length + this.batch.length > 0) {
            this.checkpoint();
            log.info(`[Crawler] Scraping completed. Total ads: ${this.prior.length + this.batch.length}`);
        } else {
            log.warning('[Crawler] No data was collected.');
        }

        this.summary.durationMs = Date.now() - start;
        this.summary.totalRows = this.prior.length + this.batch.length;
        logCrawlSummary(this.summary, cache.size);
        return { ...this.summary };
    }

    // ─── Phase 1: Listing Pages ───────────────────────────────────────────────

    /** Absolute ad URLs across all listing pages, de-duplicated in first-seen order. */
    async collectLinks(): Promise<string[]> {
        const { baseUrl, siteOrigin, maxPages } = this.session.config;
        const found = new Set<string>();

        for (let page = 1; page <= maxPages; page++) {
            const pageUrl = buildListingPageUrl(baseUrl, page);
            log.info(`[Crawler] Scraping page ${page}...`);

            const links = await this.fetchPageLinks(pageUrl);
            this.summary.pagesVisited++;

            if (links.length === 0) {
                log.info('[Crawler] No more links found.');
                break;
            }

            log.info(`[Crawler] Found ${links.length} links on page ${pageUrl}`);
            for (const href of links) found.add(toAbsoluteUrl(href, siteOrigin));
        }

        this.summary.linksFound = found.size;
        return [...found];
    }

    private async fetchPageLinks(pageUrl: string): Promise<string[]> {
        try {
            const outcome = await this.session.client.fetch(pageUrl);
            return outcome.ok ? extractAdLinks(outcome.body) : [];
        } catch (err) {
            log.error(`[Crawler] Error parsing page ${pageUrl}: ${describeError(err)}`);
            return [];
        }
    }

    // ─── Phase 2: Ads ─────────────────────────────────────────────────────────

    private async processAd(url: string): Promise<void> {
        if (this.session.cache.contains(url)) {
            log.info(`[Crawler] Skipping already scraped ad: ${url}`);
            this.summary.skippedCached++;
            return;
        }

        try {
            const outcome = await this.session.client.fetch(url);
            if (!outcome.ok) {
                log.warning(`[Crawler] Skipping ad ${url}: ${outcome.error}`);
                this.summary.failed++;
                return;
            }
            this.summary.fetched++;

            const record = extractListingFromHtml(outcome.body, url, this.clock());
            if (!record) {
                this.summary.failed++;
                return;
            }

            this.batch.push(record);
            this.uncached.push(url);
        } catch (err) {
            log.error(`[Crawler] Unexpected failure on ${url}: ${describeError(err)}`);
            this.summary.failed++;
        }
    }

    // ─── Checkpoint ───────────────────────────────────────────────────────────

    private checkpoint(): void {
        const rows: SnapshotRow[] = [...this.prior, ...this.batch];
        this.summary.flushes++;

        if (!this.session.store.write(rows)) {
            log.warning(`[Crawler] Checkpoint failed; ${this.uncached.length} ads stay uncached and will be retried next run.`);
            return;
        }
        this.summary.stored = this.batch.length;

        try {
            for (const url of this.uncached) this.session.cache.record(url);
            this.uncached.length = 0;
        } catch (err) {
            log.error(`[Crawler] Could not update dedup cache: ${describeError(err)}`);
        }
    }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function emptySummary(): CrawlSummary {
    return {
        pagesVisited: 0,
        linksFound: 0,
        skippedCached: 0,
        fetched: 0,
        failed: 0,
        stored: 0,
        flushes: 0,
        totalRows: 0,
        durationMs: 0,
    };
}

export function logCrawlSummary(s: CrawlSummary, cacheSize: number): void {
    log.info(
        `[Crawler] Run summary — ` +
        `Pages: ${s.pagesVisited} | ` +
        `Links: ${s.linksFound} | ` +
        `Fetched: ${s.fetched} | ` +
        `Stored: ${s.stored} | ` +
        `Failed: ${s.failed} | ` +
        `Skipped (cached): ${s.skippedCached} | ` +
        `Checkpoints: ${s.flushes} | ` +
        `Rows in snapshot: ${s.totalRows} | ` +
        `URLs in cache: ${cacheSize}`
    );
}

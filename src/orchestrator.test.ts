import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { log, LogLevel } from 'crawlee';
import { Crawler, type CrawlConfig } from './orchestrator.js';
import { DedupStore } from './utils/dedupStore.js';
import type { FetchOutcome } from './utils/httpClient.js';
import { SnapshotStore } from './utils/snapshotStore.js';
import { adIdFor } from './sources/types.js';

const ORIGIN = 'https://listings.test';
const BASE = `${ORIGIN}/cat/`;

const config: CrawlConfig = { baseUrl: BASE, siteOrigin: ORIGIN, maxPages: 10, flushEvery: 20 };

function listingPage(hrefs: string[]): string {
    return `<ul>${hrefs.map((h) => `<li><a class="mask" href="${h}"></a></li>`).join('')}</ul>`;
}

function adPage(title: string): string {
    return `<h1 class="title-announcement">${title}</h1><meta itemprop="price" content="1000.00">`;
}

function hrefs(from: number, to: number): string[] {
    const out: string[] = [];
    for (let n = from; n <= to; n++) out.push(`/ad/${n}/`);
    return out;
}

/** In-process stand-in for the site: listing pages by URL, every /ad/ URL answers. */
class FakeSite {
    readonly requested: string[] = [];
    readonly failing = new Set<string>();

    constructor(private readonly pages: Record<string, string[]>) {}

    async fetch(url: string): Promise<FetchOutcome> {
        this.requested.push(url);
        if (this.failing.has(url)) return { ok: false, url, error: 'HTTP 500', attempts: 4 };
        const links = this.pages[url];
        if (links) return { ok: true, url, statusCode: 200, body: listingPage(links) };
        if (url.startsWith(`${ORIGIN}/ad/`)) return { ok: true, url, statusCode: 200, body: adPage(url) };
        return { ok: true, url, statusCode: 200, body: listingPage([]) };
    }

    adRequests(): string[] {
        return this.requested.filter((u) => u.startsWith(`${ORIGIN}/ad/`));
    }
}

let dir: string;
let cacheFile: string;
let snapshotFile: string;

beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'crawler-'));
    cacheFile = path.join(dir, 'cache.txt');
    snapshotFile = path.join(dir, 'snapshot.csv');
    log.setLevel(LogLevel.OFF);
});

afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    log.setLevel(LogLevel.INFO);
    vi.restoreAllMocks();
});

function session(site: FakeSite, overrides: Partial<CrawlConfig> = {}) {
    return {
        config: { ...config, ...overrides },
        client: site,
        cache: new DedupStore(cacheFile),
        store: new SnapshotStore(snapshotFile),
        clock: () => new Date(2026, 9, 19),
    };
}

const fortyFiveAds = {
    [BASE]: hrefs(1, 20),
    [`${BASE}?page=2`]: hrefs(21, 40),
    [`${BASE}?page=3`]: hrefs(41, 45),
};

describe('Crawler', () => {
    it('flushes after the 20th, 40th and final ad, each write a strict superset of the last', async () => {
        const site = new FakeSite(fortyFiveAds);
        const s = session(site);
        const writeToDisk = s.store.write.bind(s.store);
        const onDisk: string[][] = [];
        vi.spyOn(s.store, 'write').mockImplementation((rows) => {
            const ok = writeToDisk(rows);
            onDisk.push(new SnapshotStore(snapshotFile).load().map((r) => r.url));
            return ok;
        });

        const summary = await new Crawler(s).run();

        expect(onDisk.map((urls) => urls.length)).toEqual([20, 40, 45]);
        for (let i = 1; i < onDisk.length; i++) {
            const previous = onDisk[i - 1];
            expect(onDisk[i].length).toBeGreaterThan(previous.length);
            expect(onDisk[i]).toEqual(expect.arrayContaining(previous));
        }
        expect(summary).toMatchObject({
            pagesVisited: 4,
            linksFound: 45,
            fetched: 45,
            stored: 45,
            failed: 0,
            flushes: 3,
            totalRows: 45,
        });
    });

    it('stops paginating at the first page without links', async () => {
        const site = new FakeSite(fortyFiveAds);
        await new Crawler(session(site)).run();

        const listingRequests = site.requested.filter((u) => !u.startsWith(`${ORIGIN}/ad/`));
        expect(listingRequests).toEqual([BASE, `${BASE}?page=2`, `${BASE}?page=3`, `${BASE}?page=4`]);
    });

    it('never requests page 2 when page 1 is empty, and writes nothing', async () => {
        const site = new FakeSite({ [BASE]: [] });
        const s = session(site);
        const writeSpy = vi.spyOn(s.store, 'write');

        const summary = await new Crawler(s).run();

        expect(site.requested).toEqual([BASE]);
        expect(writeSpy).not.toHaveBeenCalled();
        expect(summary.pagesVisited).toBe(1);
        expect(fs.existsSync(snapshotFile)).toBe(false);
    });

    it('stops at maxPages', async () => {
        const site = new FakeSite(fortyFiveAds);
        const summary = await new Crawler(session(site, { maxPages: 2 })).run();

        expect(site.requested).not.toContain(`${BASE}?page=3`);
        expect(summary.linksFound).toBe(40);
    });

    it('makes no ad requests on a re-run with an unchanged cache', async () => {
        await new Crawler(session(new FakeSite(fortyFiveAds))).run();

        const rerun = new FakeSite(fortyFiveAds);
        const summary = await new Crawler(session(rerun)).run();

        expect(rerun.adRequests()).toEqual([]);
        expect(summary.skippedCached).toBe(45);
        expect(summary.totalRows).toBe(45);
        expect(new SnapshotStore(snapshotFile).load()).toHaveLength(45);
    });

    it('records each ad URL in the cache once its row is on disk', async () => {
        await new Crawler(session(new FakeSite(fortyFiveAds))).run();

        const cache = new DedupStore(cacheFile);
        cache.load();
        expect(cache.size).toBe(45);
        expect(cache.contains(`${ORIGIN}/ad/45/`)).toBe(true);

        const rows = new SnapshotStore(snapshotFile).load();
        expect(rows[0].ad_id).toBe(adIdFor(`${ORIGIN}/ad/1/`));
        expect(rows[0].price).toBe('1000');
        expect(rows[0].scraped_date).toBe('19/10/2026');
    });

    it('leaves ads uncached when their checkpoint write fails', async () => {
        const site = new FakeSite({ [BASE]: hrefs(1, 5) });
        const s = session(site);
        vi.spyOn(s.store, 'write').mockReturnValue(false);

        await new Crawler(s).run();

        const cache = new DedupStore(cacheFile);
        cache.load();
        expect(cache.size).toBe(0);
    });

    it('skips a failing ad and keeps going', async () => {
        const site = new FakeSite({ [BASE]: hrefs(1, 3) });
        site.failing.add(`${ORIGIN}/ad/2/`);

        const summary = await new Crawler(session(site)).run();

        expect(summary).toMatchObject({ fetched: 2, failed: 1, stored: 2 });
        const urls = new SnapshotStore(snapshotFile).load().map((r) => r.url);
        expect(urls).toEqual([`${ORIGIN}/ad/1/`, `${ORIGIN}/ad/3/`]);

        const cache = new DedupStore(cacheFile);
        cache.load();
        expect(cache.contains(`${ORIGIN}/ad/2/`)).toBe(false);
    });

    it('skips cached URLs without a request and keeps prior rows', async () => {
        const first = new FakeSite({ [BASE]: hrefs(1, 2) });
        await new Crawler(session(first)).run();

        const second = new FakeSite({ [BASE]: hrefs(1, 4) });
        const summary = await new Crawler(session(second)).run();

        expect(second.adRequests()).toEqual([`${ORIGIN}/ad/3/`, `${ORIGIN}/ad/4/`]);
        expect(summary).toMatchObject({ skippedCached: 2, fetched: 2, totalRows: 4 });
    });

    it('visits an ad linked from two pages only once', async () => {
        const site = new FakeSite({
            [BASE]: ['/ad/1/', '/ad/2/'],
            [`${BASE}?page=2`]: ['/ad/2/', '/ad/3/'],
        });

        const summary = await new Crawler(session(site)).run();

        expect(summary.linksFound).toBe(3);
        expect(site.adRequests()).toEqual([`${ORIGIN}/ad/1/`, `${ORIGIN}/ad/2/`, `${ORIGIN}/ad/3/`]);
    });

    it('does not let a throwing client escape the run', async () => {
        const site = new FakeSite({ [BASE]: hrefs(1, 2) });
        const realFetch = site.fetch.bind(site);
        vi.spyOn(site, 'fetch').mockImplementation(async (url: string) => {
            if (url === `${ORIGIN}/ad/1/`) throw new Error('socket hang up');
            return realFetch(url);
        });

        const summary = await new Crawler(session(site)).run();

        expect(summary).toMatchObject({ failed: 1, stored: 1 });
    });
});

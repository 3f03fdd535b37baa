/**
 * src/utils/dedupStore.ts
 *
 * Persistent set of ad URLs that are already in the snapshot — survives
 * process restarts so a re-run skips them without a request.
 *
 * STORAGE: plain text, one URL per line, UTF-8, append-only.
 * ─────────────────────────────────────────────────────────
 * The key is the raw URL exactly as it was fetched (not the derived ad_id).
 * Entries are never pruned. `record()` appends one line per new URL, so an
 * interrupted run keeps every line written before the interruption.
 */

import * as fs from 'fs';
import * as path from 'path';
import { log } from 'crawlee';
import { describeError } from './errors.js';

export class DedupStore {
    private readonly seen = new Set<string>();

    constructor(private readonly filePath: string) {}

    /**
     * Reads the cache file into memory. A missing file is an empty cache;
     * an unreadable one is logged and also treated as empty.
     */
    load(): void {
        this.seen.clear();
        if (!fs.existsSync(this.filePath)) {
            log.info(`[DedupStore] No cache at ${this.filePath} — starting fresh.`);
            return;
        }
        try {
            const raw = fs.readFileSync(this.filePath, 'utf-8');
            for (const line of raw.split(/\r?\n/)) {
                const url = line.trim();
                if (url) this.seen.add(url);
            }
            log.info(`[DedupStore] Loaded ${this.seen.size} URLs from ${this.filePath}.`);
        } catch (err) {
            log.warning(`[DedupStore] Cache file unreadable — starting fresh. (${describeError(err)})`);
        }
    }

    contains(url: string): boolean {
        return this.seen.has(url);
    }

    /** Adds `url` and appends it to disk. Already-known URLs are a no-op. */
    record(url: string): void {
        if (this.seen.has(url)) return;
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        fs.appendFileSync(this.filePath, `${url}\n`, 'utf-8');
        this.seen.add(url);
    }

    get size(): number {
        return this.seen.size;
    }
}

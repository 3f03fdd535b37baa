/**
 * src/utils/snapshotStore.ts
 *
 * Reads and writes the accumulated listing table as one CSV file.
 *
 * Design
 * ──────
 * • The file is UTF-8 with a BOM, header row first, one row per ad.
 * • `write()` replaces the whole file: it writes `<file>.tmp`, then renames
 *   it over the target, so a crash mid-write leaves the previous snapshot.
 * • No merging happens here. Callers hand over the complete row list.
 * • Failures are caught and logged — they never throw.
 */

import * as fs from 'fs';
import * as path from 'path';
import { log } from 'crawlee';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { LISTING_FIELDS, type Snapshot } from '../sources/types.js';
import { describeError } from './errors.js';

const SnapshotSchema = z.array(z.record(z.string()));

/**
 * Header for `rows`: the ListingRecord columns, then any extra columns that
 * older snapshots carried, in the order they were first seen.
 */
export function snapshotColumns(rows: Snapshot): string[] {
    const columns: string[] = [...LISTING_FIELDS];
    const known = new Set<string>(columns);
    for (const row of rows) {
        for (const key of Object.keys(row)) {
            if (!known.has(key)) {
                known.add(key);
                columns.push(key);
            }
        }
    }
    return columns;
}

export class SnapshotStore {
    constructor(private readonly filePath: string) {}

    /** Prior rows, or `[]` when there is no snapshot or it cannot be read. */
    load(): Snapshot {
        if (!fs.existsSync(this.filePath)) {
            log.info(`[SnapshotStore] No snapshot at ${this.filePath} — starting empty.`);
            return [];
        }
        try {
            const raw = fs.readFileSync(this.filePath, 'utf-8');
            const rows = SnapshotSchema.parse(
                parse(raw, { bom: true, columns: true, skip_empty_lines: true, relax_column_count: true })
            );
            log.info(`[SnapshotStore] Loaded existing data from ${this.filePath}: ${rows.length} records`);
            return rows;
        } catch (err) {
            log.warning(`[SnapshotStore] Could not load existing data: ${describeError(err)}`);
            return [];
        }
    }

    /** Overwrites the snapshot. Returns `false` (after logging) if the write failed. */
    write(rows: Snapshot): boolean {
        const tmp = `${this.filePath}.tmp`;
        try {
            fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
            const csv = stringify([...rows], {
                bom: true,
                header: true,
                columns: snapshotColumns(rows),
            });
            fs.writeFileSync(tmp, csv, 'utf-8');
            fs.renameSync(tmp, this.filePath);
            log.info(`[SnapshotStore] Data saved to ${this.filePath}: ${rows.length} records`);
            return true;
        } catch (err) {
            log.error(`[SnapshotStore] Failed to save ${this.filePath}: ${describeError(err)}`);
            return false;
        }
    }
}

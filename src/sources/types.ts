/**
 * src/sources/types.ts
 *
 * Shared record types for the listing crawler.
 *
 * Every ad becomes one ListingRecord. All values are strings: numeric
 * parsing of the free-text fields belongs to whoever reads the snapshot.
 * A field that could not be found holds UNAVAILABLE, never `undefined`.
 */

import { createHash } from 'crypto';

/** Placeholder for a field that was not found on the page. */
export const UNAVAILABLE = 'N/A';

// ─── Listing Record ───────────────────────────────────────────────────────────

/** Snapshot column order. The CSV header is written in exactly this order. */
export const LISTING_FIELDS = [
    'ad_id',
    'url',
    'price',
    'floor_level',
    'floor_count',
    'room_count_raw',
    'area_raw',
    'district_raw',
    'location_raw',
    'balcony',
    'garage',
    'window_type',
    'window_count',
    'door_type',
    'floor_material',
    'building_progress',
    'commissioned_year',
    'leasing_available',
    'title',
    'description',
    'posted_raw',
    'view_count_raw',
    'scraped_date',
] as const;

export type ListingField = (typeof LISTING_FIELDS)[number];

export type ListingRecord = Readonly<Record<ListingField, string>>;

// ─── Snapshot ─────────────────────────────────────────────────────────────────

/**
 * A row as read back from disk. Older snapshots may carry columns that
 * ListingRecord no longer has, so rows are kept loosely typed.
 */
export type SnapshotRow = Readonly<Record<string, string>>;

export type Snapshot = readonly SnapshotRow[];

// ─── Identity ─────────────────────────────────────────────────────────────────

/** MD5 hex of the URL's UTF-8 bytes. Same URL, same id, on every run. */
export function adIdFor(url: string): string {
    return createHash('md5').update(url, 'utf8').digest('hex');
}

/**
 * src/extractors/adDetail.ts
 *
 * Turns one ad detail page into a ListingRecord.
 *
 * Label-anchored fields come from FIELD_RULES; the handful of fields that
 * live in dedicated elements (address, price, counters, text blocks) are
 * read below. Anything not found is UNAVAILABLE. Only an exception while
 * handling the whole document makes the ad fail, and then the caller gets
 * `null` and moves on.
 */

import { log } from 'crawlee';
import {
    ADDRESS_DELIMITER,
    FIELD_RULES,
    POSTED_DATE_PREFIX,
    UneguiSelectors,
    type FieldRule,
} from '../config/unegui.js';
import { adIdFor, UNAVAILABLE, type ListingField, type ListingRecord } from '../sources/types.js';
import { describeError } from '../utils/errors.js';
import { CheerioDocument, type MarkupDocument } from './markup.js';

const { detail } = UneguiSelectors;

// ─── Value Helpers ────────────────────────────────────────────────────────────

/** "150000000.00" → "150000000"; anything non-numeric is returned untouched. */
export function normalizePrice(raw: string): string {
    const trimmed = raw.trim();
    const value = Number(trimmed);
    if (trimmed === '' || !Number.isFinite(value)) return raw;
    return String(Math.trunc(value));
}

export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/** `DD/MM/YYYY` in local time. */
export function formatScrapedDate(date: Date): string {
    const dd = String(date.getDate()).padStart(2, '0');
    const mm = String(date.getMonth() + 1).padStart(2, '0');
    return `${dd}/${mm}/${date.getFullYear()}`;
}

/** "District — location" → both halves; no delimiter → `null`. */
export function splitAddress(text: string): { district: string; location: string } | null {
    if (!text.includes(ADDRESS_DELIMITER)) return null;
    const parts = text.split(ADDRESS_DELIMITER);
    return { district: parts[0].trim(), location: parts[1].trim() };
}

function readRule(doc: MarkupDocument, rule: FieldRule): string | null {
    const label = doc.findLabel(rule.label);
    if (!label) return null;
    return rule.kind === 'classed'
        ? doc.classedValueAfter(label, UneguiSelectors.valueClass)
        : doc.valueAfter(label);
}

// ─── Extraction ───────────────────────────────────────────────────────────────

export function extractListing(
    doc: MarkupDocument,
    url: string,
    scrapedAt: Date = new Date()
): ListingRecord | null {
    try {
        const found = new Map<ListingField, string>();

        for (const rule of FIELD_RULES) {
            const value = readRule(doc, rule);
            if (value !== null) found.set(rule.field, value);
        }

        const address = doc.text(detail.address);
        const parts = address === null ? null : splitAddress(address);
        if (parts) {
            found.set('district_raw', parts.district);
            found.set('location_raw', parts.location);
        }

        const price = doc.attr(detail.price, 'content');
        if (price !== null) found.set('price', normalizePrice(price));

        const views = doc.text(detail.views);
        if (views !== null) found.set('view_count_raw', views.replace(/\s+/g, ''));

        const rooms = doc.lastText(detail.locationCrumbs, 'span');
        if (rooms !== null) found.set('room_count_raw', rooms.trim());

        const title = doc.text(detail.title);
        if (title !== null) found.set('title', normalizeWhitespace(title));

        const description = doc.text(detail.description);
        if (description !== null) found.set('description', normalizeWhitespace(description));

        const posted = doc.text(detail.postedDate);
        if (posted !== null) found.set('posted_raw', posted.replace(POSTED_DATE_PREFIX, '').trim());

        const pick = (field: ListingField): string => found.get(field) ?? UNAVAILABLE;

        return {
            ad_id: adIdFor(url),
            url,
            price: pick('price'),
            floor_level: pick('floor_level'),
            floor_count: pick('floor_count'),
            room_count_raw: pick('room_count_raw'),
            area_raw: pick('area_raw'),
            district_raw: pick('district_raw'),
            location_raw: pick('location_raw'),
            balcony: pick('balcony'),
            garage: pick('garage'),
            window_type: pick('window_type'),
            window_count: pick('window_count'),
            door_type: pick('door_type'),
            floor_material: pick('floor_material'),
            building_progress: pick('building_progress'),
            commissioned_year: pick('commissioned_year'),
            leasing_available: pick('leasing_available'),
            title: pick('title'),
            description: pick('description'),
            posted_raw: pick('posted_raw'),
            view_count_raw: pick('view_count_raw'),
            scraped_date: formatScrapedDate(scrapedAt),
        };
    } catch (err) {
        if (err instanceof Error) {
            log.exception(err, `[AdDetail] Error scraping ad ${url}`);
        } else {
            log.error(`[AdDetail] Error scraping ad ${url}: ${describeError(err)}`);
        }
        return null;
    }
}

/** Parses `html` and extracts; markup that fails to load counts as a failed ad. */
export function extractListingFromHtml(
    html: string,
    url: string,
    scrapedAt: Date = new Date()
): ListingRecord | null {
    let doc: MarkupDocument;
    try {
        doc = new CheerioDocument(html, UneguiSelectors.valueClass);
    } catch (err) {
        log.error(`[AdDetail] Could not parse ${url}: ${describeError(err)}`);
        return null;
    }
    return extractListing(doc, url, scrapedAt);
}

/**
 * src/config/unegui.ts — selectors and label table for unegui.mn listings
 */

import type { ListingField } from '../sources/types.js';

export const UneguiSelectors = {
    hub: {
        adLink: 'a.mask',
    },
    detail: {
        address: 'span[itemprop="address"]',
        price: 'meta[itemprop="price"]',
        views: 'span.counter-views',
        locationCrumbs: 'div.wrap.js-single-item__location',
        title: 'h1.title-announcement',
        description: 'div.announcement-description',
        postedDate: 'span.date-meta',
    },
    /** Class of the link-styled value that follows some labels. */
    valueClass: 'value-chars',
};

export const ADDRESS_DELIMITER = '—';
export const POSTED_DATE_PREFIX = 'Нийтэлсэн:';

/**
 * `text`    → the next span after the label holds the value.
 * `classed` → the next `a.value-chars` after the label holds the value.
 */
export type FieldKind = 'text' | 'classed';

export interface FieldRule {
    field: ListingField;
    label: string;
    kind: FieldKind;
}

export const FIELD_RULES: readonly FieldRule[] = [
    { field: 'floor_material', label: 'Шал:', kind: 'text' },
    { field: 'balcony', label: 'Тагт:', kind: 'text' },
    { field: 'garage', label: 'Гараж:', kind: 'text' },
    { field: 'window_type', label: 'Цонх:', kind: 'text' },
    { field: 'door_type', label: 'Хаалга:', kind: 'text' },
    { field: 'window_count', label: 'Цонхны тоо:', kind: 'classed' },
    { field: 'building_progress', label: 'Барилгын явц:', kind: 'text' },
    { field: 'commissioned_year', label: 'Ашиглалтанд орсон он:', kind: 'text' },
    { field: 'floor_count', label: 'Барилгын давхар:', kind: 'classed' },
    { field: 'area_raw', label: 'Талбай:', kind: 'classed' },
    { field: 'floor_level', label: 'Хэдэн давхарт:', kind: 'classed' },
    { field: 'leasing_available', label: 'Лизингээр авах боломж:', kind: 'text' },
];

/** Page 1 is the bare category URL; later pages add `?page=N`. */
export function buildListingPageUrl(baseUrl: string, page: number): string {
    if (page <= 1) return baseUrl;
    const url = new URL(baseUrl);
    url.searchParams.set('page', String(page));
    return url.toString();
}

/** Listing pages link ads relatively; absolute hrefs pass through. */
export function toAbsoluteUrl(href: string, origin: string): string {
    return href.startsWith('http') ? href : `${origin.replace(/\/$/, '')}${href}`;
}

/**
 * src/extractors/listingPage.ts
 *
 * Pulls ad links out of one listing (category) page.
 */

import * as cheerio from 'cheerio';
import { UneguiSelectors } from '../config/unegui.js';

/** `href` of every ad anchor, in page order. Anchors without one are ignored. */
export function extractAdLinks(html: string): string[] {
    const $ = cheerio.load(html);
    const links: string[] = [];

    $(UneguiSelectors.hub.adLink).each((_, el) => {
        const href = $(el).attr('href');
        if (href) links.push(href);
    });

    return links;
}

/**
 * src/extractors/markup.ts
 *
 * The small slice of HTML querying the ad extractor needs, behind an
 * interface so the field rules can be exercised against any markup source.
 *
 * "After" always means document order, not sibling order: a value element
 * may sit in a different parent than its label.
 */

import * as cheerio from 'cheerio';

/** Opaque handle to a label element inside one document. */
export interface LabelRef {
    readonly position: number;
}

export interface MarkupDocument {
    /** First innermost `span` whose trimmed text equals `text`. */
    findLabel(text: string): LabelRef | null;
    /**
     * Trimmed text of the next `span` after the label, or `null` when that
     * span wraps a classed value link (those belong to `classedValueAfter`).
     */
    valueAfter(label: LabelRef): string | null;
    /** Trimmed text of the first `a.<className>` after the label. */
    classedValueAfter(label: LabelRef, className: string): string | null;
    attr(selector: string, name: string): string | null;
    text(selector: string): string | null;
    /** Text of the last `childSelector` match inside the first `selector` match. */
    lastText(selector: string, childSelector: string): string | null;
}

export class CheerioDocument implements MarkupDocument {
    private readonly $: cheerio.CheerioAPI;

    constructor(html: string, private readonly valueClass: string = 'value-chars') {
        this.$ = cheerio.load(html);
    }

    findLabel(text: string): LabelRef | null {
        const position = this.$('*')
            .toArray()
            .findIndex((el) => {
                const $el = this.$(el);
                return $el.is('span') && $el.find('span').length === 0 && $el.text().trim() === text;
            });
        return position === -1 ? null : { position };
    }

    valueAfter(label: LabelRef): string | null {
        const next = this.firstAfter(label, 'span');
        if (!next || next.find(`a.${this.valueClass}`).length > 0) return null;
        return next.text().trim();
    }

    classedValueAfter(label: LabelRef, className: string): string | null {
        const next = this.firstAfter(label, `a.${className}`);
        return next ? next.text().trim() : null;
    }

    attr(selector: string, name: string): string | null {
        return this.$(selector).first().attr(name) ?? null;
    }

    text(selector: string): string | null {
        const match = this.$(selector).first();
        return match.length > 0 ? match.text() : null;
    }

    lastText(selector: string, childSelector: string): string | null {
        const child = this.$(selector).first().find(childSelector).last();
        return child.length > 0 ? child.text() : null;
    }

    private firstAfter(label: LabelRef, selector: string) {
        const elements = this.$('*').toArray();
        for (let i = label.position + 1; i < elements.length; i++) {
            const $el = this.$(elements[i]);
            if ($el.is(selector)) return $el;
        }
        return null;
    }
}

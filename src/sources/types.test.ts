import { describe, it, expect } from 'vitest';
import { adIdFor } from './types.js';

describe('adIdFor', () => {
    it('is the MD5 hex digest of the URL', () => {
        expect(adIdFor('abc')).toBe('900150983cd24fb0d6963f7d28e17f72');
        expect(adIdFor('')).toBe('d41d8cd98f00b204e9800998ecf8427e');
    });

    it('is stable for the same URL and differs between URLs', () => {
        const url = 'https://www.unegui.mn/adv/7654321_3-oroo/';
        expect(adIdFor(url)).toBe(adIdFor(url));
        expect(adIdFor(url)).not.toBe(adIdFor(`${url}?ref=1`));
        expect(adIdFor(url)).toMatch(/^[0-9a-f]{32}$/);
    });
});

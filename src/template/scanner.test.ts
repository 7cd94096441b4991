import { describe, expect, it } from 'vitest';
import { findPlaceholder, scanPlaceholder } from './scanner.js';

describe('findPlaceholder', () => {
    it('finds every live occurrence in order', () => {
        const text = '<h1>${title}</h1><p>${title}</p>';
        expect(findPlaceholder(text, 'title')).toEqual([
            { start: 4, end: 12 },
            { start: 20, end: 28 }
        ]);
    });

    it('accepts an occurrence at position 0', () => {
        expect(findPlaceholder('${link} tail', 'link')).toEqual([{ start: 0, end: 7 }]);
    });

    it('returns an empty list when the name is absent', () => {
        expect(findPlaceholder('<p>no placeholders</p>', 'title')).toEqual([]);
    });

    it('is anchored by the delimiters', () => {
        expect(findPlaceholder('${date_extra} ${dates} $date ${date}', 'date')).toEqual([{ start: 29, end: 36 }]);
    });

    it('is case-sensitive', () => {
        expect(findPlaceholder('${Title} ${TITLE}', 'title')).toEqual([]);
    });

    it('excludes escaped occurrences', () => {
        expect(findPlaceholder('\\${title} ${title}', 'title')).toEqual([{ start: 10, end: 18 }]);
    });
});

describe('scanPlaceholder', () => {
    it('reports the backslash index of each escaped occurrence', () => {
        const text = 'a\\${time}b${time}c\\${time}';
        expect(scanPlaceholder(text, 'time')).toEqual({
            live: [{ start: 10, end: 17 }],
            escaped: [1, 18]
        });
    });

    it('counts N live and M escaped occurrences independently', () => {
        const text = '${source}\\${source}${source}\\${source}\\${source}';
        const { live, escaped } = scanPlaceholder(text, 'source');
        expect(live).toHaveLength(2);
        expect(escaped).toHaveLength(3);
    });
});

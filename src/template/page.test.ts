import { describe, expect, it } from 'vitest';
import { makeEntry } from '../timeline/entry.js';
import { TimelineStore } from '../timeline/store.js';
import { ItemTemplate } from './item.js';
import { PageTemplate, selectEntries } from './page.js';

function entry(timestamp: number, sourceLink = 'https://a.example', link = `https://a.example/${timestamp}`) {
    return makeEntry({ title: `t${timestamp}`, sourceName: 'A', sourceLink, link, timestamp });
}

function storeOf(...entries: ReturnType<typeof entry>[]) {
    const store = new TimelineStore();
    for (const e of entries) store.append(e);
    return store;
}

const stamp = ItemTemplate.compile('[${timestamp}]');

describe('PageTemplate', () => {
    it('orders items newest first', () => {
        const page = PageTemplate.compile('<ul>${items}</ul>');
        const store = storeOf(entry(100), entry(50), entry(200));
        expect(page.render(store, stamp, 300)).toBe('<ul>[200][100][50]</ul>');
        expect(page.render(store, stamp, 200)).toBe('<ul>[200][100][50]</ul>');
    });

    it('skips future entries in items and item_count but keeps them stored', () => {
        const page = PageTemplate.compile('${item_count}:${items}');
        const store = storeOf(entry(100), entry(50), entry(200));
        expect(page.render(store, stamp, 150)).toBe('2:[100][50]');
        expect(store.size).toBe(3);
    });

    it('counts items and distinct channels', () => {
        const page = PageTemplate.compile('items=${item_count} channels=${channel_count}${items}');
        const store = storeOf(entry(1, 'https://a.example'), entry(2, 'https://b.example'), entry(3, 'https://a.example'));
        expect(page.render(store, ItemTemplate.compile(''), 10)).toBe('items=3 channels=2');
    });

    it('renders date, time and timestamp from the render time', () => {
        const page = PageTemplate.compile('${date} ${time} ${timestamp}${items}');
        expect(page.render(storeOf(entry(5)), ItemTemplate.compile(''), 1700000000)).toBe('2023-11-14 22:13:20 1700000000');
    });

    it('returns the template unchanged without an items placeholder', () => {
        const text = '<p>\\${date} ${date} ${item_count}</p>';
        const page = PageTemplate.compile(text);
        expect(page.render(storeOf(entry(5)), stamp, 10)).toBe(text);
    });

    it('does not escape rendered items again', () => {
        const page = PageTemplate.compile('<main>${items}</main>');
        const store = storeOf(makeEntry({ title: '<b>&</b>', sourceLink: 'https://a.example', link: '', timestamp: 1 }));
        expect(page.render(store, ItemTemplate.compile('<i>${title}</i>'), 10)).toBe('<main><i>&lt;b&gt;&amp;&lt;/b&gt;</i></main>');
    });

    it('substitutes every items occurrence and honours escapes', () => {
        const page = PageTemplate.compile('\\${items}|${items}|${items}');
        expect(page.render(storeOf(entry(1), entry(2)), stamp, 10)).toBe('${items}|[2][1]|[2][1]');
    });

    it('renders an empty timeline', () => {
        const page = PageTemplate.compile('(${item_count}/${channel_count})${items}');
        expect(page.render(new TimelineStore(), stamp, 10)).toBe('(0/0)');
    });

    it('is idempotent for a fixed render time', () => {
        const page = PageTemplate.compile('${timestamp}${items}');
        const store = storeOf(entry(3), entry(1), entry(2));
        expect(page.render(store, stamp, 5)).toBe(page.render(store, stamp, 5));
    });

    it('predicts the rendered length exactly', () => {
        const store = storeOf(entry(100), entry(50, 'https://b.example'), entry(200));
        const item = ItemTemplate.compile('<li>${title} ${link} & ${source}</li>');
        for (const text of ['', '${items}', 'no items here', '\\${items}${items}${item_count}${channel_count}${date}${time}${timestamp}']) {
            const page = PageTemplate.compile(text);
            expect(page.predictLength(store, item, 150)).toBe(page.render(store, item, 150).length);
        }
    });
});

describe('selectEntries', () => {
    it('breaks timestamp ties by link regardless of insertion order', () => {
        const a = entry(10, 'https://a.example', 'https://a.example/a');
        const b = entry(10, 'https://a.example', 'https://a.example/b');
        expect(selectEntries([b, a], 10).map((e) => e.link)).toEqual(['https://a.example/a', 'https://a.example/b']);
        expect(selectEntries([a, b], 10).map((e) => e.link)).toEqual(['https://a.example/a', 'https://a.example/b']);
    });

    it('includes entries exactly at the render time', () => {
        expect(selectEntries([entry(10), entry(11)], 10).map((e) => e.timestamp)).toEqual([10]);
    });
});

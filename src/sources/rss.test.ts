import axios from 'axios';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { FeedFetchError } from '../errors.js';
import { fetchRss, parseFeed } from './rss.js';

vi.mock('axios', () => ({ default: { get: vi.fn() } }));

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
<channel>
<title> Example News </title>
<link>https://news.example</link>
<description>Test feed</description>
<item>
<title>First</title>
<link>https://news.example/first</link>
<description>Body of the first</description>
<pubDate>Tue, 14 Nov 2023 22:13:20 GMT</pubDate>
</item>
<item>
<link>https://news.example/untitled</link>
</item>
</channel>
</rss>`;

describe('parseFeed', () => {
    it('maps channel and items', async () => {
        const channel = await parseFeed(RSS, 'https://news.example/rss');
        expect(channel.feedUrl).toBe('https://news.example/rss');
        expect(channel.title).toBe('Example News');
        expect(channel.link).toBe('https://news.example');
        expect(channel.items).toHaveLength(2);
        expect(channel.items[0]).toMatchObject({
            title: 'First',
            link: 'https://news.example/first',
            description: 'Body of the first',
            pubDate: 'Tue, 14 Nov 2023 22:13:20 GMT',
            isoDate: '2023-11-14T22:13:20.000Z'
        });
    });

    it('keeps missing fields absent', async () => {
        const channel = await parseFeed(RSS, 'https://news.example/rss');
        const untitled = channel.items[1];
        expect(untitled.title).toBeUndefined();
        expect(untitled.description).toBeUndefined();
        expect(untitled.pubDate).toBeUndefined();
        expect(untitled.link).toBe('https://news.example/untitled');
    });

    it('rejects text that is not a feed', async () => {
        await expect(parseFeed('not xml at all', 'https://x.example')).rejects.toThrow();
    });
});

describe('fetchRss', () => {
    const get = vi.mocked(axios.get);

    beforeEach(() => {
        get.mockReset();
    });

    it('fetches and parses the feed', async () => {
        get.mockResolvedValue({ data: RSS });
        const channel = await fetchRss('https://news.example/rss');
        expect(channel.items.map((i) => i.link)).toEqual(['https://news.example/first', 'https://news.example/untitled']);
        expect(get).toHaveBeenCalledWith('https://news.example/rss', expect.objectContaining({ timeout: 8000, responseType: 'text' }));
    });

    it('wraps failures in FeedFetchError', async () => {
        get.mockRejectedValue(new Error('ECONNREFUSED'));
        const err = await fetchRss('https://down.example/rss').catch((e: unknown) => e);
        expect(err).toBeInstanceOf(FeedFetchError);
        expect(err).toMatchObject({ feedUrl: 'https://down.example/rss', message: "failed to fetch feed 'https://down.example/rss'" });
    });
});

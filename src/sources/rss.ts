import axios from 'axios';
import Parser from 'rss-parser';
import { FeedFetchError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { FeedChannel, FeedItem } from '../types.js';

const parser = new Parser({ timeout: 8000 });
const logger = createLogger('src:rss');

/**
 * 解析 RSS / Atom 文本
 * 实现：统一映射到 FeedChannel；缺失字段保持 undefined，由渲染层决定默认文本
 */
export async function parseFeed(xml: string, feedUrl: string): Promise<FeedChannel> {
    const feed = await parser.parseString(xml);
    const items: FeedItem[] = (feed.items || []).map((it) => ({
        title: it.title?.trim(),
        link: it.link?.trim(),
        description: it.content ?? it.summary,
        pubDate: it.pubDate,
        isoDate: it.isoDate
    }));
    return { feedUrl, title: feed.title?.trim(), link: (feed.link || '').trim(), items };
}

/**
 * 抓取 RSS 源
 * 失败时记录并抛出 FeedFetchError，由调用方决定是否回退到缓存
 */
export async function fetchRss(feedUrl: string): Promise<FeedChannel> {
    const start = Date.now();
    try {
        const res = await axios.get<string>(feedUrl, { timeout: 8000, responseType: 'text', headers: { 'User-Agent': 'Mozilla/5.0 feedpress/0.1' } });
        const channel = await parseFeed(res.data, feedUrl);
        logger.info('rss.ok', { feedUrl, count: channel.items.length, ms: Date.now() - start });
        return channel;
    } catch (e) {
        logger.warn('rss.fail', { feedUrl, err: errorMessage(e), ms: Date.now() - start });
        throw new FeedFetchError(feedUrl, { cause: e });
    }
}

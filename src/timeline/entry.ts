import crypto from 'node:crypto';
import type { FeedChannel, FeedItem } from '../types.js';

/**
 * 时间线中的一条文章
 * title / description / sourceName 为 undefined 表示源数据缺失（渲染时使用默认文本），空串则原样渲染
 */
export type Entry = Readonly<{
    id: string;
    title?: string;
    description?: string;
    sourceName?: string;
    sourceLink: string;
    link: string;
    /** 秒级时间戳 */
    timestamp: number;
    /** 发布时间无法解析时为空串 */
    dateString: string;
    timeString: string;
}>;

export type EntryInit = Omit<Entry, 'id' | 'dateString' | 'timeString'> & { dateString?: string; timeString?: string };

/** 发布时间缺失时回退为入库时间之前的固定秒数 */
export const DEFAULT_FALLBACK_OFFSET_SEC = 60;

export function nowSeconds(): number {
    return Math.floor(Date.now() / 1000);
}

export function formatDate(sec: number): string {
    return new Date(sec * 1000).toISOString().slice(0, 10);
}

export function formatTime(sec: number): string {
    return new Date(sec * 1000).toISOString().slice(11, 19);
}

export function entryId(sourceLink: string, link: string, title: string | undefined): string {
    return crypto.createHash('sha1').update(`${sourceLink}|${link}|${title ?? ''}`).digest('hex');
}

/** 直接构造条目；未给出日期串时由时间戳生成 */
export function makeEntry(init: EntryInit): Entry {
    return Object.freeze({
        ...init,
        id: entryId(init.sourceLink, init.link, init.title),
        dateString: init.dateString ?? formatDate(init.timestamp),
        timeString: init.timeString ?? formatTime(init.timestamp)
    });
}

/** 解析发布时间为秒；isoDate 优先，其次 pubDate（RFC 2822 等 Date 可识别的格式） */
export function parsePublished(item: Pick<FeedItem, 'isoDate' | 'pubDate'>): number | undefined {
    for (const raw of [item.isoDate, item.pubDate]) {
        if (!raw) continue;
        const ms = Date.parse(raw);
        if (!Number.isNaN(ms)) return Math.floor(ms / 1000);
    }
    return undefined;
}

/**
 * 由订阅源条目构造 Entry
 * 发布时间无法解析时使用 now - fallbackOffsetSec，并返回 usedFallback 供批次汇总告警
 */
export function createEntry(
    item: FeedItem,
    channel: Pick<FeedChannel, 'title' | 'link' | 'feedUrl'>,
    options: { now: number; fallbackOffsetSec?: number }
): { entry: Entry; usedFallback: boolean } {
    const published = parsePublished(item);
    const usedFallback = published === undefined;
    const timestamp = published ?? options.now - (options.fallbackOffsetSec ?? DEFAULT_FALLBACK_OFFSET_SEC);
    const entry = makeEntry({
        title: item.title,
        description: item.description,
        sourceName: channel.title,
        sourceLink: channel.link || channel.feedUrl,
        link: item.link ?? '',
        timestamp,
        dateString: usedFallback ? '' : formatDate(timestamp),
        timeString: usedFallback ? '' : formatTime(timestamp)
    });
    return { entry, usedFallback };
}

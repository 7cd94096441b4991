import { errorChain } from './errors.js';
import { createLogger } from './logger.js';
import { fetchRss } from './sources/rss.js';
import type { SourceRegistry } from './state.js';
import type { CachedFeed, FeedCache } from './storage/db.js';
import { createEntry, DEFAULT_FALLBACK_OFFSET_SEC, nowSeconds } from './timeline/entry.js';
import type { TimelineStore } from './timeline/store.js';
import type { FeedChannel } from './types.js';

const logger = createLogger('pipeline');

export type IngestOptions = { now?: number; fallbackOffsetSec?: number };

export type IngestResult = { appended: number; skipped: number; fallback: number };

export type PipelineDeps = {
    store: TimelineStore;
    cache: FeedCache;
    sources: SourceRegistry;
    fetch?: (feedUrl: string) => Promise<FeedChannel>;
    fallbackOffsetSec?: number;
};

/**
 * 将一个源的条目写入时间线
 * 实现：按 id 去重（sourceLink|link|title 哈希），已存在的跳过；统计回退时间戳的条目数
 */
export function ingestChannel(store: TimelineStore, channel: FeedChannel, options: IngestOptions = {}): IngestResult {
    const now = options.now ?? nowSeconds();
    const result: IngestResult = { appended: 0, skipped: 0, fallback: 0 };
    for (const item of channel.items) {
        const { entry, usedFallback } = createEntry(item, channel, { now, fallbackOffsetSec: options.fallbackOffsetSec });
        if (store.has(entry.id)) {
            result.skipped++;
            continue;
        }
        store.append(entry);
        result.appended++;
        if (usedFallback) result.fallback++;
    }
    logger.debug('pipeline.ingest', { feedUrl: channel.feedUrl, ...result });
    return result;
}

/**
 * 并发抓取全部源并入库
 * 成功的源写入缓存；失败的源回退到缓存副本（若有）；时间戳回退按批次汇总告警一次
 */
export async function refreshFeeds(deps: PipelineDeps, feedUrls: string[]): Promise<IngestResult> {
    const fetch = deps.fetch ?? fetchRss;
    const channels = await Promise.all(feedUrls.map((feedUrl) => refreshOne(deps, fetch, feedUrl)));
    return ingestBatch(deps, channels.filter((c): c is FeedChannel => c !== undefined));
}

/** 单个源：只有抓取失败才回退缓存；缓存写入失败只记录，保留本次抓取结果 */
async function refreshOne(deps: PipelineDeps, fetch: (feedUrl: string) => Promise<FeedChannel>, feedUrl: string): Promise<FeedChannel | undefined> {
    let channel: FeedChannel;
    try {
        channel = await fetch(feedUrl);
    } catch (e) {
        return fallbackToCache(deps, feedUrl, e);
    }
    try {
        await deps.cache.save(channel);
    } catch (e) {
        logger.warn('pipeline.cache.save.fail', { feedUrl, err: errorChain(e) });
    }
    deps.sources.set({ feedUrl, title: channel.title, lastSuccessAt: new Date().toISOString(), lastError: undefined, lastCount: channel.items.length, fromCache: false });
    return channel;
}

async function fallbackToCache(deps: PipelineDeps, feedUrl: string, fetchError: unknown): Promise<CachedFeed | undefined> {
    let cached: CachedFeed | undefined;
    try {
        cached = await deps.cache.load(feedUrl);
    } catch (e) {
        logger.warn('pipeline.cache.load.fail', { feedUrl, err: errorChain(e) });
        cached = undefined;
    }
    deps.sources.set({ feedUrl, lastError: errorChain(fetchError), fromCache: cached !== undefined });
    if (cached) logger.warn('pipeline.cache.fallback', { feedUrl, fetchedAt: cached.fetchedAt });
    return cached;
}

/** 仅从缓存入库（离线导出） */
export async function loadCached(deps: Omit<PipelineDeps, 'fetch'>, feedUrls: string[]): Promise<IngestResult> {
    const channels: FeedChannel[] = [];
    for (const feedUrl of feedUrls) {
        const cached = await deps.cache.load(feedUrl);
        if (!cached) {
            logger.warn('pipeline.cache.miss', { feedUrl });
            continue;
        }
        deps.sources.set({ feedUrl, title: cached.title, lastSuccessAt: cached.fetchedAt, lastCount: cached.items.length, fromCache: true });
        channels.push(cached);
    }
    return ingestBatch(deps, channels);
}

function ingestBatch(deps: Pick<PipelineDeps, 'store' | 'fallbackOffsetSec'>, channels: FeedChannel[]): IngestResult {
    const now = nowSeconds();
    const total: IngestResult = { appended: 0, skipped: 0, fallback: 0 };
    for (const channel of channels) {
        const r = ingestChannel(deps.store, channel, { now, fallbackOffsetSec: deps.fallbackOffsetSec });
        total.appended += r.appended;
        total.skipped += r.skipped;
        total.fallback += r.fallback;
    }
    if (total.fallback > 0) logger.warn('pipeline.timestamp.fallback', { count: total.fallback, offsetSec: deps.fallbackOffsetSec ?? DEFAULT_FALLBACK_OFFSET_SEC });
    logger.info('pipeline.batch', { feeds: channels.length, ...total });
    return total;
}

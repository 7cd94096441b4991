import Datastore from 'nedb-promises';
import fs from 'node:fs';
import path from 'node:path';
import { createLogger } from '../logger.js';
import type { FeedChannel } from '../types.js';

const logger = createLogger('db');

export type CachedFeed = FeedChannel & { fetchedAt: string };

type FeedStore = ReturnType<typeof Datastore.create>;

/**
 * 订阅源缓存（NeDB，基于文件的轻量 DB）
 * 保存每个源最近一次成功抓取的内容，供离线导出与抓取失败时回退
 * 实现：feeds 集合按 feedUrl 唯一索引，保存时整体覆盖
 */
export class FeedCache {
    private constructor(private readonly feeds: FeedStore) {}

    static async open(options: { dir: string } | { inMemory: true }): Promise<FeedCache> {
        let feeds: FeedStore;
        if ('dir' in options) {
            fs.mkdirSync(options.dir, { recursive: true });
            feeds = Datastore.create({ filename: path.join(options.dir, 'feeds.db'), autoload: true });
        } else {
            feeds = Datastore.create({ inMemoryOnly: true });
        }
        await feeds.ensureIndex({ fieldName: 'feedUrl', unique: true });
        logger.debug('db.init.done', { file: 'dir' in options ? options.dir : ':memory:' });
        return new FeedCache(feeds);
    }

    async save(channel: FeedChannel, fetchedAt: Date = new Date()): Promise<void> {
        const doc: CachedFeed = { ...channel, fetchedAt: fetchedAt.toISOString() };
        await this.feeds.update({ feedUrl: channel.feedUrl }, doc, { upsert: true });
    }

    async load(feedUrl: string): Promise<CachedFeed | undefined> {
        const doc: (CachedFeed & { _id: string }) | null = await this.feeds.findOne<CachedFeed>({ feedUrl });
        return doc ? strip(doc) : undefined;
    }

    async all(): Promise<CachedFeed[]> {
        const docs: Array<CachedFeed & { _id: string }> = await this.feeds.find<CachedFeed>({}).exec();
        return docs.map(strip).sort((a, b) => (a.feedUrl < b.feedUrl ? -1 : a.feedUrl > b.feedUrl ? 1 : 0));
    }
}

function strip({ _id, ...rest }: CachedFeed & { _id: string }): CachedFeed {
    return rest;
}

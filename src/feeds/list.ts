import fs from 'node:fs';
import path from 'node:path';
import { createLogger } from '../logger.js';
import { parseOpml, renderOpml } from './opml.js';

const logger = createLogger('feeds');

/**
 * 订阅列表文本格式：每行一个 URL，# 开头为注释，空行忽略，重复项保留首次出现
 */
export function parseFeedList(text: string): string[] {
    const seen = new Set<string>();
    for (const line of text.split(/\r?\n/)) {
        const url = line.trim();
        if (!url || url.startsWith('#')) continue;
        seen.add(url);
    }
    return [...seen];
}

/** 列表文件不存在视为空列表 */
export function readFeedList(file: string): string[] {
    if (!fs.existsSync(file)) return [];
    return parseFeedList(fs.readFileSync(file, 'utf-8'));
}

export function writeFeedList(file: string, feeds: string[]) {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, feeds.map((f) => `${f}\n`).join(''), 'utf-8');
}

export function addFeed(file: string, url: string): boolean {
    const feeds = readFeedList(file);
    if (feeds.includes(url)) return false;
    writeFeedList(file, [...feeds, url]);
    logger.info('feeds.add', { url });
    return true;
}

export function removeFeed(file: string, url: string): boolean {
    const feeds = readFeedList(file);
    if (!feeds.includes(url)) return false;
    writeFeedList(file, feeds.filter((f) => f !== url));
    logger.info('feeds.remove', { url });
    return true;
}

/** 合并 OPML 中的订阅，返回新增数量 */
export function importOpml(listFile: string, opmlFile: string): number {
    const feeds = readFeedList(listFile);
    const incoming = parseOpml(fs.readFileSync(opmlFile, 'utf-8')).filter((url) => !feeds.includes(url));
    if (incoming.length > 0) writeFeedList(listFile, [...feeds, ...incoming]);
    logger.info('feeds.import', { file: opmlFile, added: incoming.length });
    return incoming.length;
}

export function exportOpml(listFile: string, opmlFile: string): number {
    const feeds = readFeedList(listFile);
    fs.writeFileSync(opmlFile, renderOpml(feeds), 'utf-8');
    logger.info('feeds.export', { file: opmlFile, count: feeds.length });
    return feeds.length;
}

import { createLogger } from '../logger.js';
import { formatDate, formatTime, nowSeconds, type Entry } from '../timeline/entry.js';
import type { TimelineStore } from '../timeline/store.js';
import { CompiledTemplate, type FieldTable } from './compiled.js';
import type { ItemTemplate } from './item.js';

const logger = createLogger('template:page');

export const PAGE_PLACEHOLDERS = ['items', 'item_count', 'channel_count', 'date', 'time', 'timestamp'] as const;

export type PagePlaceholder = (typeof PAGE_PLACEHOLDERS)[number];

export type PageContext = {
    items: string;
    itemCount: number;
    channelCount: number;
    /** 渲染时刻（秒） */
    now: number;
};

/** 页面级占位符；items 为已转义的条目 HTML，不再转义 */
export const PAGE_FIELDS: FieldTable<PagePlaceholder, PageContext> = {
    items: { read: (c) => c.items, fallback: '', raw: true },
    item_count: { read: (c) => String(c.itemCount), fallback: '0' },
    channel_count: { read: (c) => String(c.channelCount), fallback: '0' },
    date: { read: (c) => formatDate(c.now), fallback: '' },
    time: { read: (c) => formatTime(c.now), fallback: '' },
    timestamp: { read: (c) => String(c.now), fallback: '' }
};

/**
 * 选出可渲染条目：跳过时间戳晚于 now 的条目，按时间戳倒序
 * 同一时间戳按 link、title、sourceLink 升序，结果与插入顺序无关
 */
export function selectEntries(entries: readonly Entry[], now: number): Entry[] {
    return entries
        .filter((e) => e.timestamp <= now)
        .sort((a, b) => b.timestamp - a.timestamp || compare(a.link, b.link) || compare(a.title ?? '', b.title ?? '') || compare(a.sourceLink, b.sourceLink));
}

function compare(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * 页面模板
 */
export class PageTemplate {
    private constructor(readonly compiled: CompiledTemplate<PagePlaceholder>) {}

    static compile(text: string): PageTemplate {
        const compiled = CompiledTemplate.compile(text, PAGE_PLACEHOLDERS);
        if (!compiled.has('items')) logger.warn('page.items.absent', { length: text.length });
        return new PageTemplate(compiled);
    }

    get text(): string {
        return this.compiled.text;
    }

    /** 聚合值在每次渲染时计算，不缓存 */
    context(timeline: TimelineStore, itemTemplate: ItemTemplate, now: number = nowSeconds()): PageContext {
        const selected = selectEntries(timeline.snapshot(), now);
        return {
            items: selected.map((e) => itemTemplate.render(e)).join(''),
            itemCount: selected.length,
            channelCount: new Set(selected.map((e) => e.sourceLink)).size,
            now
        };
    }

    render(timeline: TimelineStore, itemTemplate: ItemTemplate, now: number = nowSeconds()): string {
        if (!this.compiled.has('items')) {
            logger.warn('page.items.missing', { hint: 'page template has no ${items}, returned unchanged' });
            return this.compiled.text;
        }
        const context = this.context(timeline, itemTemplate, now);
        const html = this.compiled.assemble(this.compiled.resolve(PAGE_FIELDS, context));
        logger.debug('page.rendered', { items: context.itemCount, channels: context.channelCount, length: html.length });
        return html;
    }

    predictLength(timeline: TimelineStore, itemTemplate: ItemTemplate, now: number = nowSeconds()): number {
        if (!this.compiled.has('items')) return this.compiled.text.length;
        return this.compiled.predictLength(this.compiled.resolve(PAGE_FIELDS, this.context(timeline, itemTemplate, now)));
    }
}

import { createLogger } from '../logger.js';
import type { Entry } from '../timeline/entry.js';
import { CompiledTemplate, type FieldTable } from './compiled.js';

const logger = createLogger('template:item');

export const ITEM_PLACEHOLDERS = ['title', 'description', 'source', 'link', 'date', 'time', 'timestamp', 'channel_link'] as const;

export type ItemPlaceholder = (typeof ITEM_PLACEHOLDERS)[number];

/** 条目级占位符 → 取值与默认文本；新增占位符只需在此登记 */
export const ITEM_FIELDS: FieldTable<ItemPlaceholder, Entry> = {
    title: { read: (e) => e.title, fallback: '(No title)' },
    description: { read: (e) => e.description, fallback: '(No description)' },
    source: { read: (e) => e.sourceName, fallback: '(No source)' },
    link: { read: (e) => e.link, fallback: '' },
    date: { read: (e) => e.dateString, fallback: '' },
    time: { read: (e) => e.timeString, fallback: '' },
    timestamp: { read: (e) => String(e.timestamp), fallback: '' },
    channel_link: { read: (e) => e.sourceLink, fallback: '' }
};

/**
 * 条目模板
 * 渲染结果只取决于模板与条目本身，不引入渲染时刻
 */
export class ItemTemplate {
    private constructor(readonly compiled: CompiledTemplate<ItemPlaceholder>) {}

    static compile(text: string): ItemTemplate {
        const compiled = CompiledTemplate.compile(text, ITEM_PLACEHOLDERS);
        if (compiled.occurrences.length === 0) logger.warn('item.placeholders.none', { length: text.length });
        return new ItemTemplate(compiled);
    }

    get text(): string {
        return this.compiled.text;
    }

    render(entry: Entry): string {
        return this.compiled.assemble(this.compiled.resolve(ITEM_FIELDS, entry));
    }

    predictLength(entry: Entry): number {
        return this.compiled.predictLength(this.compiled.resolve(ITEM_FIELDS, entry));
    }
}

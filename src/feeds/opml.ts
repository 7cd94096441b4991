import { load } from 'cheerio';

/**
 * 从 OPML 中收集所有 outline 的 xmlUrl（保持文档顺序，去重）
 */
export function parseOpml(xml: string): string[] {
    const $ = load(xml, { xml: true });
    const seen = new Set<string>();
    $('outline').each((_i, el) => {
        const url = ($(el).attr('xmlUrl') ?? $(el).attr('xmlurl') ?? '').trim();
        if (url) seen.add(url);
    });
    return [...seen];
}

export function renderOpml(feeds: string[], title = 'feedpress subscriptions'): string {
    return `<?xml version="1.0" encoding="UTF-8"?>\n` +
        `<opml version="2.0">\n` +
        `<head>\n` +
        `<title>${escapeXml(title)}</title>\n` +
        `</head>\n` +
        `<body>\n` +
        feeds.map((url) => `<outline type="rss" text="${escapeXml(url)}" xmlUrl="${escapeXml(url)}"/>\n`).join('') +
        `</body>\n` +
        `</opml>\n`;
}

const XML_ENTITIES: Record<string, string> = { '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;', "'": '&apos;' };

function escapeXml(s: string) {
    return s.replace(/[&<>"']/g, (c) => XML_ENTITIES[c] ?? c);
}

/** 模板中占位符的位置区间 [start, end) */
export type Span = { start: number; end: number };

export type ScanResult = {
    live: Span[];
    /** 被转义的占位符，记录其前导反斜杠的位置 */
    escaped: number[];
};

const BACKSLASH = 0x5c;

export function placeholderLiteral(name: string): string {
    return '${' + name + '}';
}

/**
 * 扫描模板中所有 `${name}`
 * 实现：indexOf 单遍推进；紧邻 `$` 前的反斜杠表示转义，该处不替换，反斜杠在渲染时丢弃
 */
export function scanPlaceholder(text: string, name: string): ScanResult {
    const token = placeholderLiteral(name);
    const live: Span[] = [];
    const escaped: number[] = [];
    let from = 0;
    for (;;) {
        const at = text.indexOf(token, from);
        if (at < 0) break;
        if (at > 0 && text.charCodeAt(at - 1) === BACKSLASH) escaped.push(at - 1);
        else live.push({ start: at, end: at + token.length });
        from = at + token.length;
    }
    return { live, escaped };
}

export function findPlaceholder(text: string, name: string): Span[] {
    return scanPlaceholder(text, name).live;
}

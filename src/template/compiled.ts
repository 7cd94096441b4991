import { createLogger } from '../logger.js';
import { escapeHtml } from './escape.js';
import { placeholderLiteral, scanPlaceholder, type Span } from './scanner.js';

const logger = createLogger('template');

export type Occurrence<K extends string> = Span & { kind: K };

/**
 * 占位符取值方式：读取字段，缺失时使用默认文本；raw 表示值已是 HTML，插入时不再转义
 */
export type Field<C> = {
    read: (context: C) => string | undefined;
    fallback: string;
    raw?: boolean;
};

export type FieldTable<K extends string, C> = Readonly<Record<K, Field<C>>>;

type Cut = { start: number; end: number; value: string };

/**
 * 预编译模板（对一组封闭的占位符种类通用）
 * 编译时逐种扫描一次并按起始位置排序；之后只读，可被任意次渲染共享
 */
export class CompiledTemplate<K extends string> {
    private constructor(
        readonly text: string,
        readonly occurrences: readonly Occurrence<K>[],
        readonly escapes: readonly number[]
    ) {}

    static compile<K extends string>(text: string, kinds: readonly K[]): CompiledTemplate<K> {
        const occurrences: Occurrence<K>[] = [];
        const escapes: number[] = [];
        for (const kind of kinds) {
            const { live, escaped } = scanPlaceholder(text, kind);
            if (live.length === 0) logger.debug('template.placeholder.absent', { placeholder: placeholderLiteral(kind) });
            for (const span of live) occurrences.push({ ...span, kind });
            escapes.push(...escaped);
        }
        occurrences.sort((a, b) => a.start - b.start);
        escapes.sort((a, b) => a - b);
        return new CompiledTemplate(text, Object.freeze(occurrences), Object.freeze(escapes));
    }

    /** 模板中出现过的占位符种类，按首次出现顺序 */
    kinds(): K[] {
        return [...new Set(this.occurrences.map((o) => o.kind))];
    }

    has(kind: K): boolean {
        return this.occurrences.some((o) => o.kind === kind);
    }

    /** 仅为出现的种类取值，非 raw 的值统一转义 */
    resolve<C>(table: FieldTable<K, C>, context: C): Map<K, string> {
        const values = new Map<K, string>();
        for (const kind of this.kinds()) {
            const field = table[kind];
            const value = field.read(context) ?? field.fallback;
            values.set(kind, field.raw ? value : escapeHtml(value));
        }
        return values;
    }

    /**
     * 预测输出长度：模板长度 + Σ(值长度 - 占位符字面长度) - 转义反斜杠数
     */
    predictLength(values: ReadonlyMap<K, string>): number {
        let size = this.text.length - this.escapes.length;
        for (const o of this.occurrences) {
            size += (values.get(o.kind) ?? '').length - placeholderLiteral(o.kind).length;
        }
        return size;
    }

    /**
     * 单遍拼装：按位置依次复制模板片段，在占位符处插入值，丢弃转义用的反斜杠
     */
    assemble(values: ReadonlyMap<K, string>): string {
        const cuts = this.cuts(values);
        if (cuts.length === 0) return this.text;
        const parts: string[] = [];
        let last = 0;
        for (const cut of cuts) {
            parts.push(this.text.slice(last, cut.start), cut.value);
            last = cut.end;
        }
        parts.push(this.text.slice(last));
        return parts.join('');
    }

    private cuts(values: ReadonlyMap<K, string>): Cut[] {
        const cuts: Cut[] = [];
        let i = 0;
        let j = 0;
        while (i < this.occurrences.length || j < this.escapes.length) {
            const o = this.occurrences[i];
            const e = this.escapes[j];
            if (o !== undefined && (e === undefined || o.start < e)) {
                cuts.push({ start: o.start, end: o.end, value: values.get(o.kind) ?? '' });
                i++;
            } else if (e !== undefined) {
                cuts.push({ start: e, end: e + 1, value: '' });
                j++;
            }
        }
        return cuts;
    }
}

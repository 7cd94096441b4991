import { TimelineLockError } from '../errors.js';
import type { Entry } from './entry.js';

/**
 * 时间线存储：只追加，不修改不删除
 * 由顶层显式创建并按引用传入抓取与渲染；每个操作在独占锁内完成，渲染只持有快照，不跨渲染持锁
 * 插入时不排序，排序与过滤属于渲染阶段
 */
export class TimelineStore {
    private readonly entries: Entry[] = [];
    private readonly ids = new Set<string>();
    private locked = false;

    append(entry: Entry): void {
        this.withLock('append', () => {
            this.ids.add(entry.id);
            this.entries.push(entry);
        });
    }

    has(id: string): boolean {
        return this.withLock('has', () => this.ids.has(id));
    }

    get size(): number {
        return this.withLock('size', () => this.entries.length);
    }

    /** 某一时刻的一致只读视图 */
    snapshot(): readonly Entry[] {
        return this.withLock('snapshot', () => Object.freeze([...this.entries]));
    }

    private withLock<T>(operation: string, fn: () => T): T {
        if (this.locked) throw new TimelineLockError(operation);
        this.locked = true;
        try {
            return fn();
        } finally {
            this.locked = false;
        }
    }
}

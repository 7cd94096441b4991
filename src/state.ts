export type SourceStatus = {
    feedUrl: string;
    title?: string;
    lastSuccessAt?: string;
    lastError?: string;
    lastCount?: number;
    /** 最近一次内容来自缓存 */
    fromCache?: boolean;
};

/**
 * 各订阅源的运行状态，供 /feeds 接口展示
 */
export class SourceRegistry {
    private readonly status = new Map<string, SourceStatus>();

    set(partial: SourceStatus) {
        const prev = this.status.get(partial.feedUrl);
        this.status.set(partial.feedUrl, { ...prev, ...partial });
    }

    get(feedUrl: string): SourceStatus | undefined {
        return this.status.get(feedUrl);
    }

    list(): SourceStatus[] {
        return Array.from(this.status.values());
    }
}

/**
 * 应用错误类型
 * 模板读取与配置错误为致命错误，由入口记录后退出；单个订阅源抓取失败只记录，不中断批次
 */
export class TemplateReadError extends Error {
    constructor(readonly path: string, options?: { cause?: unknown }) {
        super(`failed to read template file '${path}'`, options);
        this.name = 'TemplateReadError';
    }
}

export class FeedFetchError extends Error {
    constructor(readonly feedUrl: string, options?: { cause?: unknown }) {
        super(`failed to fetch feed '${feedUrl}'`, options);
        this.name = 'FeedFetchError';
    }
}

export class ConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigError';
    }
}

export class TimelineLockError extends Error {
    constructor(operation: string) {
        super(`timeline store is busy, '${operation}' re-entered the lock`);
        this.name = 'TimelineLockError';
    }
}

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

/** 连同 cause 一起输出，如 "failed to fetch feed 'x': timeout of 8000ms exceeded" */
export function errorChain(e: unknown): string {
    const parts: string[] = [];
    let current: unknown = e;
    while (current !== undefined && parts.length < 5) {
        parts.push(errorMessage(current));
        current = current instanceof Error ? current.cause : undefined;
    }
    return parts.join(': ');
}

import express, { type Request, type Response } from 'express';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import type { SourceRegistry } from './state.js';
import type { ItemTemplate } from './template/item.js';
import type { PageTemplate } from './template/page.js';
import type { TimelineStore } from './timeline/store.js';

const logger = createLogger('server');

export type ServerDeps = {
    store: TimelineStore;
    templates: { item: ItemTemplate; page: PageTemplate };
    sources: SourceRegistry;
    refresh: () => Promise<{ appended: number }>;
};

/**
 * HTTP 服务
 * 每次请求首页都重新渲染，聚合值随存储内容与当前时间变化
 */
export function createServer(deps: ServerDeps) {
    const app = express();

    app.get('/', (_req: Request, res: Response) => {
        const html = deps.templates.page.render(deps.store, deps.templates.item);
        res.setHeader('Content-Type', 'text/html; charset=utf-8');
        res.send(html);
    });

    app.get('/feeds', (_req: Request, res: Response) => {
        res.json(deps.sources.list());
    });

    app.get('/health', (_req: Request, res: Response) => {
        res.json({ ok: true, time: new Date().toISOString(), entries: deps.store.size });
    });

    app.post('/refresh', async (_req: Request, res: Response) => {
        try {
            const { appended } = await deps.refresh();
            res.json({ ok: true, appended });
        } catch (e) {
            logger.error('refresh.error', { err: errorMessage(e) });
            res.status(500).json({ ok: false, error: errorMessage(e) });
        }
    });

    return app;
}

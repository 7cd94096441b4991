import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createServer, type ServerDeps } from './server.js';
import { SourceRegistry } from './state.js';
import { ItemTemplate } from './template/item.js';
import { PageTemplate } from './template/page.js';
import { makeEntry } from './timeline/entry.js';
import { TimelineStore } from './timeline/store.js';

let server: Server | undefined;

async function start(deps: ServerDeps): Promise<string> {
    const app = createServer(deps);
    const listening = await new Promise<Server>((resolve) => {
        const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    server = listening;
    const address = listening.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    return `http://127.0.0.1:${(address satisfies AddressInfo).port}`;
}

afterEach(async () => {
    const s = server;
    server = undefined;
    if (s) await new Promise<void>((resolve, reject) => s.close((e) => (e ? reject(e) : resolve())));
});

function deps(overrides: Partial<ServerDeps> = {}): ServerDeps {
    return {
        store: new TimelineStore(),
        templates: { item: ItemTemplate.compile('<li>${title}</li>'), page: PageTemplate.compile('<ul data-n="${item_count}">${items}</ul>') },
        sources: new SourceRegistry(),
        refresh: async () => ({ appended: 0 }),
        ...overrides
    };
}

function entry(title: string, timestamp: number) {
    return makeEntry({ title, sourceLink: 'https://a.example', link: `https://a.example/${timestamp}`, timestamp });
}

describe('createServer', () => {
    it('renders the page as html on every request', async () => {
        const d = deps();
        d.store.append(entry('first & only', 100));
        const base = await start(d);

        const res = await fetch(`${base}/`);
        expect(res.status).toBe(200);
        expect(res.headers.get('content-type')).toBe('text/html; charset=utf-8');
        expect(await res.text()).toBe('<ul data-n="1"><li>first &amp; only</li></ul>');

        d.store.append(entry('second', 200));
        expect(await (await fetch(`${base}/`)).text()).toBe('<ul data-n="2"><li>second</li><li>first &amp; only</li></ul>');
    });

    it('lists source status', async () => {
        const d = deps();
        d.sources.set({ feedUrl: 'https://a.example/rss', title: 'A', lastCount: 3 });
        const base = await start(d);
        const res = await fetch(`${base}/feeds`);
        expect(await res.json()).toEqual([{ feedUrl: 'https://a.example/rss', title: 'A', lastCount: 3 }]);
    });

    it('reports health with the entry count', async () => {
        const d = deps();
        d.store.append(entry('one', 1));
        const base = await start(d);
        expect(await (await fetch(`${base}/health`)).json()).toEqual({ ok: true, time: expect.any(String), entries: 1 });
    });

    it('refreshes on POST /refresh', async () => {
        const refresh = vi.fn(async () => ({ appended: 4 }));
        const base = await start(deps({ refresh }));
        const res = await fetch(`${base}/refresh`, { method: 'POST' });
        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ ok: true, appended: 4 });
        expect(refresh).toHaveBeenCalledTimes(1);
    });

    it('answers 500 when the refresh fails', async () => {
        const base = await start(deps({ refresh: async () => { throw new Error('network down'); } }));
        const res = await fetch(`${base}/refresh`, { method: 'POST' });
        expect(res.status).toBe(500);
        expect(await res.json()).toEqual({ ok: false, error: 'network down' });
    });
});

#!/usr/bin/env node
import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';
import { parseCli, USAGE, type CliArgs, type FeedCommand } from './cli.js';
import { loadConfig, type AppConfig } from './config.js';
import { UsageError, errorMessage } from './errors.js';
import { addFeed, exportOpml, importOpml, readFeedList, removeFeed } from './feeds/list.js';
import { createLogger, setLogFile, setLogLevel } from './logger.js';
import { loadCached, refreshFeeds, type PipelineDeps } from './pipeline.js';
import { scheduleRefresh } from './schedule.js';
import { createServer } from './server.js';
import { SourceRegistry } from './state.js';
import { FeedCache } from './storage/db.js';
import { loadTemplates } from './template/loader.js';
import { TimelineStore } from './timeline/store.js';

const logger = createLogger('main');

function runFeedCommand(cfg: AppConfig, command: FeedCommand) {
    const listFile = cfg.feeds.file;
    switch (command.action) {
        case 'list':
            for (const url of readFeedList(listFile)) process.stdout.write(`${url}\n`);
            return;
        case 'add':
            if (!addFeed(listFile, command.url)) logger.warn('feeds.add.exists', { url: command.url });
            return;
        case 'remove':
            if (!removeFeed(listFile, command.url)) logger.warn('feeds.remove.absent', { url: command.url });
            return;
        case 'import':
            importOpml(listFile, command.file);
            return;
        case 'export':
            exportOpml(listFile, command.file);
            return;
    }
}

async function run(args: CliArgs) {
    const { command } = args;
    if (command.name === 'help') {
        process.stdout.write(USAGE);
        return;
    }

    const cfg = loadConfig({ file: args.config });
    setLogLevel(args.verbosity ?? cfg.log.level);
    if (cfg.log.file) setLogFile(cfg.log.file);
    logger.debug('config.loaded', { configDir: cfg.configDir, feeds: cfg.feeds.file });

    if (command.name === 'feed') {
        runFeedCommand(cfg, command);
        return;
    }

    // 模板读取失败为致命错误
    const templates = loadTemplates({
        item: args.itemTemplate ?? cfg.templates.item,
        page: args.pageTemplate ?? cfg.templates.page,
        configDir: cfg.configDir
    });

    const deps: PipelineDeps = {
        store: new TimelineStore(),
        cache: await FeedCache.open({ dir: cfg.cache.dir }),
        sources: new SourceRegistry(),
        fallbackOffsetSec: cfg.timeline.fallbackOffsetSec
    };
    const feeds = () => readFeedList(cfg.feeds.file);
    if (feeds().length === 0) logger.warn('feeds.empty', { file: cfg.feeds.file });

    if (command.name === 'dump') {
        if (command.offline) await loadCached(deps, feeds());
        else await refreshFeeds(deps, feeds());
        const file = path.resolve(command.file ?? cfg.dump.file);
        const html = templates.page.render(deps.store, templates.item);
        fs.writeFileSync(file, html, 'utf-8');
        logger.info('dump.done', { file, bytes: Buffer.byteLength(html) });
        return;
    }

    const refresh = () => refreshFeeds(deps, feeds());
    const app = createServer({ store: deps.store, templates, sources: deps.sources, refresh });
    const port = command.port ?? cfg.server.port;
    const bind = command.bind ?? cfg.server.bind;
    app.listen(port, bind, () => logger.info('server.started', { url: `http://${bind}:${port}` }));

    // 首次抓取不阻塞启动
    refresh().catch((e) => logger.error('refresh.error', { err: errorMessage(e) }));
    scheduleRefresh(cfg.refresh.frequencySec, refresh);
}

async function main() {
    await run(parseCli(process.argv.slice(2)));
}

main().catch((e) => {
    if (e instanceof UsageError) {
        process.stderr.write(`feedpress: ${e.message}\n\n${USAGE}`);
        process.exit(2);
    }
    logger.error('fatal', { err: errorMessage(e) });
    process.exit(1);
});

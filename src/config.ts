import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import yaml from 'js-yaml';
import { ConfigError, errorMessage } from './errors.js';
import { parseLogLevel, type LogLevel } from './logger.js';

export type AppConfig = {
    configDir: string;
    server: { port: number; bind: string };
    log: { level: LogLevel; file?: string };
    templates: { item?: string; page?: string };
    feeds: { file: string };
    refresh: { frequencySec: number };
    cache: { dir: string };
    dump: { file: string };
    timeline: { fallbackOffsetSec: number };
};

export const CONFIG_FILE_NAME = 'feedpress.yaml';

export function defaultConfigDir(env: NodeJS.ProcessEnv = process.env): string {
    return env.FEEDPRESS_CONFIG_DIR || path.join(os.homedir(), '.config', 'feedpress');
}

export function defaultConfig(configDir: string): AppConfig {
    return {
        configDir,
        server: { port: 9005, bind: '127.0.0.1' },
        log: { level: 'info' },
        templates: {},
        feeds: { file: path.join(configDir, 'channels.txt') },
        refresh: { frequencySec: 900 },
        cache: { dir: path.resolve('./data') },
        dump: { file: 'feedpress.html' },
        timeline: { fallbackOffsetSec: 60 }
    };
}

/**
 * 加载配置
 * 优先级：环境变量 > YAML 配置文件 > 默认值；文件不存在时使用默认值，无法解析或类型不符时抛出 ConfigError
 */
export function loadConfig(options: { file?: string; env?: NodeJS.ProcessEnv } = {}): AppConfig {
    const env = options.env ?? process.env;
    const configDir = defaultConfigDir(env);
    const file = options.file ?? path.join(configDir, CONFIG_FILE_NAME);
    let raw: unknown = undefined;
    if (fs.existsSync(file)) {
        try {
            raw = yaml.load(fs.readFileSync(file, 'utf-8'));
        } catch (e) {
            throw new ConfigError(`failed to read config '${file}': ${errorMessage(e)}`, { cause: e });
        }
    } else if (options.file) {
        throw new ConfigError(`config file '${file}' does not exist`);
    }
    const cfg = readConfig(raw, defaultConfig(configDir));
    return applyEnv(cfg, env);
}

/** 将 YAML 内容校验并合并到默认值上 */
export function readConfig(raw: unknown, base: AppConfig): AppConfig {
    if (raw === undefined || raw === null) return base;
    const root = section(raw, '');
    const server = section(root.server, 'server');
    const log = section(root.log, 'log');
    const templates = section(root.templates, 'templates');
    const feeds = section(root.feeds, 'feeds');
    const refresh = section(root.refresh, 'refresh');
    const cache = section(root.cache, 'cache');
    const dump = section(root.dump, 'dump');
    const timeline = section(root.timeline, 'timeline');
    const level = optString(log.level, 'log.level');
    return {
        configDir: base.configDir,
        server: {
            port: optPort(server.port, 'server.port') ?? base.server.port,
            bind: optString(server.bind, 'server.bind') ?? base.server.bind
        },
        log: {
            level: level === undefined ? base.log.level : logLevel(level, 'log.level'),
            file: optString(log.file, 'log.file') ?? base.log.file
        },
        templates: {
            item: optString(templates.item, 'templates.item') ?? base.templates.item,
            page: optString(templates.page, 'templates.page') ?? base.templates.page
        },
        feeds: { file: optString(feeds.file, 'feeds.file') ?? base.feeds.file },
        refresh: { frequencySec: optNumber(refresh.frequencySec, 'refresh.frequencySec') ?? base.refresh.frequencySec },
        cache: { dir: optString(cache.dir, 'cache.dir') ?? base.cache.dir },
        dump: { file: optString(dump.file, 'dump.file') ?? base.dump.file },
        timeline: { fallbackOffsetSec: optNumber(timeline.fallbackOffsetSec, 'timeline.fallbackOffsetSec') ?? base.timeline.fallbackOffsetSec }
    };
}

function applyEnv(cfg: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
    return {
        ...cfg,
        server: {
            port: env.PORT ? port(Number(env.PORT), 'PORT') : cfg.server.port,
            bind: env.BIND || cfg.server.bind
        },
        log: {
            level: env.LOG_LEVEL ? logLevel(env.LOG_LEVEL, 'LOG_LEVEL') : cfg.log.level,
            file: env.LOG_FILE || cfg.log.file
        }
    };
}

function section(value: unknown, key: string): Record<string, unknown> {
    if (value === undefined || value === null) return {};
    if (typeof value !== 'object' || Array.isArray(value)) throw new ConfigError(`'${key || 'config'}' must be a mapping`);
    return Object.fromEntries(Object.entries(value));
}

function optString(value: unknown, key: string): string | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') throw new ConfigError(`'${key}' must be a string`);
    return value;
}

function optNumber(value: unknown, key: string): number | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) throw new ConfigError(`'${key}' must be a non-negative number`);
    return value;
}

function optPort(value: unknown, key: string): number | undefined {
    const n = optNumber(value, key);
    return n === undefined ? undefined : port(n, key);
}

function port(n: number, key: string): number {
    if (!Number.isInteger(n) || n < 1 || n > 65535) throw new ConfigError(`'${key}' must be a port number (1-65535)`);
    return n;
}

function logLevel(value: string, key: string): LogLevel {
    const level = parseLogLevel(value);
    if (!level) throw new ConfigError(`'${key}' must be one of error, warn, info, debug or 0-3`);
    return level;
}

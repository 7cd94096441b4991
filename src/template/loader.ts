import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { TemplateReadError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { ItemTemplate } from './item.js';
import { PageTemplate } from './page.js';

const logger = createLogger('template:loader');

export type TemplateKind = 'item' | 'page';

export type TemplateSources = {
    /** 命令行或配置文件指定的路径 */
    item?: string;
    page?: string;
    /** 用户配置目录，其下 templates/<kind>.html 优先于内置模板 */
    configDir?: string;
};

export const BUILTIN_TEMPLATE_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

/**
 * 选择模板文件：显式路径 > 用户配置目录 > 内置默认
 */
export function resolveTemplatePath(kind: TemplateKind, sources: TemplateSources): { path: string; origin: 'explicit' | 'config' | 'builtin' } {
    const explicit = sources[kind];
    if (explicit) return { path: path.resolve(explicit), origin: 'explicit' };
    if (sources.configDir) {
        const candidate = path.join(sources.configDir, 'templates', `${kind}.html`);
        if (fs.existsSync(candidate)) return { path: candidate, origin: 'config' };
    }
    return { path: path.join(BUILTIN_TEMPLATE_DIR, `${kind}.html`), origin: 'builtin' };
}

/** 读取模板文本；读取失败为致命错误 */
export function loadTemplateText(kind: TemplateKind, sources: TemplateSources): string {
    const { path: file, origin } = resolveTemplatePath(kind, sources);
    try {
        const text = fs.readFileSync(file, 'utf-8');
        logger.debug('template.loaded', { kind, origin, file });
        return text;
    } catch (e) {
        logger.error('template.read.fail', { kind, file, err: errorMessage(e) });
        throw new TemplateReadError(file, { cause: e });
    }
}

export function loadTemplates(sources: TemplateSources): { item: ItemTemplate; page: PageTemplate } {
    return {
        item: ItemTemplate.compile(loadTemplateText('item', sources)),
        page: PageTemplate.compile(loadTemplateText('page', sources))
    };
}

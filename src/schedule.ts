import cron from 'node-cron';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('schedule');

/**
 * 刷新频率（秒）转换为 cron 表达式，按整分钟取整，至少 1 分钟；满一小时按小时
 */
export function refreshCron(frequencySec: number): string {
    const minutes = Math.max(1, Math.round(frequencySec / 60));
    if (minutes < 60) return `*/${minutes} * * * *`;
    const hours = Math.min(24, Math.round(minutes / 60));
    return hours >= 24 ? '0 0 * * *' : `0 */${hours} * * *`;
}

/** 定时刷新；上一轮未结束时跳过本轮 */
export function scheduleRefresh(frequencySec: number, refresh: () => Promise<unknown>) {
    let running = false;
    const expression = refreshCron(frequencySec);
    const task = cron.schedule(expression, () => {
        if (running) {
            logger.warn('refresh.skip', { reason: 'previous refresh still running' });
            return;
        }
        running = true;
        refresh()
            .catch((e) => logger.error('refresh.error', { err: errorMessage(e) }))
            .finally(() => { running = false; });
    });
    logger.info('refresh.scheduled', { expression });
    return task;
}

import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const loggers = new Set<winston.Logger>();
let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL || 'info') ?? 'info';
let logFile: string | undefined = process.env.LOG_FILE || undefined;

/**
 * 创建 Winston 日志器
 * 实现方式：开发态彩色控制台，生产态 JSON；注入模块名；可选追加日志文件
 */
export function createLogger(moduleName: string) {
	const { combine, timestamp, printf, colorize, json } = winston.format;
	const devFmt = combine(
		colorize(),
		timestamp(),
		printf((info) => `[${info.timestamp}] ${info.level} ${moduleName}: ${info.message} ${JSON.stringify({ ...info, level: undefined, message: undefined, timestamp: undefined, module: undefined })}`)
	);
	const logger = winston.createLogger({
		level: currentLevel,
		format: process.env.NODE_ENV === 'production' ? combine(timestamp(), json()) : devFmt,
		defaultMeta: { module: moduleName },
		transports: [new winston.transports.Console({ stderrLevels: [...LEVELS] })]
	});
	if (logFile) logger.add(fileTransport(logFile));
	loggers.add(logger);
	return logger;
}

/** 同步修改所有已创建日志器的等级 */
export function setLogLevel(level: LogLevel) {
	currentLevel = level;
	for (const logger of loggers) logger.level = level;
}

export function getLogLevel(): LogLevel {
	return currentLevel;
}

/**
 * 追加日志文件（对已创建与之后创建的日志器均生效）
 */
export function setLogFile(file: string) {
	if (logFile === file) return;
	logFile = file;
	for (const logger of loggers) logger.add(fileTransport(file));
}

/**
 * 解析日志等级
 * 接受 error/warn/info/debug（大小写不敏感）或 0-3（0 = error ... 3 = debug）
 */
export function parseLogLevel(input: string): LogLevel | undefined {
	const s = input.trim().toLowerCase();
	if (/^\d+$/.test(s)) return LEVELS[Number(s)];
	return LEVELS.find((l) => l === s);
}

function fileTransport(file: string) {
	const { combine, timestamp, json } = winston.format;
	return new winston.transports.File({ filename: file, format: combine(timestamp(), json()) });
}

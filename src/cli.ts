import { parseArgs } from 'node:util';
import { UsageError, errorMessage } from './errors.js';
import { parseLogLevel, type LogLevel } from './logger.js';

export type FeedCommand =
    | { name: 'feed'; action: 'list' }
    | { name: 'feed'; action: 'add' | 'remove'; url: string }
    | { name: 'feed'; action: 'import' | 'export'; file: string };

export type Command =
    | { name: 'dump'; file?: string; offline: boolean }
    | { name: 'serve'; port?: number; bind?: string }
    | FeedCommand
    | { name: 'help' };

export type CliArgs = {
    command: Command;
    verbosity?: LogLevel;
    itemTemplate?: string;
    pageTemplate?: string;
    config?: string;
};

export const USAGE = `Usage: feedpress [options] [command]

Aggregate RSS feeds into one timeline and render it as HTML.

Commands:
  dump, d [-f file] [--offline]   render the timeline to a file (default)
  serve, s [-p port] [-b bind]    serve the rendered timeline over HTTP
  feed list                       list subscribed feeds
  feed add <url>                  subscribe to a feed
  feed remove <url>               unsubscribe from a feed
  feed import <file>              import feeds from an OPML file
  feed export <file>              export feeds to an OPML file

Options:
  -v, --verbosity <level>   error|warn|info|debug or 0-3
  --item-template <path>    html template for a single item
  --page-template <path>    html template for the page around the items
  --config <path>           configuration file (YAML)
  -h, --help                show this help
`;

const OPTIONS = {
    verbosity: { type: 'string', short: 'v' },
    'item-template': { type: 'string' },
    'page-template': { type: 'string' },
    config: { type: 'string' },
    help: { type: 'boolean', short: 'h' },
    file: { type: 'string', short: 'f' },
    offline: { type: 'boolean' },
    port: { type: 'string', short: 'p' },
    bind: { type: 'string', short: 'b' }
} as const;

/**
 * 解析命令行；参数错误抛出 UsageError
 */
export function parseCli(argv: string[]): CliArgs {
    const { values, positionals } = parseRaw(argv);
    let verbosity: LogLevel | undefined;
    if (values.verbosity !== undefined) {
        verbosity = parseLogLevel(values.verbosity);
        if (!verbosity) throw new UsageError(`invalid verbosity '${values.verbosity}'`);
    }
    return {
        command: values.help ? { name: 'help' } : parseCommand(positionals, values),
        verbosity,
        itemTemplate: values['item-template'],
        pageTemplate: values['page-template'],
        config: values.config
    };
}

function parseRaw(argv: string[]) {
    try {
        return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
    } catch (e) {
        throw new UsageError(errorMessage(e));
    }
}

type CommandValues = { file?: string; offline?: boolean; port?: string; bind?: string };

function parseCommand(positionals: string[], values: CommandValues): Command {
    const [name = 'dump', ...rest] = positionals;
    switch (name) {
        case 'dump':
        case 'd':
            expectArity(name, rest, 0);
            return { name: 'dump', file: values.file, offline: values.offline ?? false };
        case 'serve':
        case 's':
            expectArity(name, rest, 0);
            return { name: 'serve', port: values.port === undefined ? undefined : parsePort(values.port), bind: values.bind };
        case 'feed':
            return parseFeedCommand(rest);
        default:
            throw new UsageError(`unknown command '${name}'`);
    }
}

function parseFeedCommand(rest: string[]): FeedCommand {
    const [action, ...args] = rest;
    switch (action) {
        case 'list':
            expectArity('feed list', args, 0);
            return { name: 'feed', action };
        case 'add':
        case 'remove':
            expectArity(`feed ${action}`, args, 1);
            return { name: 'feed', action, url: args[0] };
        case 'import':
        case 'export':
            expectArity(`feed ${action}`, args, 1);
            return { name: 'feed', action, file: args[0] };
        default:
            throw new UsageError(action ? `unknown feed action '${action}'` : 'missing feed action');
    }
}

function expectArity(command: string, args: string[], n: number) {
    if (args.length !== n) throw new UsageError(`'${command}' expects ${n} argument${n === 1 ? '' : 's'}, got ${args.length}`);
}

function parsePort(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1 || n > 65535) throw new UsageError(`invalid port '${value}'`);
    return n;
}

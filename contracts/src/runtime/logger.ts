/**
 * Structured logger for the sale runtime.
 *
 * - Levels: debug, info, warn, error
 * - ISO timestamp and component name on every line
 * - JSON lines when SALE_LOG_JSON=1, text otherwise
 * - bigint fields are written as decimal strings
 *
 * Environment:
 *   SALE_LOG_LEVEL = debug|info|warn|error (default: info)
 *   SALE_LOG_JSON  = 1 (default: text)
 *
 * Lines go to stderr so stdout stays free for program output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVEL_ORDER, value);
}

export interface Logger {
    debug(msg: string, data?: LogData): void;
    info(msg: string, data?: LogData): void;
    warn(msg: string, data?: LogData): void;
    error(msg: string, data?: LogData): void;
    child(component: string): Logger;
}

export interface LoggerOptions {
    level?: LogLevel;
    json?: boolean;
    write?: (line: string) => void;
}

function envLevel(): LogLevel {
    const raw: string = (process.env.SALE_LOG_LEVEL ?? 'info').toLowerCase();
    return isLogLevel(raw) ? raw : 'info';
}

function bigintReplacer(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? value.toString() : value;
}

function stderrWrite(line: string): void {
    process.stderr.write(line + '\n');
}

export function createLogger(component: string, options: LoggerOptions = {}): Logger {
    const minLevel: number = LEVEL_ORDER[options.level ?? envLevel()];
    const json: boolean = options.json ?? process.env.SALE_LOG_JSON === '1';
    const write: (line: string) => void = options.write ?? stderrWrite;

    const emit = (level: LogLevel, message: string, data?: LogData): void => {
        if (LEVEL_ORDER[level] < minLevel) return;

        const ts: string = new Date().toISOString();
        if (json) {
            const entry: LogData = { ts, level, component, msg: message };
            if (data) entry.data = data;
            write(JSON.stringify(entry, bigintReplacer));
            return;
        }

        const prefix: string = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]`;
        write(data ? `${prefix} ${message} ${JSON.stringify(data, bigintReplacer)}` : `${prefix} ${message}`);
    };

    return {
        debug: (msg, data) => emit('debug', msg, data),
        info: (msg, data) => emit('info', msg, data),
        warn: (msg, data) => emit('warn', msg, data),
        error: (msg, data) => emit('error', msg, data),
        child: (sub) => createLogger(`${component}:${sub}`, options),
    };
}

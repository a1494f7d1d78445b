// src/util/logger.ts

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export interface LoggerOptions {
    level?: LogLevel;
    /**
     * Optional prefix string (e.g. "[endpointgen]" or "[runner]").
     */
    prefix?: string;
}

/**
 * Minimal ANSI color helpers (no external deps).
 */
const supportsColor =
    typeof process !== 'undefined' &&
    process.stdout &&
    process.stdout.isTTY &&
    process.env.NO_COLOR !== '1';

type ColorFn = (text: string) => string;

function wrap(code: number): ColorFn {
    const open = `\u001b[${code}m`;
    const close = `\u001b[0m`;
    return (text: string) => (supportsColor ? `${open}${text}${close}` : text);
}

const color = {
    red: wrap(31),
    yellow: wrap(33),
    green: wrap(32),
    cyan: wrap(36),
    magenta: wrap(35),
    dim: wrap(2),
    bold: wrap(1),
    gray: wrap(90),
};

function colorForLevel(level: LogLevel): ColorFn {
    switch (level) {
        case 'error':
            return color.red;
        case 'warn':
            return color.yellow;
        case 'info':
            return color.cyan;
        case 'debug':
            return color.gray;
        default:
            return (s) => s;
    }
}

/**
 * Leveled logger with colored output.
 *
 * Children follow their parent's level until given one of their own.
 */
export class Logger {
    private level: LogLevel | undefined;
    private readonly prefix: string | undefined;
    private readonly parent: Logger | undefined;

    constructor(options: LoggerOptions = {}, parent?: Logger) {
        this.level = options.level ?? (parent ? undefined : 'info');
        this.prefix = options.prefix;
        this.parent = parent;
    }

    setLevel(level: LogLevel) {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level ?? this.parent?.getLevel() ?? 'info';
    }

    /**
     * Create a child logger with an additional prefix.
     */
    child(prefix: string): Logger {
        const combined = this.prefix ? `${this.prefix}${prefix}` : prefix;
        return new Logger({ prefix: combined }, this);
    }

    private formatMessage(msg: unknown, lvl: LogLevel): string {
        const text =
            typeof msg === 'string'
                ? msg
                : msg instanceof Error
                    ? msg.message
                    : String(msg);

        const levelColor = colorForLevel(lvl);
        const prefixColored = this.prefix
            ? color.magenta(this.prefix)
            : undefined;

        const textColored =
            lvl === 'debug' ? color.dim(text) : levelColor(text);

        if (prefixColored) {
            return `${prefixColored} ${textColored}`;
        }

        return textColored;
    }

    private shouldLog(targetLevel: LogLevel): boolean {
        const current = this.getLevel();
        if (current === 'silent') return false;
        return LOG_LEVELS.indexOf(targetLevel) <= LOG_LEVELS.indexOf(current);
    }

    error(msg: unknown, ...rest: unknown[]) {
        if (!this.shouldLog('error')) return;
        console.error(this.formatMessage(msg, 'error'), ...rest);
    }

    warn(msg: unknown, ...rest: unknown[]) {
        if (!this.shouldLog('warn')) return;
        console.warn(this.formatMessage(msg, 'warn'), ...rest);
    }

    info(msg: unknown, ...rest: unknown[]) {
        if (!this.shouldLog('info')) return;
        console.log(this.formatMessage(msg, 'info'), ...rest);
    }

    debug(msg: unknown, ...rest: unknown[]) {
        if (!this.shouldLog('debug')) return;
        console.debug(this.formatMessage(msg, 'debug'), ...rest);
    }
}

/**
 * Case-insensitive level lookup; undefined for unknown values.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    return LOG_LEVELS.find((level) => level === value?.trim().toLowerCase());
}

/**
 * Default process-wide logger used by CLI and core.
 * Level can be controlled via ENDPOINTGEN_LOG_LEVEL env.
 */
export const defaultLogger = new Logger({
    level: parseLogLevel(process.env.ENDPOINTGEN_LOG_LEVEL) ?? 'info',
    prefix: '[endpointgen]',
});
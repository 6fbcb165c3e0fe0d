import chalk from 'chalk';
import { BRAND, VERSION } from './constants.js';

/**
 * Log levels in increasing order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4,
    SUCCESS = 5,
}

/**
 * Maps string log level to LogLevel enum
 */
const LOG_LEVELS_MAP: Record<string, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    none: LogLevel.NONE,
    success: LogLevel.SUCCESS,
};

/**
 * Styles for different log levels
 */
const LOG_LEVEL_STYLES = {
    [LogLevel.DEBUG]: { symbol: '•', color: chalk.gray },
    [LogLevel.INFO]: { symbol: '•', color: chalk.blueBright },
    [LogLevel.WARN]: { symbol: '⚠', color: chalk.yellowBright },
    [LogLevel.ERROR]: { symbol: '✗', color: chalk.redBright },
    [LogLevel.NONE]: { symbol: '•', color: chalk.white },
    [LogLevel.SUCCESS]: { symbol: '✓', color: chalk.greenBright },
};

/**
 * Formats for different log levels
 */
export const LOG_FORMATS = {
    text: 'text',
    json: 'json',
} as const;
export type LogFormat = (typeof LOG_FORMATS)[keyof typeof LOG_FORMATS];

export interface LogMetadata {
    [key: string]: unknown;
}

export interface DrawTableOptions {
    title?: string;
    logLevel?: LogLevel;
    padding?: number;
}

export class Logger {
    // Load list of secret ENV variables that should be removed from the logs.
    // e.g.: process.env.LRT_SECRETS = 'API_KEY,SECRET_KEY' => [REDACTED_API_KEY]
    private secretKeys = process.env['LRT_SECRETS']?.split(',').filter(Boolean) || [];
    private secretValues = this.secretKeys.map((key) => process.env[key]);
    private secretValuePlaceholder = 'REDACTED';

    // Pattern to remove other sensitive values and keys, such as cookie, authorization, etc...
    // e.g. { cookie: 'session_id=1234567890' } => { cookie: '[REDACTED]' }
    private secretValuePattern = /(\b(?:\d[ -]*?){13,19}\b)/gi;
    private secretKeyPattern =
        /secret|token|access|authorization|api[_-]?key|session|auth|bearer|cookie|set[_-]?cookie|pwd|passwd|password|credential|private[_-]?key|signature|nonce/i;

    get format(): LogFormat {
        const envFormat = process.env.LOG_FORMAT?.toLowerCase();
        return envFormat === LOG_FORMATS.json ? LOG_FORMATS.json : LOG_FORMATS.text;
    }

    get level(): LogLevel {
        const envLevel = process.env.LOG_LEVEL?.toLowerCase();
        return envLevel && envLevel in LOG_LEVELS_MAP ? LOG_LEVELS_MAP[envLevel] : LogLevel.INFO;
    }

    /**
     * Debug level logging (lowest level)
     */
    public debug(message: string, metadata: LogMetadata = {}): void {
        this.logInternal(LogLevel.DEBUG, message, metadata);
    }

    public info(message: string, metadata: LogMetadata = {}): void {
        this.logInternal(LogLevel.INFO, message, metadata);
    }

    /**
     * Error level logging (highest level)
     */
    public error(message: string | Error, metadata: LogMetadata = {}): void {
        this.logInternal(LogLevel.ERROR, message, metadata);
    }

    /**
     * Success level logging for successful operations
     */
    public success(message: string, metadata: LogMetadata = {}): void {
        this.logInternal(LogLevel.SUCCESS, message, metadata);
    }

    /**
     * Log to stdout with INFO log level and no prefix.
     */
    public log(message: string, metadata: LogMetadata = {}): void {
        this.logInternal(LogLevel.INFO, message, metadata, false);
    }

    private logInternal(logLevel: LogLevel, message: unknown, metadata: LogMetadata = {}, addPrefix = logLevel != LogLevel.NONE): void {
        // Do not log if log level is less than the current log level
        if (logLevel < this.level) return;

        const formattedMessage = this.formatMessage(logLevel, this.stringify(message), metadata, addPrefix);
        const stdStream = logLevel === LogLevel.ERROR ? process.stderr : process.stdout;
        stdStream.write(`${formattedMessage}\r\n`);
    }

    /**
     * Formats objects to human readable string representation
     * and replaces circular references in objects.
     * e.g.: const obj = { key: 'value' }; obj.self = obj; => { key: 'value', self: '[CIRCULAR]' }
     */
    private stringify(message: unknown): string {
        if (typeof message === 'string') return message;
        if (message instanceof Error) return message.stack || message.toString();

        const seen = new WeakSet<object>();
        return JSON.stringify(
            message,
            (_key, value: unknown) => {
                if (typeof value === 'object' && value !== null) {
                    if (seen.has(value)) return '[CIRCULAR]';
                    seen.add(value);
                }
                return value;
            },
            2,
        );
    }

    /**
     * Helper function to format time consistently: HH:MM:SS AM/PM
     * or ISO string if json format is enabled
     */
    private getTimeStamp(): string {
        const now = new Date();
        if (this.format === LOG_FORMATS.json) {
            return now.toISOString();
        }
        const hours = now.getHours();
        const minutes = now.getMinutes().toString().padStart(2, '0');
        const seconds = now.getSeconds().toString().padStart(2, '0');
        const ampm = hours >= 12 ? 'PM' : 'AM';
        const hour12 = (hours % 12 || 12).toString().padStart(2, '0');
        return `${hour12}:${minutes}:${seconds} ${ampm}`;
    }

    formatMessage(logLevel: LogLevel, message: string = '', metadata: LogMetadata = {}, addPrefix = logLevel != LogLevel.NONE): string {
        if (this.format === LOG_FORMATS.json) {
            const level = logLevel <= LogLevel.NONE ? Object.keys(LOG_LEVELS_MAP)[logLevel].toUpperCase() : 'INFO';
            const timestamp = this.getTimeStamp();
            return JSON.stringify(
                this.hideSecrets({
                    type: 'lrt.log',
                    ...metadata,
                    message,
                    level,
                    timestamp,
                }),
            );
        }

        // Add message prefix to first line and padding to other lines
        const { symbol, color } = LOG_LEVEL_STYLES[logLevel] || LOG_LEVEL_STYLES[LogLevel.NONE];
        const messageLines = message.split('\n');
        const messagePrefix = addPrefix ? color(`${symbol} ${chalk.dim(this.getTimeStamp())}  `) : '';
        const messagePrefixPadding = messagePrefix ? ' '.repeat(15) : '';

        return messageLines
            .map((line, index) => {
                if (line.length === 0) return line;
                return index === 0 ? `${messagePrefix}${line}` : `${messagePrefixPadding}${line}`;
            })
            .join('\n');
    }

    /**
     * Draws "nice-looking" title to the console
     */
    public drawTitle(label: string = ''): void {
        this.log(`${chalk.bgBlueBright(' ')}${chalk.bgWhite.bold.blackBright(` ${BRAND} `)}${chalk.white.bgBlackBright(` v${VERSION} `)} ${chalk.gray(label)}`);
        this.log('');
    }

    /**
     * Draws a table to the console
     * @example
     *  ╭─ title ─────────────────────╮
     *  │ Upstream: http://127.0.0.1  │
     *  ╰─────────────────────────────╯
     */
    public drawTable(lines: string[], options: DrawTableOptions = {}): void {
        if (lines.length === 0) return;

        // Remove ANSI escape codes when calculating length
        const getVisibleLength = (str: string): number => str.replace(/\u001b\[[0-9;]*m/g, '').length;

        const padding = options.padding ?? 1;
        const logLevel = options.logLevel ?? LogLevel.INFO;
        const contentLines = lines.flatMap((line) => line.replace(/\r\n/g, '\n').split('\n'));
        const maxLength = Math.max(...contentLines.map(getVisibleLength));
        const totalWidth = maxLength + padding * 2;

        let topBorder = `╭${'─'.repeat(totalWidth)}╮`;
        if (options.title) {
            const title = ` ${options.title} `;
            const rightBorder = '─'.repeat(Math.max(0, totalWidth - getVisibleLength(title) - 2));
            topBorder = `╭──${chalk.bold(title)}${rightBorder}╮`;
        }
        const bottomBorder = `╰${'─'.repeat(totalWidth)}╯`;
        const body = contentLines.map((line) => `│${' '.repeat(padding)}${line}${' '.repeat(maxLength - getVisibleLength(line) + padding)}│`);

        const { color } = LOG_LEVEL_STYLES[logLevel] || LOG_LEVEL_STYLES[LogLevel.NONE];
        this.logInternal(logLevel, color([topBorder, ...body, bottomBorder].join('\n')));
    }

    hideSecrets(object: unknown): unknown {
        // No need to do anything for null/undefined/boolean/number
        if (object === null || object === undefined || typeof object === 'boolean' || typeof object === 'number') {
            return object;
        }

        // Remove ENV variables marked as secret from all the logs
        // e.g.: `My secret is ${process.env.API_KEY}` => "My secret is [REDACTED_API_KEY]"
        if (typeof object === 'string') {
            let result = object;
            this.secretValues.forEach((value, index) => {
                const key = this.secretKeys[index];
                if (!key || !value) return;
                result = result.replaceAll(value, `[${this.secretValuePlaceholder}_${key.toUpperCase()}]`);
            });
            return result.replace(this.secretValuePattern, `[${this.secretValuePlaceholder}]`);
        }

        if (Array.isArray(object)) {
            return object.map((item) => this.hideSecrets(item));
        }

        // Remove whole keys from objects that are considered sensitive
        // and run recursively on all values of the object
        // e.g.: { cookie: 'session_id=1234567890' } => { cookie: '[REDACTED]' }
        if (typeof object === 'object') {
            const result: Record<string, unknown> = {};
            for (const [key, value] of Object.entries(object)) {
                result[key] = this.secretKeyPattern.test(key.toLowerCase()) ? `[${this.secretValuePlaceholder}]` : this.hideSecrets(value);
            }
            return result;
        }

        return object;
    }
}

// Export a default instance for convenience
export const logger = new Logger();

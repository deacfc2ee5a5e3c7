/**
 * Logging for the orchestrator, on top of winston.
 *
 * Every module asks for a child logger tagged with its component name. The
 * shared root logger reads its defaults from the environment and can be
 * reconfigured once the CLI has parsed its options:
 *
 *   IMAGESMITH_LOG_LEVEL = error|warn|info|debug|silent (default: info)
 *   IMAGESMITH_LOG_JSON  = 1 for JSON lines instead of text
 */

import * as winston from 'winston';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggingOptions {
    level: LogLevel;
    json: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

function formatFor(json: boolean): winston.Logform.Format {
    if (json) {
        return winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.json(),
        );
    }
    return winston.format.combine(
        winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
        winston.format.errors({ stack: true }),
        winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
            const metaStr =
                Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
            return `${String(timestamp)} ${level.toUpperCase().padEnd(5)} [${String(component)}] ${String(message)}${metaStr}`;
        }),
    );
}

function optionsFromEnv(env: NodeJS.ProcessEnv): LoggingOptions {
    const level = (env.IMAGESMITH_LOG_LEVEL ?? 'info').toLowerCase();
    return {
        level: isLogLevel(level) ? level : 'info',
        json: env.IMAGESMITH_LOG_JSON === '1',
    };
}

function createRoot(options: LoggingOptions): winston.Logger {
    return winston.createLogger({
        level: options.level === 'silent' ? 'error' : options.level,
        silent: options.level === 'silent',
        format: formatFor(options.json),
        // Logs go to stderr so stdout stays free for plans and Dockerfiles
        transports: [
            new winston.transports.Console({
                stderrLevels: ['error', 'warn', 'info', 'debug'],
            }),
        ],
    });
}

const root = createRoot(optionsFromEnv(process.env));

/**
 * Apply options to the shared logger; existing child loggers follow.
 */
export function configureLogging(options: Partial<LoggingOptions>): void {
    if (options.level !== undefined) {
        root.silent = options.level === 'silent';
        if (options.level !== 'silent') {
            root.level = options.level;
        }
    }
    if (options.json !== undefined) {
        root.format = formatFor(options.json);
    }
}

export type Logger = winston.Logger;

export function createLogger(component: string): Logger {
    return root.child({ component });
}

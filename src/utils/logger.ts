import winston from 'winston';

export type LogMeta = Record<string, unknown>;

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function resolveLevel(value: string | undefined): LogLevel {
    const level = LOG_LEVELS.find((candidate) => candidate === value?.toLowerCase());
    return level ?? 'info';
}

/**
 * Serializes Error objects in metadata so they survive JSON formatting.
 */
const errorFields = winston.format((info) => {
    if (info.error instanceof Error) {
        info.error = {
            name: info.error.name,
            message: info.error.message,
            stack: info.error.stack
        };
    }
    return info;
});

const prettyFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
    const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${rest}`;
});

export const logger = winston.createLogger({
    level: resolveLevel(process.env.LOG_LEVEL),
    silent: process.env.LOG_LEVEL === 'silent',
    defaultMeta: { service: 'reversi-engine' },
    format: winston.format.combine(
        winston.format.timestamp(),
        errorFields(),
        process.env.LOG_FORMAT === 'pretty'
            ? winston.format.combine(winston.format.colorize(), prettyFormat)
            : winston.format.json()
    ),
    // Logs go to stderr so they never mix with boards printed on stdout
    transports: [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })]
});

/**
 * Gets a logger that tags every entry with a component name
 */
export function childLogger(component: string): winston.Logger {
    return logger.child({ component });
}

import {
    type DestinationStream,
    type Logger,
    type LoggerOptions,
    pino,
} from 'pino';

import { config } from '../config';

export const LOG_LEVELS = [
    'trace',
    'debug',
    'info',
    'warn',
    'error',
    'fatal',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
    level: LogLevel | 'silent';
    format: 'json' | 'pretty';
    redactSensitive: boolean;
}

// Key material and tokens must never reach a log line.
const REDACT_PATHS = [
    'secret',
    'privateKey',
    'token',
    '*.secret',
    '*.privateKey',
    '*.token',
    'signers[*].secret',
    'signers[*].privateKey',
];

/**
 * Creates a pino logger. `pretty` output goes through a pino-pretty
 * transport, so `destination` only applies to `json`.
 */
export function createLogger(
    options: LoggerConfig,
    destination?: DestinationStream
): Logger {
    const loggerOptions: LoggerOptions = {
        level: options.level,
        base: { service: 'tokenward', version: config.version },
        ...(options.redactSensitive && {
            redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
        }),
        ...(options.format === 'pretty' && {
            transport: {
                target: 'pino-pretty',
                options: { colorize: true, translateTime: 'SYS:standard' },
            },
        }),
    };

    return destination && options.format === 'json'
        ? pino(loggerOptions, destination)
        : pino(loggerOptions);
}

function levelFromEnv(): LoggerConfig['level'] {
    if (config.isTest) {
        return 'silent';
    }
    const level = LOG_LEVELS.find((name) => name === process.env.LOG_LEVEL);
    return level ?? 'info';
}

export let logger = createLogger({
    level: levelFromEnv(),
    format: process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json',
    redactSensitive: true,
});

/**
 * Replaces the shared logger, typically with the loaded `logging` section.
 * Modules importing `logger` see the replacement.
 */
export function configureLogger(options: LoggerConfig): Logger {
    logger = createLogger(options);
    return logger;
}

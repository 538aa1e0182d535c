import pino, { type Logger, type LoggerOptions } from 'pino';
import type { AppConfig } from './config';

export type AppLogger = Logger;

export function createLogger(config: Pick<AppConfig, 'nodeEnv' | 'logLevel'>): AppLogger {
    const baseOptions: LoggerOptions = {
        level: config.logLevel,
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
    };

    if (config.nodeEnv === 'development') {
        return pino({
            ...baseOptions,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return pino({
        ...baseOptions,
        base: {
            service: 'receipt-points-service',
            env: config.nodeEnv,
        },
    });
}

export function logError(log: AppLogger, error: unknown, context?: Record<string, unknown>) {
    const err = error instanceof Error ? error : new Error(String(error));
    log.error({
        event: 'error',
        error: {
            name: err.name,
            message: err.message,
            stack: err.stack,
        },
        ...context,
    }, err.message);
}

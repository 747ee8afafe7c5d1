import pino, { type Logger } from 'pino';

export interface LoggerOptions {
    level?: string;
    pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const { level = 'info', pretty = true } = options;

    if (!pretty) {
        return pino({ level });
    }

    return pino({
        level,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
            },
        },
    });
}

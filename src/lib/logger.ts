import { AsyncLocalStorage } from "node:async_hooks";
import winston, { type LoggerOptions } from "winston";

type LoggingAsyncStorage = { channel: string };

const exceptionFormat = winston.format(
    (info) => {
        const err = info.err ?? info.error ?? info.exception;
        if (err instanceof Error) {
            info.err_message = (err.stack ?? `${ err.name ?? "Error" }: ${ err.message }`);
            info.err_cause = err.cause instanceof Error ? err.cause.message : err.cause;
        } else if (err !== null && err !== undefined) {
            info.err_message = String(err);
        }
        return info;
    });

export function getLogChannel(): string | undefined {
    return asyncLocalStorage.getStore()?.channel;
}

const channelFormat = winston.format((info) => {
    const channel = getLogChannel();
    if (channel) {
        info.channel = channel;
    }
    return info;
});

const outputFormat = winston.format.printf((info) => {
    const result = `[${ info.level }]${ info.channel ? `[${ info.channel }]` : "" } ` +
        `${ info.timestamp ? `${ info.timestamp } ` : "" }` +
        `${ info.message }` +
        `${ info.err_message ? `\n${ info.err_message }` : "" }` +
        `${ info.err_cause ? `\nCaused by: ${ info.err_cause }` : "" }`;
    const resultArray = result.split('\n');
    return resultArray.map((line, index) => index === 0 ? line : '    ' + line).join('\n');
});

const asyncLocalStorage = new AsyncLocalStorage<LoggingAsyncStorage>();

/**
 * Runs `fn` with every log line it produces tagged by the channel name.
 */
export function withLogChannel<T>(channel: string, fn: () => Promise<T>): Promise<T> {
    return asyncLocalStorage.run({ channel }, fn);
}

export type LogLevel = "error" | "warn" | "info" | "verbose" | "debug";

export function isLogLevel(level: string | undefined): level is LogLevel {
    return level === "error" || level === "warn" || level === "info" || level === "verbose" || level === "debug";
}

export function setLogLevel(level: LogLevel): void {
    logger.level = level;
}

const defaultLevel: LogLevel = process.env.NODE_ENV === "production" ? "info" : "debug";
const level = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : defaultLevel;

export const colorize = winston.format.colorize({ level: true });

const loggerOpts: LoggerOptions = {
    level: level,
    transports: [
        new winston.transports.Console({
            format: winston.format.combine(
                channelFormat(),
                exceptionFormat(),
                winston.format(info => {
                    info.level = info.level.toUpperCase()
                    return info;
                })(),
                winston.format.timestamp(),
                winston.format.splat(),
                colorize,
                outputFormat
            )
        })
    ]
};

const logger = winston.createLogger(loggerOpts);

export default logger;

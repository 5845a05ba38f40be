/**
 * Console logger with bracketed component tags, e.g. `[TaskEngine] message`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

export interface HostLogger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
    /** Logger for a sub-component, tagged `[parent:child]` */
    child(tag: string): HostLogger;
}

export function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

export class ConsoleLogger implements HostLogger {
    private prefix: string;

    constructor(
        private readonly tag: string,
        private readonly level: LogLevel = 'info'
    ) {
        this.prefix = `[${tag}]`;
    }

    debug(message: string, ...args: unknown[]): void {
        if (this.enabled('debug')) console.debug(this.prefix, message, ...args);
    }

    info(message: string, ...args: unknown[]): void {
        if (this.enabled('info')) console.info(this.prefix, message, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        if (this.enabled('warn')) console.warn(this.prefix, message, ...args);
    }

    error(message: string, ...args: unknown[]): void {
        if (this.enabled('error')) console.error(this.prefix, message, ...args);
    }

    child(tag: string): HostLogger {
        return new ConsoleLogger(`${this.tag}:${tag}`, this.level);
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }
}

/**
 * Logger that drops everything (used by tests)
 */
export const silentLogger: HostLogger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => silentLogger,
};

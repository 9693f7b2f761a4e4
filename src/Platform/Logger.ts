import type { ILogger, LogLevel } from './Ports.js';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'silent'];

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, silent: 3 };

export function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Writes `[Odds:<Component>] message` lines to the console.
 */
export class ConsoleLogger implements ILogger {
    public debug(component: string, message: string): void {
        console.debug(format(component, message));
    }

    public info(component: string, message: string): void {
        console.log(format(component, message));
    }

    public warn(component: string, message: string): void {
        console.warn(format(component, message));
    }
}

/**
 * Forwards to `target` only the messages at or above `level`.
 */
export class LevelFilter implements ILogger {
    constructor(private readonly target: ILogger, private readonly level: LogLevel) { }

    public debug(component: string, message: string): void {
        if (this.enabled('debug')) this.target.debug(component, message);
    }

    public info(component: string, message: string): void {
        if (this.enabled('info')) this.target.info(component, message);
    }

    public warn(component: string, message: string): void {
        if (this.enabled('warn')) this.target.warn(component, message);
    }

    private enabled(level: LogLevel): boolean {
        return RANK[level] >= RANK[this.level];
    }
}

function format(component: string, message: string): string {
    return `[Odds:${component}] ${message}`;
}

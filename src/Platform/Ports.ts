
/**
 * Environment Port: Entropy Source
 * Supplies raw bytes for seeding non-reproducible streams.
 * Swapped for a fixed source in tests.
 */
export interface IEntropySource {
    generateBytes(count: number): Uint8Array;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'silent';

/**
 * Diagnostics Port: Logger
 * Receives component-tagged messages. Never consulted on the draw path.
 */
export interface ILogger {
    debug(component: string, message: string): void;
    info(component: string, message: string): void;
    warn(component: string, message: string): void;
}

import { ErrorCode, OddsError } from '../Errors.js';
import { SystemEntropySource } from '../L0/Entropy.js';
import type { SamplingMethod } from '../L2/Sampler.js';
import { ConsoleLogger, isLogLevel, LevelFilter } from './Logger.js';
import type { IEntropySource, ILogger, LogLevel } from './Ports.js';

export interface OddsConfig {
    /** Rejection scheme used when a call does not name one. */
    sampling: SamplingMethod;
    /** Seeds every stream that is not given an explicit seed. */
    entropy: IEntropySource;
    logger: ILogger;
    logLevel: LogLevel;
}

export const SAMPLING_METHODS: readonly SamplingMethod[] = ['multiply', 'modulo'];

function isSamplingMethod(value: string): value is SamplingMethod {
    return (SAMPLING_METHODS as readonly string[]).includes(value);
}

/**
 * Reads ODDS_SAMPLING and ODDS_LOG_LEVEL; unset variables fall back to defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): OddsConfig {
    const config: OddsConfig = {
        sampling: 'multiply',
        entropy: new SystemEntropySource(),
        logger: new ConsoleLogger(),
        logLevel: 'warn'
    };

    const sampling = env.ODDS_SAMPLING;
    if (sampling !== undefined && sampling !== '') {
        if (!isSamplingMethod(sampling)) {
            throw new OddsError(ErrorCode.INVALID_CONFIG, `ODDS_SAMPLING must be one of ${SAMPLING_METHODS.join(', ')}`, { value: sampling });
        }
        config.sampling = sampling;
    }

    const level = env.ODDS_LOG_LEVEL;
    if (level !== undefined && level !== '') {
        if (!isLogLevel(level)) {
            throw new OddsError(ErrorCode.INVALID_CONFIG, `ODDS_LOG_LEVEL must be one of debug, info, warn, silent`, { value: level });
        }
        config.logLevel = level;
    }

    return config;
}

let current: OddsConfig = loadConfigFromEnv();
let log: ILogger = new LevelFilter(current.logger, current.logLevel);

export function getConfig(): Readonly<OddsConfig> {
    return current;
}

function hasMethods(value: object, names: readonly string[]): boolean {
    return names.every((name) => typeof Reflect.get(value, name) === 'function');
}

/**
 * Merges `patch` into the active configuration. Keys left undefined keep their current value.
 * Nothing changes unless the merged result is valid.
 * Streams already created keep their state; only later bootstraps see a new entropy source.
 */
export function configure(patch: Partial<OddsConfig>): Readonly<OddsConfig> {
    const next: OddsConfig = {
        sampling: patch.sampling ?? current.sampling,
        entropy: patch.entropy ?? current.entropy,
        logger: patch.logger ?? current.logger,
        logLevel: patch.logLevel ?? current.logLevel
    };
    if (!isSamplingMethod(next.sampling)) {
        throw new OddsError(ErrorCode.INVALID_CONFIG, `Unknown sampling method: ${String(next.sampling)}`, { value: String(next.sampling) });
    }
    if (!isLogLevel(next.logLevel)) {
        throw new OddsError(ErrorCode.INVALID_CONFIG, `Unknown log level: ${String(next.logLevel)}`, { value: String(next.logLevel) });
    }
    if (!hasMethods(next.entropy, ['generateBytes'])) {
        throw new OddsError(ErrorCode.INVALID_CONFIG, 'Entropy source must implement generateBytes()');
    }
    if (!hasMethods(next.logger, ['debug', 'info', 'warn'])) {
        throw new OddsError(ErrorCode.INVALID_CONFIG, 'Logger must implement debug(), info() and warn()');
    }
    current = next;
    log = new LevelFilter(current.logger, current.logLevel);
    log.info('Config', `sampling=${current.sampling} logLevel=${current.logLevel}`);
    return current;
}

export function resetConfig(): Readonly<OddsConfig> {
    current = loadConfigFromEnv();
    log = new LevelFilter(current.logger, current.logLevel);
    return current;
}

/** Logger honouring the configured level. */
export function logger(): ILogger {
    return log;
}

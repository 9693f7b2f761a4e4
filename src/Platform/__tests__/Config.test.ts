import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { configure, getConfig, loadConfigFromEnv, logger, resetConfig, type OddsConfig } from '../Config.js';
import { ConsoleLogger, LevelFilter } from '../Logger.js';
import { SystemEntropySource } from '../../L0/Entropy.js';
import { ErrorCode, OddsError } from '../../Errors.js';
import { CountingEntropySource, RecordingLogger } from '../../__tests__/helpers/Fixtures.js';

function expectConfigError(patch: Partial<OddsConfig>, detail: string, metadata?: Record<string, unknown>): void {
    try {
        configure(patch);
        throw new Error('expected rejection');
    } catch (e) {
        expect(e).toBeInstanceOf(OddsError);
        expect(e instanceof OddsError && e.code).toBe(ErrorCode.INVALID_CONFIG);
        expect(e instanceof Error && e.message).toBe(`[Odds:INVALID_CONFIG] ${detail}`);
        if (metadata !== undefined) {
            expect(e instanceof OddsError && e.metadata).toEqual(metadata);
        }
    }
}

describe('Configuration', () => {

    afterEach(() => {
        resetConfig();
        jest.restoreAllMocks();
    });

    it('defaults to the multiply sampler, system entropy and warn-level console logging', () => {
        const config = loadConfigFromEnv({});
        expect(config.sampling).toBe('multiply');
        expect(config.logLevel).toBe('warn');
        expect(config.entropy).toBeInstanceOf(SystemEntropySource);
        expect(config.logger).toBeInstanceOf(ConsoleLogger);
    });

    it('reads ODDS_SAMPLING and ODDS_LOG_LEVEL', () => {
        const config = loadConfigFromEnv({ ODDS_SAMPLING: 'modulo', ODDS_LOG_LEVEL: 'debug' });
        expect(config.sampling).toBe('modulo');
        expect(config.logLevel).toBe('debug');
    });

    it('ignores empty variables', () => {
        expect(loadConfigFromEnv({ ODDS_SAMPLING: '', ODDS_LOG_LEVEL: '' }).sampling).toBe('multiply');
    });

    it('rejects unknown values from the environment', () => {
        expect(() => loadConfigFromEnv({ ODDS_SAMPLING: 'fast' })).toThrow(
            '[Odds:INVALID_CONFIG] ODDS_SAMPLING must be one of multiply, modulo'
        );
        try {
            loadConfigFromEnv({ ODDS_LOG_LEVEL: 'trace' });
            throw new Error('expected rejection');
        } catch (e) {
            expect(e).toBeInstanceOf(OddsError);
            if (e instanceof OddsError) {
                expect(e.code).toBe(ErrorCode.INVALID_CONFIG);
                expect(e.metadata).toEqual({ value: 'trace' });
            }
        }
    });

    it('configure merges a partial patch and announces it at info level', () => {
        const log = new RecordingLogger();
        configure({ logger: log, logLevel: 'info' });
        configure({ sampling: 'modulo' });
        expect(getConfig().sampling).toBe('modulo');
        expect(getConfig().logger).toBe(log);
        expect(log.lines).toEqual([
            'info Config: sampling=multiply logLevel=info',
            'info Config: sampling=modulo logLevel=info'
        ]);
    });

    it('configure keeps the current value for keys passed as undefined', () => {
        const log = new RecordingLogger();
        const source = new CountingEntropySource();
        configure({ logger: log, entropy: source, logLevel: 'info' });
        configure({ logger: undefined, entropy: undefined, sampling: 'modulo' });
        expect(getConfig().logger).toBe(log);
        expect(getConfig().entropy).toBe(source);
        expect(log.lines).toEqual([
            'info Config: sampling=multiply logLevel=info',
            'info Config: sampling=modulo logLevel=info'
        ]);
    });

    it('configure rejects an unknown sampling method and keeps the previous config', () => {
        const before = configure({ logger: new RecordingLogger() });
        const patch: Partial<OddsConfig> = JSON.parse('{"sampling":"fast"}');
        expectConfigError(patch, 'Unknown sampling method: fast', { value: 'fast' });
        expect(getConfig()).toBe(before);
        expect(getConfig().sampling).toBe('multiply');
    });

    it('configure rejects an unknown log level and keeps the previous config', () => {
        const log = new RecordingLogger();
        const before = configure({ logger: log, logLevel: 'info' });
        const patch: Partial<OddsConfig> = JSON.parse('{"logLevel":"trace"}');
        expectConfigError(patch, 'Unknown log level: trace', { value: 'trace' });
        expect(getConfig()).toBe(before);
        logger().info('Test', 'still routed');
        expect(log.lines).toEqual([
            'info Config: sampling=multiply logLevel=info',
            'info Test: still routed'
        ]);
    });

    it('configure rejects an entropy source or logger without the required methods', () => {
        const before = getConfig();
        const entropy: Partial<OddsConfig> = JSON.parse('{"entropy":{}}');
        const log: Partial<OddsConfig> = JSON.parse('{"logger":{"warn":null}}');
        expectConfigError(entropy, 'Entropy source must implement generateBytes()');
        expectConfigError(log, 'Logger must implement debug(), info() and warn()');
        expect(getConfig()).toBe(before);
    });

    it('the shared logger honours the configured level', () => {
        const log = new RecordingLogger();
        configure({ logger: log, logLevel: 'warn' });
        logger().debug('Test', 'hidden');
        logger().info('Test', 'hidden');
        logger().warn('Test', 'shown');
        expect(log.lines).toEqual(['warn Test: shown']);
    });

    it('resetConfig restores the environment defaults', () => {
        configure({ sampling: 'modulo', logger: new RecordingLogger() });
        resetConfig();
        expect(getConfig()).toEqual(loadConfigFromEnv());
    });
});

describe('Logging', () => {

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('ConsoleLogger tags lines with the component', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const info = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const out = new ConsoleLogger();
        out.warn('Context', 'careful');
        out.info('Config', 'changed');
        expect(warn).toHaveBeenCalledWith('[Odds:Context] careful');
        expect(info).toHaveBeenCalledWith('[Odds:Config] changed');
    });

    it('LevelFilter silent drops everything', () => {
        const log = new RecordingLogger();
        const filter = new LevelFilter(log, 'silent');
        filter.debug('A', 'x');
        filter.info('A', 'x');
        filter.warn('A', 'x');
        expect(log.lines).toEqual([]);
    });

    it('LevelFilter debug passes everything', () => {
        const log = new RecordingLogger();
        const filter = new LevelFilter(log, 'debug');
        filter.debug('A', 'one');
        filter.info('A', 'two');
        filter.warn('A', 'three');
        expect(log.lines).toEqual(['debug A: one', 'info A: two', 'warn A: three']);
    });
});

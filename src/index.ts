import type { RandomStream } from './L1/Xoshiro256.js';

export { ErrorCode, OddsError } from './Errors.js';
export type { Bound, Guard, GuardResult, Seed } from './L0/Guards.js';
export { BoundGuard, enforce, FixedBoundGuard, SeedGuard, StateGuard } from './L0/Guards.js';
export type { StateWords, Uint64 } from './L0/Primitives.js';
export { entropySeed, SystemEntropySource } from './L0/Entropy.js';
export { mixSeed, SplitMix64 } from './L1/SplitMix64.js';
export { FALLBACK_STATE, INITIAL_STATE, Xoshiro256 } from './L1/Xoshiro256.js';
export type { RandomStream } from './L1/Xoshiro256.js';
export { createBoundedSampler, uniformBounded } from './L2/Sampler.js';
export type { BoundedSampler, SamplingMethod } from './L2/Sampler.js';
export { defaultStream, resetDefaultStream, runWithStream, seedStream } from './L3/Context.js';
export {
    oneIn, oneInFixed, PRESETS,
    p2, p3, p4, p5, p6, p8, p10, p12, p16, p20, p25, p30, p50, p60, p100, p128, p256,
    oneIn2, oneIn5, oneIn10, oneIn25, oneIn50, oneIn100
} from './L4/Odds.js';
export type { OddsCheck, PresetDenominator } from './L4/Odds.js';
export { configure, getConfig, loadConfigFromEnv, resetConfig, SAMPLING_METHODS } from './Platform/Config.js';
export type { OddsConfig } from './Platform/Config.js';
export { ConsoleLogger, LevelFilter } from './Platform/Logger.js';
export type { IEntropySource, ILogger, LogLevel } from './Platform/Ports.js';

// --- Stream-first call surface ---

export function next64(stream: RandomStream): bigint {
    return stream.next64();
}

export function next32(stream: RandomStream): number {
    return stream.next32();
}

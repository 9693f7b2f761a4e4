/**
 * Odds: "1 in N" probability checks
 *
 * oneIn(N) is true with probability exactly 1/N. N <= 1 is certain and
 * consumes no draw. Fixed checks resolve their sampler once and are
 * draw-for-draw identical to oneIn(stream, N).
 */
import { enforce, FixedBoundGuard, toBound64, type Bound } from '../L0/Guards.js';
import { ErrorCode, OddsError } from '../Errors.js';
import { Xoshiro256, type RandomStream } from '../L1/Xoshiro256.js';
import { createBoundedSampler, type BoundedSampler, type SamplingMethod } from '../L2/Sampler.js';
import { defaultStream } from '../L3/Context.js';
import { getConfig } from '../Platform/Config.js';

function check(stream: RandomStream, bound: Bound, method?: SamplingMethod): boolean {
    const b = toBound64(bound);
    if (b <= 1n) return true;
    return createBoundedSampler(b, method)(stream) === 0n;
}

export function oneIn(bound: Bound): boolean;
export function oneIn(stream: RandomStream, bound: Bound, method?: SamplingMethod): boolean;
export function oneIn(streamOrBound: RandomStream | Bound, bound?: Bound, method?: SamplingMethod): boolean {
    if (streamOrBound instanceof Xoshiro256) {
        if (bound === undefined) {
            throw new OddsError(ErrorCode.INVALID_BOUND, 'oneIn(stream, bound) requires a bound');
        }
        return check(streamOrBound, bound, method);
    }
    const b = toBound64(streamOrBound);
    return check(defaultStream(), b);
}

/** A check with a fixed denominator, callable as a plain value. */
export interface OddsCheck {
    (stream?: RandomStream): boolean;
    readonly bound: Bound;
}

/**
 * Builds a check for a fixed `bound` (>= 1). Without `method`, the configured
 * sampling method is read on each call; both variants are prepared up front.
 */
export function oneInFixed(bound: Bound, method?: SamplingMethod): OddsCheck {
    enforce(FixedBoundGuard, bound);
    const b = BigInt(bound);

    if (b === 1n) {
        return Object.assign(() => true, { bound });
    }

    const samplers: Record<SamplingMethod, BoundedSampler> = {
        multiply: createBoundedSampler(b, 'multiply'),
        modulo: createBoundedSampler(b, 'modulo')
    };

    const fixed = (stream: RandomStream = defaultStream()): boolean =>
        samplers[method ?? getConfig().sampling](stream) === 0n;

    return Object.assign(fixed, { bound });
}

// --- Presets ---

export const p2 = oneInFixed(2);
export const p3 = oneInFixed(3);
export const p4 = oneInFixed(4);
export const p5 = oneInFixed(5);
export const p6 = oneInFixed(6);
export const p8 = oneInFixed(8);
export const p10 = oneInFixed(10);
export const p12 = oneInFixed(12);
export const p16 = oneInFixed(16);
export const p20 = oneInFixed(20);
export const p25 = oneInFixed(25);
export const p30 = oneInFixed(30);
export const p50 = oneInFixed(50);
export const p60 = oneInFixed(60);
export const p100 = oneInFixed(100);
export const p128 = oneInFixed(128);
export const p256 = oneInFixed(256);

export const PRESETS = Object.freeze({
    2: p2, 3: p3, 4: p4, 5: p5, 6: p6, 8: p8, 10: p10, 12: p12,
    16: p16, 20: p20, 25: p25, 30: p30, 50: p50, 60: p60,
    100: p100, 128: p128, 256: p256
});

export type PresetDenominator = keyof typeof PRESETS;

// Named wrappers over the default stream
export const oneIn2 = (): boolean => p2();
export const oneIn5 = (): boolean => p5();
export const oneIn10 = (): boolean => p10();
export const oneIn25 = (): boolean => p25();
export const oneIn50 = (): boolean => p50();
export const oneIn100 = (): boolean => p100();

// src/L2/Sampler.ts
import { toBound64, type Bound } from '../L0/Guards.js';
import { isPowerOfTwo, mask64, UINT64_BITS, UINT64_MAX, type Uint64 } from '../L0/Primitives.js';
import type { RandomStream } from '../L1/Xoshiro256.js';
import { getConfig } from '../Platform/Config.js';

/**
 * 'multiply': 128-bit product with a low-word threshold (Lemire).
 * 'modulo':   reject above the largest multiple of the bound, then take the remainder.
 * Both are exactly uniform; they consume draws differently.
 */
export type SamplingMethod = 'multiply' | 'modulo';

/** Draws a uniform value in [0, bound) from `stream`. */
export type BoundedSampler = (stream: RandomStream) => Uint64;

/**
 * Resolves every per-bound decision once: degenerate bound, power-of-two mask,
 * or the rejection limit for the chosen method.
 */
export function createBoundedSampler(bound: Bound, method: SamplingMethod = getConfig().sampling): BoundedSampler {
    const b = toBound64(bound);

    if (b === 0n) {
        return () => 0n;
    }

    if (isPowerOfTwo(b)) {
        const mask = b - 1n;
        return (stream) => stream.next64() & mask;
    }

    if (method === 'modulo') {
        const limit = (UINT64_MAX / b) * b;
        return (stream) => {
            for (;;) {
                const x = stream.next64();
                if (x < limit) return x % b;
            }
        };
    }

    // 2^64 mod b, computed with wraparound
    const threshold = mask64(-b) % b;
    return (stream) => {
        for (;;) {
            const m = stream.next64() * b;
            if (mask64(m) >= threshold) return m >> UINT64_BITS;
        }
    };
}

/**
 * Unbiased integer in [0, bound). `bound = 0` returns 0 without drawing.
 * The result has the same type as `bound`.
 */
export function uniformBounded(stream: RandomStream, bound: number, method?: SamplingMethod): number;
export function uniformBounded(stream: RandomStream, bound: bigint, method?: SamplingMethod): bigint;
export function uniformBounded(stream: RandomStream, bound: Bound, method?: SamplingMethod): number | bigint;
export function uniformBounded(stream: RandomStream, bound: Bound, method?: SamplingMethod): number | bigint {
    const value = createBoundedSampler(bound, method)(stream);
    return typeof bound === 'number' ? Number(value) : value;
}

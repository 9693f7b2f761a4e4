/**
 * Xoshiro256: Core Generator
 *
 * xoshiro256** (Blackman & Vigna): 256 bits of state, 64-bit output,
 * period 2^256 - 1. Not suitable where an adversary can observe output.
 *
 * The state lives in a BigUint64Array so every store wraps modulo 2^64.
 * A stream owns its array; nothing else holds a reference to it.
 */
import { toStateWords, type Seed } from '../L0/Guards.js';
import { isZeroState, mask64, rotl64, UINT32_SHIFT, type StateWords, type Uint64 } from '../L0/Primitives.js';
import { mixSeed } from './SplitMix64.js';

/** Substituted whenever a load would leave the state all-zero. */
export const FALLBACK_STATE: StateWords = [
    0x9E3779B97F4A7C15n,
    0xBF58476D1CE4E5B9n,
    0x94D049BB133111EBn,
    0xD1B54A32D192ED03n
];

/** State of a generator constructed without a seed. */
export const INITIAL_STATE: StateWords = [
    0x123456789ABCDEF0n,
    0xCAFEBABEDEADC0DEn,
    0x0F1E2D3C4B5A6978n,
    0x1122334455667788n
];

const FLOAT_SHIFT = 11n; // 64 - 53 mantissa bits
const FLOAT_SCALE = 2 ** -53;

export class Xoshiro256 {
    private readonly s = new BigUint64Array(4);

    constructor(seed?: Seed) {
        if (seed === undefined) {
            this.load(INITIAL_STATE);
        } else {
            this.reseed(seed);
        }
    }

    public static fromState(words: readonly bigint[]): Xoshiro256 {
        const rng = new Xoshiro256();
        rng.restore(words);
        return rng;
    }

    /**
     * Next 64-bit word. Advances the state by one step.
     */
    public next64(): Uint64 {
        const s = this.s;
        const result = mask64(rotl64(mask64(s[1] * 5n), 7) * 9n);
        const t = s[1] << 17n;

        s[2] ^= s[0];
        s[3] ^= s[1];
        s[1] ^= s[2];
        s[0] ^= s[3];

        s[2] ^= mask64(t);
        s[3] = rotl64(s[3], 45);

        return result;
    }

    /**
     * Upper half of one 64-bit draw.
     */
    public next32(): number {
        return Number(this.next64() >> UINT32_SHIFT);
    }

    /**
     * Double in [0, 1) built from the top 53 bits of one draw.
     */
    public nextFloat(): number {
        return Number(this.next64() >> FLOAT_SHIFT) * FLOAT_SCALE;
    }

    /**
     * Replaces the whole state with the mixed expansion of `seed`.
     */
    public reseed(seed: Seed): void {
        this.load(mixSeed(seed));
    }

    public snapshot(): StateWords {
        return [this.s[0], this.s[1], this.s[2], this.s[3]] as const;
    }

    public restore(words: readonly bigint[]): void {
        this.load(toStateWords(words));
    }

    /**
     * Independent copy at the same position. Draws on either side do not affect the other.
     */
    public clone(): Xoshiro256 {
        return Xoshiro256.fromState(this.snapshot());
    }

    private load(words: StateWords): void {
        const source = isZeroState(words) ? FALLBACK_STATE : words;
        this.s[0] = source[0];
        this.s[1] = source[1];
        this.s[2] = source[2];
        this.s[3] = source[3];
    }
}

/** A stream handle is one exclusively owned generator. */
export type RandomStream = Xoshiro256;

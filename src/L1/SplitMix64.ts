import { toSeed64, type Seed } from '../L0/Guards.js';
import { mask64, type StateWords, type Uint64 } from '../L0/Primitives.js';

const GOLDEN_GAMMA: Uint64 = 0x9E3779B97F4A7C15n;
const MIX_1: Uint64 = 0xBF58476D1CE4E5B9n;
const MIX_2: Uint64 = 0x94D049BB133111EBn;

/**
 * SplitMix64: Seed Mixer
 *
 * Weyl-sequence increment followed by an xor-shift/multiply avalanche.
 * Used only to spread one seed across the 256-bit generator state.
 */
export class SplitMix64 {
    private state: Uint64;

    constructor(seed: Seed) {
        this.state = toSeed64(seed);
    }

    public next64(): Uint64 {
        this.state = mask64(this.state + GOLDEN_GAMMA);
        let z = this.state;
        z = mask64((z ^ (z >> 30n)) * MIX_1);
        z = mask64((z ^ (z >> 27n)) * MIX_2);
        return z ^ (z >> 31n);
    }
}

/**
 * Four successive SplitMix64 outputs for `seed`. Pure and total.
 */
export function mixSeed(seed: Seed): StateWords {
    const sm = new SplitMix64(seed);
    return [sm.next64(), sm.next64(), sm.next64(), sm.next64()] as const;
}

// src/L0/Primitives.ts
// Unsigned 64-bit word arithmetic on bigint. Every helper returns a value in [0, 2^64).

export type Uint64 = bigint;

/** Four generator words, s0..s3. */
export type StateWords = readonly [Uint64, Uint64, Uint64, Uint64];

export const UINT64_BITS = 64n;
export const UINT64_MAX: Uint64 = (1n << UINT64_BITS) - 1n;
export const UINT32_SHIFT = 32n;

export function mask64(x: bigint): Uint64 {
    return BigInt.asUintN(64, x);
}

export function rotl64(x: Uint64, k: number): Uint64 {
    const n = BigInt(k);
    return mask64((x << n) | (x >> (UINT64_BITS - n)));
}

export function isPowerOfTwo(x: Uint64): boolean {
    return x !== 0n && (x & (x - 1n)) === 0n;
}

export function isZeroState(words: StateWords): boolean {
    return (words[0] | words[1] | words[2] | words[3]) === 0n;
}

export function toHex64(x: Uint64): string {
    return `0x${x.toString(16).padStart(16, '0')}`;
}

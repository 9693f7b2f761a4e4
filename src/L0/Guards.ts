// src/L0/Guards.ts
import { ErrorCode, OddsError } from '../Errors.js';
import { UINT64_MAX, type StateWords, type Uint64 } from './Primitives.js';

export type Seed = number | bigint;
export type Bound = number | bigint;

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string; details?: Record<string, unknown> };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, msg: string, details?: Record<string, unknown>): GuardResult =>
    ({ ok: false, code, violation: msg, details });

function describe(value: unknown): string {
    return typeof value === 'bigint' ? `${value}n` : String(value);
}

function uint64Violation(value: unknown): string | null {
    if (typeof value === 'bigint') {
        if (value < 0n) return 'must not be negative';
        if (value > UINT64_MAX) return 'must fit in 64 bits';
        return null;
    }
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) return 'must be finite';
        if (!Number.isInteger(value)) return 'must be an integer';
        if (value < 0) return 'must not be negative';
        if (!Number.isSafeInteger(value)) return 'must be a safe integer (pass a bigint for larger values)';
        return null;
    }
    return `must be a number or bigint, got ${typeof value}`;
}

// --- Concrete Guards ---

// 1. Seeds (any unsigned 64-bit value)
export const SeedGuard: Guard<unknown> = (seed) => {
    const violation = uint64Violation(seed);
    if (violation) return FAIL(ErrorCode.INVALID_SEED, `Seed ${describe(seed)} ${violation}`, { seed: describe(seed) });
    return OK;
};

// 2. Bounds (exclusive upper limit, 0 allowed)
export const BoundGuard: Guard<unknown> = (bound) => {
    const violation = uint64Violation(bound);
    if (violation) return FAIL(ErrorCode.INVALID_BOUND, `Bound ${describe(bound)} ${violation}`, { bound: describe(bound) });
    return OK;
};

// 3. Fixed bounds must describe a real event: N >= 1
export const FixedBoundGuard: Guard<unknown> = (bound) => {
    const base = BoundGuard(bound);
    if (!base.ok) return base;
    if (bound === 0 || bound === 0n) return FAIL(ErrorCode.INVALID_BOUND, 'Fixed bound must be >= 1', { bound: describe(bound) });
    return OK;
};

// 4. Raw generator state
export const StateGuard: Guard<unknown> = (words) => {
    if (!Array.isArray(words) || words.length !== 4) {
        return FAIL(ErrorCode.INVALID_STATE, 'State must be exactly four 64-bit words');
    }
    for (let i = 0; i < 4; i++) {
        const w: unknown = words[i];
        if (typeof w !== 'bigint') return FAIL(ErrorCode.INVALID_STATE, `State word ${i} must be a bigint`);
        const violation = uint64Violation(w);
        if (violation) return FAIL(ErrorCode.INVALID_STATE, `State word ${i} ${violation}`, { index: i, word: describe(w) });
    }
    return OK;
};

/**
 * Runs a guard and throws the rejection as an OddsError.
 */
export function enforce<T>(guard: Guard<T>, input: T): void {
    const result = guard(input);
    if (!result.ok) {
        throw new OddsError(result.code, result.violation, result.details);
    }
}

export function toSeed64(seed: Seed): Uint64 {
    enforce(SeedGuard, seed);
    return BigInt(seed);
}

export function toBound64(bound: Bound): Uint64 {
    enforce(BoundGuard, bound);
    return BigInt(bound);
}

export function toStateWords(words: readonly bigint[]): StateWords {
    enforce(StateGuard, words);
    return [words[0], words[1], words[2], words[3]] as const;
}

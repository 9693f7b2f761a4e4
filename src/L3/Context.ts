// src/L3/Context.ts
// Default stream per execution context.
// Worker threads already get their own copy of this module; within a thread,
// runWithStream() gives an async call tree its own stream via AsyncLocalStorage.
import { AsyncLocalStorage } from 'node:async_hooks';
import { entropySeed } from '../L0/Entropy.js';
import { toSeed64, type Seed } from '../L0/Guards.js';
import { toHex64 } from '../L0/Primitives.js';
import { Xoshiro256, type RandomStream } from '../L1/Xoshiro256.js';
import { getConfig, logger } from '../Platform/Config.js';

const scoped = new AsyncLocalStorage<RandomStream>();
let rootStream: RandomStream | null = null;

function bootstrap(): RandomStream {
    const stream = new Xoshiro256(entropySeed(getConfig().entropy));
    logger().debug('Context', 'Root stream seeded from system entropy');
    return stream;
}

/**
 * The calling context's stream: the one bound by the nearest runWithStream(),
 * else this thread's root stream, created on first use.
 */
export function defaultStream(): RandomStream {
    const bound = scoped.getStore();
    if (bound) return bound;
    if (!rootStream) rootStream = bootstrap();
    return rootStream;
}

/**
 * Re-seeds only the calling context's default stream.
 */
export function seedStream(seed: Seed): void {
    const value = toSeed64(seed);
    defaultStream().reseed(value);
    logger().debug('Context', `Default stream re-seeded with ${toHex64(value)}`);
}

/**
 * Runs `fn` with a fresh default stream visible to it and everything it awaits.
 * Seeded from `seed` when given, from the entropy source otherwise.
 */
export function runWithStream<T>(fn: () => T, seed?: Seed): T {
    const stream = seed === undefined
        ? new Xoshiro256(entropySeed(getConfig().entropy))
        : new Xoshiro256(seed);
    return scoped.run(stream, fn);
}

/**
 * Drops this thread's root stream; the next defaultStream() call bootstraps again.
 */
export function resetDefaultStream(): void {
    rootStream = null;
}

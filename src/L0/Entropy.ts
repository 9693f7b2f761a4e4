// src/L0/Entropy.ts
import { randomBytes } from 'crypto';
import { ErrorCode, OddsError } from '../Errors.js';
import type { IEntropySource } from '../Platform/Ports.js';
import { rotl64, type Uint64 } from './Primitives.js';

const ENTROPY_SALT: Uint64 = 0xD6E8FEB86659FD93n;

/**
 * Operating-system randomness via Node's crypto module.
 * May block briefly while the system pool initialises.
 */
export class SystemEntropySource implements IEntropySource {
    public generateBytes(count: number): Uint8Array {
        return new Uint8Array(randomBytes(count));
    }
}

function readWord(source: IEntropySource): Uint64 {
    const bytes = source.generateBytes(8);
    if (bytes.length < 8) {
        throw new OddsError(ErrorCode.ENTROPY_UNAVAILABLE, `Entropy source returned ${bytes.length} of 8 bytes`);
    }
    let word = 0n;
    for (let i = 0; i < 8; i++) {
        word = (word << 8n) | BigInt(bytes[i]);
    }
    return word;
}

/**
 * Folds three independent 64-bit pulls into one seed so that a weak
 * source still yields a well-spread value.
 */
export function entropySeed(source: IEntropySource): Uint64 {
    const a = readWord(source);
    const b = readWord(source);
    const c = readWord(source);
    return a ^ rotl64(b, 21) ^ rotl64(c, 43) ^ ENTROPY_SALT;
}

/**
 * Odds Error Taxonomy
 * Centralized error codes for contract violations caught at the library boundary.
 * Core draws never throw; only malformed inputs reach this file.
 */

export enum ErrorCode {
    // I. Inputs
    INVALID_SEED = 'INVALID_SEED',
    INVALID_BOUND = 'INVALID_BOUND',
    INVALID_STATE = 'INVALID_STATE',

    // II. Environment
    ENTROPY_UNAVAILABLE = 'ENTROPY_UNAVAILABLE',
    INVALID_CONFIG = 'INVALID_CONFIG',
}

export class OddsError extends Error {
    constructor(
        public readonly code: ErrorCode,
        public readonly detail: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Odds:${code}] ${detail}`);
        this.name = 'OddsError';
    }
}

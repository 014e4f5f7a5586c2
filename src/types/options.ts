import type { Belief } from '../beliefs/belief.js';

export interface ResolutionOptions {
    /** Maximum resolution attempts before giving up (default: no cap) */
    maxResolutions?: number;
    /** Clause cap used when normalizing the negated goal */
    maxClauses?: number;
    /** Record every derived resolvent as a readable step */
    includeTrace?: boolean;
    /**
     * Callback after each saturation pass.
     * @param passes Number of completed passes.
     * @param clauseCount Size of the working clause set.
     */
    onProgress?: (passes: number, clauseCount: number) => void;
}

export type ContractionPhase = 'idle' | 'checking' | 'selecting' | 'removing';

/**
 * Orders beliefs for removal; the minimal belief is removed first.
 * `a.index`/`b.index` are positions in the base.
 */
export type RemovalComparator = (
    a: { belief: Belief; index: number },
    b: { belief: Belief; index: number }
) => number;

export interface ContractionOptions extends ResolutionOptions {
    comparator?: RemovalComparator;
    onTransition?: (from: ContractionPhase, to: ContractionPhase) => void;
}

export const DEFAULTS = {
    entrenchment: 50,
    maxResolutions: Infinity,
    maxClauses: 10000,
} as const;

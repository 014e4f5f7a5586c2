/**
 * Belief Base
 *
 * An insertion-ordered collection of beliefs. Expansion never checks
 * entailment or consistency; contraction and revision live in
 * ./revision.ts and mutate the base through `retract` and `insert`.
 *
 * Failed operations leave the base untouched.
 */

import type { Formula } from '../types/formula.js';
import type { CNFFormula } from '../types/clause.js';
import { BeliefNotFoundError } from '../types/errors.js';
import {
    DEFAULTS,
    type ContractionOptions,
    type ResolutionOptions,
} from '../types/options.js';
import { dedupeClauses } from '../logic/clause.js';
import { formulasEqual } from '../logic/formula.js';
import { assertFormula } from '../logic/normalizer.js';
import { formulaToString } from '../logic/printer.js';
import { areEquivalent, prove, refute, type ProofResult } from '../logic/resolution.js';
import { checkSat } from '../engines/sat.js';
import { createBelief, type Belief } from './belief.js';
import { contract, revise } from './revision.js';

/**
 * Read-only view of one belief, as listed by `show`.
 */
export interface BeliefEntry {
    formula: Formula;
    entrenchment: number;
}

export interface BeliefBaseOptions {
    /** Entrenchment given to beliefs added without one (default: 50) */
    defaultEntrenchment?: number;
    /** Resolution cap applied to every entailment query */
    maxResolutions?: number;
    /** Clause cap applied when normalizing formulas */
    maxClauses?: number;
}

export class BeliefBase {
    private entries: Belief[] = [];
    private readonly defaultEntrenchment: number;
    private readonly resolution: ResolutionOptions;

    constructor(options: BeliefBaseOptions = {}) {
        this.defaultEntrenchment = options.defaultEntrenchment ?? DEFAULTS.entrenchment;
        this.resolution = {
            maxResolutions: options.maxResolutions,
            maxClauses: options.maxClauses,
        };
    }

    get size(): number {
        return this.entries.length;
    }

    /**
     * Snapshot of the stored belief records, in insertion order.
     */
    beliefs(): readonly Belief[] {
        return [...this.entries];
    }

    /**
     * Union of the clausal forms of all beliefs.
     */
    clauses(): CNFFormula {
        return dedupeClauses(this.entries.flatMap(b => b.cnf));
    }

    /**
     * Append a belief unconditionally, even if it contradicts the base.
     */
    expand(formula: Formula | null | undefined, entrenchment: number = this.defaultEntrenchment): Belief {
        const belief = createBelief(assertFormula(formula), entrenchment, { maxClauses: this.resolution.maxClauses });
        return this.insert(belief);
    }

    /**
     * Append an already-built belief record.
     */
    insert(belief: Belief): Belief {
        this.entries.push(belief);
        return belief;
    }

    /**
     * Delete the first belief matching `formula`; one belief per call.
     */
    remove(formula: Formula): Belief {
        const index = this.indexOf(formula);
        const [removed] = this.entries.splice(index, 1);
        return removed;
    }

    getEntrenchment(formula: Formula): number {
        return this.entries[this.indexOf(formula)].entrenchment;
    }

    /**
     * Replace a belief in place, keeping its position.
     * The entrenchment defaults to the replaced belief's.
     */
    update(oldFormula: Formula, newFormula: Formula, entrenchment?: number): Belief {
        const index = this.indexOf(oldFormula);
        const belief = createBelief(
            newFormula,
            entrenchment ?? this.entries[index].entrenchment,
            { maxClauses: this.resolution.maxClauses }
        );
        this.entries[index] = belief;
        return belief;
    }

    show(): BeliefEntry[] {
        return this.entries.map(({ formula, entrenchment }) => ({ formula, entrenchment }));
    }

    entails(formula: Formula | null | undefined, options: ResolutionOptions = {}): boolean {
        return this.prove(formula, options).refuted;
    }

    prove(formula: Formula | null | undefined, options: ResolutionOptions = {}): ProofResult {
        return prove(this.clauses(), assertFormula(formula), { ...this.resolution, ...options });
    }

    isConsistent(options: ResolutionOptions = {}): boolean {
        return !refute(this.clauses(), { ...this.resolution, ...options }).refuted;
    }

    /**
     * A truth assignment satisfying every belief, or null when the base is inconsistent.
     */
    findModel(): Map<string, boolean> | null {
        const result = checkSat(this.clauses());
        return result.sat && result.model ? result.model : null;
    }

    contract(formula: Formula, options: ContractionOptions = {}): Belief[] {
        return contract(this, formula, { ...this.resolution, ...options });
    }

    revise(
        formula: Formula,
        entrenchment: number = this.defaultEntrenchment,
        options: ContractionOptions = {}
    ): Belief[] {
        return revise(this, formula, entrenchment, { ...this.resolution, ...options });
    }

    /**
     * Remove exactly the given records (compared by identity).
     */
    retract(beliefs: readonly Belief[]): void {
        const doomed = new Set(beliefs);
        this.entries = this.entries.filter(b => !doomed.has(b));
    }

    clear(): void {
        this.entries = [];
    }

    /**
     * Position of the first belief whose formula is structurally identical to
     * `formula`, or failing that, the first logically equivalent one.
     */
    private indexOf(formula: Formula): number {
        const target = assertFormula(formula);

        const identical = this.entries.findIndex(b => formulasEqual(b.formula, target));
        if (identical >= 0) return identical;

        const equivalent = this.entries.findIndex(b => areEquivalent(b.formula, target, this.resolution));
        if (equivalent >= 0) return equivalent;

        throw new BeliefNotFoundError(formulaToString(target));
    }
}

/**
 * Belief Revision - Library Entry Point
 *
 * Exports the core functionality of the library for use in other projects.
 * Nothing here touches the terminal.
 */

// Belief base and belief change
export { BeliefBase } from './beliefs/base.js';
export type { BeliefEntry, BeliefBaseOptions } from './beliefs/base.js';
export { createBelief } from './beliefs/belief.js';
export type { Belief } from './beliefs/belief.js';
export { contract, revise, byEntrenchment } from './beliefs/revision.js';

// Reasoning core
export { toCNF, assertFormula, negate } from './logic/normalizer.js';
export {
    resolve,
    refute,
    prove,
    entails,
    isSatisfiable,
    isValid,
    areEquivalent,
} from './logic/resolution.js';
export type { ProofResult } from './logic/resolution.js';
export {
    createLiteral,
    createClause,
    clauseKey,
    isTautology,
    clauseToString,
    cnfToString,
} from './logic/clause.js';
export {
    createAtom,
    createNot,
    createAnd,
    createOr,
    createImplies,
    createIff,
    formulasEqual,
    evaluate,
} from './logic/formula.js';
export { formulaToString } from './logic/printer.js';
export { checkSat } from './engines/sat.js';
export type { SatResult } from './engines/sat.js';

// Parser
export { parse } from './parser/index.js';

// Shell
export { BeliefShell } from './shell/shell.js';
export type { ShellOptions, ShellResult } from './shell/shell.js';

// Configuration
export { loadConfig } from './config.js';
export type { BeliefConfig } from './config.js';

// Types and Interfaces
export * from './types/index.js';

/**
 * Shared type definitions
 */

// Re-export error types
export {
    BeliefException,
    ParseError,
    MalformedFormulaError,
    BeliefNotFoundError,
    VacuousTargetError,
    InvalidEntrenchmentError,
    ResolutionLimitError,
    ClausificationLimitError,
    ConfigurationError,
    createParseError,
    getSuggestion,
    serializeBeliefError,
    isBeliefException,
} from './errors.js';

export type {
    BeliefErrorCode,
    ErrorSpan,
    BeliefError,
} from './errors.js';

// Re-export formula types
export type {
    Atom,
    Negation,
    BinaryFormula,
    BinaryConnective,
    Formula,
    FormulaType,
} from './formula.js';

// Re-export clause types for CNF
export type {
    Literal,
    Clause,
    CNFFormula,
    ClausifyOptions,
} from './clause.js';

// Re-export parser types
export type {
    TokenType,
    Token,
} from './parser.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    ResolutionOptions,
    ContractionOptions,
    ContractionPhase,
    RemovalComparator,
} from './options.js';

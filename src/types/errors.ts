/**
 * Structured Error System
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for belief operations
 */
export type BeliefErrorCode =
  | 'PARSE_ERROR'           // Syntax errors in formula text
  | 'MALFORMED_FORMULA'     // Empty, missing or invalid formula tree
  | 'BELIEF_NOT_FOUND'      // No stored belief matches the formula
  | 'VACUOUS_TARGET'        // Contraction of a tautology
  | 'INVALID_ENTRENCHMENT'  // Entrenchment is not an integer
  | 'RESOLUTION_LIMIT'      // Hit max resolution attempts
  | 'CLAUSIFICATION_LIMIT'  // CNF blowup exceeded limits
  | 'CONFIG_ERROR';         // Invalid configuration value

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface BeliefError {
  code: BeliefErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The problematic formula
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping BeliefError for throw/catch patterns
 */
export class BeliefException extends Error {
  public readonly error: BeliefError;

  constructor(error: BeliefError) {
    super(error.message);
    this.name = 'BeliefException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get code(): BeliefErrorCode {
    return this.error.code;
  }

  toJSON(): BeliefError {
    return this.error;
  }
}

export class ParseError extends BeliefException {
  constructor(error: Omit<BeliefError, 'code'>) {
    super({ code: 'PARSE_ERROR', ...error });
    this.name = 'ParseError';
  }
}

export class MalformedFormulaError extends BeliefException {
  constructor(message: string, context?: string) {
    super({
      code: 'MALFORMED_FORMULA',
      message,
      context,
      suggestion: 'Provide a non-empty formula built from atoms and ~ & | >> <<>>',
    });
    this.name = 'MalformedFormulaError';
  }
}

export class BeliefNotFoundError extends BeliefException {
  constructor(formula: string) {
    super({
      code: 'BELIEF_NOT_FOUND',
      message: `Belief not found: ${formula}`,
      suggestion: "Use 'show' to list the current beliefs",
      context: formula,
    });
    this.name = 'BeliefNotFoundError';
  }
}

export class VacuousTargetError extends BeliefException {
  constructor(formula: string) {
    super({
      code: 'VACUOUS_TARGET',
      message: `Cannot contract a tautology: ${formula}`,
      suggestion: 'A tautology is entailed by every belief base, including the empty one',
      context: formula,
    });
    this.name = 'VacuousTargetError';
  }
}

export class InvalidEntrenchmentError extends BeliefException {
  constructor(value: unknown) {
    super({
      code: 'INVALID_ENTRENCHMENT',
      message: `Entrenchment must be an integer, got ${String(value)}`,
      details: { value },
    });
    this.name = 'InvalidEntrenchmentError';
  }
}

export class ResolutionLimitError extends BeliefException {
  constructor(limit: number, clauseCount: number) {
    super({
      code: 'RESOLUTION_LIMIT',
      message: `Resolution limit of ${limit} steps exceeded`,
      suggestion: 'Increase maxResolutions or reduce the number of atoms in the base',
      details: { limit, clauseCount },
    });
    this.name = 'ResolutionLimitError';
  }
}

export class ClausificationLimitError extends BeliefException {
  constructor(limit: number, context?: string) {
    super({
      code: 'CLAUSIFICATION_LIMIT',
      message: `Clausification produced more than ${limit} clauses`,
      suggestion: 'Split the formula into several smaller beliefs',
      context,
      details: { limit },
    });
    this.name = 'ClausificationLimitError';
  }
}

export class ConfigurationError extends BeliefException {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: 'CONFIG_ERROR', message, details });
    this.name = 'ConfigurationError';
  }
}

/**
 * Common syntax error patterns and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /<->|<=>/,
      suggestion: "Use '<<>>' for equivalence"
    },
    {
      pattern: /->|=>/,
      suggestion: "Use '>>' for implication"
    },
    {
      pattern: /!|¬/,
      suggestion: "Use '~' for negation"
    },
    {
      pattern: /\([^)]*$/,
      suggestion: "Unbalanced parentheses - missing closing ')'"
    },
    {
      pattern: /^[^(]*\)/,
      suggestion: "Unbalanced parentheses - missing opening '('"
    },
    {
      pattern: /<<>>\s*$/,
      suggestion: "Incomplete equivalence - missing right side after '<<>>'"
    },
    {
      pattern: />>\s*$/,
      suggestion: "Incomplete implication - missing consequent after '>>'"
    },
    {
      pattern: /&\s*$/,
      suggestion: "Incomplete conjunction - missing right operand after '&'"
    },
    {
      pattern: /\|\s*$/,
      suggestion: "Incomplete disjunction - missing right operand after '|'"
    },
    {
      pattern: /~\s*$/,
      suggestion: "Incomplete negation - missing operand after '~'"
    },
  ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

/**
 * Create a parse error with optional span and suggestion
 */
export function createParseError(
  message: string,
  input: string,
  position?: number
): ParseError {
  const span = position !== undefined ? {
    start: position,
    end: position + 1,
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  } : undefined;

  return new ParseError({
    message,
    span,
    suggestion: getSuggestion(input),
    context: input,
  });
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
  const lastNewline = input.lastIndexOf('\n', position - 1);
  return position - lastNewline;
}

/**
 * Serialize a BeliefError for JSON output
 */
export function serializeBeliefError(error: BeliefError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * Narrow an unknown thrown value to a BeliefException
 */
export function isBeliefException(e: unknown): e is BeliefException {
  return e instanceof BeliefException;
}

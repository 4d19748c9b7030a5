/**
 * Error taxonomy
 *
 * Every failure raised while defining a model or compiling a request is a
 * SemanticLayerError carrying a stable `code`. All of them are deterministic:
 * the same model and request always fail the same way, so nothing retries.
 * Errors thrown by an execution backend are not wrapped.
 */

export type ErrorCode =
  | 'UNKNOWN_FIELD'
  | 'AMBIGUOUS_FIELD'
  | 'DUPLICATE_FIELD'
  | 'DUPLICATE_TABLE'
  | 'INVALID_TIME_GRAIN'
  | 'MALFORMED_FILTER'
  | 'UNSUPPORTED_FILTER_OPERATOR'
  | 'EMPTY_COMPOUND_FILTER'
  | 'CALCULATED_MEASURE_CYCLE'
  | 'INVALID_DEFINITION'
  | 'INVALID_REQUEST'
  | 'EXPRESSION_SYNTAX';

export class SemanticLayerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'SemanticLayerError';
    this.code = code;
  }
}

export class UnknownFieldError extends SemanticLayerError {
  readonly field: string;

  constructor(field: string, context?: string) {
    super('UNKNOWN_FIELD', `Unknown field '${field}'${context ? ` ${context}` : ''}`);
    this.name = 'UnknownFieldError';
    this.field = field;
  }
}

export class AmbiguousFieldError extends SemanticLayerError {
  readonly field: string;
  readonly candidates: readonly string[];

  constructor(field: string, candidates: readonly string[]) {
    super(
      'AMBIGUOUS_FIELD',
      `Field '${field}' is ambiguous; qualify it as one of: ${candidates.join(', ')}`
    );
    this.name = 'AmbiguousFieldError';
    this.field = field;
    this.candidates = candidates;
  }
}

export class DuplicateFieldError extends SemanticLayerError {
  constructor(field: string, owner: string) {
    super('DUPLICATE_FIELD', `Field '${field}' is already defined on '${owner}'`);
    this.name = 'DuplicateFieldError';
  }
}

export class DuplicateTableError extends SemanticLayerError {
  constructor(table: string) {
    super('DUPLICATE_TABLE', `Table '${table}' appears more than once in the join tree`);
    this.name = 'DuplicateTableError';
  }
}

export class InvalidTimeGrainError extends SemanticLayerError {
  constructor(message: string) {
    super('INVALID_TIME_GRAIN', message);
    this.name = 'InvalidTimeGrainError';
  }
}

export class MalformedFilterSpecError extends SemanticLayerError {
  constructor(message: string) {
    super('MALFORMED_FILTER', message);
    this.name = 'MalformedFilterSpecError';
  }
}

export class UnsupportedFilterOperatorError extends SemanticLayerError {
  readonly operator: string;

  constructor(operator: string) {
    super('UNSUPPORTED_FILTER_OPERATOR', `Unsupported filter operator '${operator}'`);
    this.name = 'UnsupportedFilterOperatorError';
    this.operator = operator;
  }
}

export class EmptyCompoundFilterError extends SemanticLayerError {
  constructor(operator: string) {
    super('EMPTY_COMPOUND_FILTER', `Compound ${operator} filter must have at least one condition`);
    this.name = 'EmptyCompoundFilterError';
  }
}

export class CalculatedMeasureCycleError extends SemanticLayerError {
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super('CALCULATED_MEASURE_CYCLE', `Calculated measures reference each other in a cycle: ${cycle.join(' -> ')}`);
    this.name = 'CalculatedMeasureCycleError';
    this.cycle = cycle;
  }
}

export class InvalidDefinitionError extends SemanticLayerError {
  constructor(message: string) {
    super('INVALID_DEFINITION', message);
    this.name = 'InvalidDefinitionError';
  }
}

export class InvalidRequestError extends SemanticLayerError {
  constructor(message: string) {
    super('INVALID_REQUEST', message);
    this.name = 'InvalidRequestError';
  }
}

export class ExpressionSyntaxError extends SemanticLayerError {
  readonly source: string;

  constructor(message: string, source: string) {
    super('EXPRESSION_SYNTAX', `${message} in '${source}'`);
    this.name = 'ExpressionSyntaxError';
    this.source = source;
  }
}

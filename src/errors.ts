export type QueryStringFilterErrorCode =
  | 'invalid_parameter'
  | 'column_not_found'
  | 'unsupported_operator'
  | 'conversion_error'
  | 'not_mapped'
  | 'malformed_subquery';

/**
 * Base class for every failure raised while turning query-string filters
 * into a query. `code` identifies the kind, `field` the offending field
 * (when there is one), so an HTTP layer can map both to a 4xx response.
 */
export abstract class QueryStringFilterError extends Error {
  abstract readonly code: QueryStringFilterErrorCode;
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = new.target.name;
    this.field = field;
  }
}

export class InvalidParameterError extends QueryStringFilterError {
  readonly code = 'invalid_parameter';

  constructor(parameter: string) {
    super(`No valid parameter provided in "${parameter}"`);
  }
}

export class ColumnNotFoundError extends QueryStringFilterError {
  readonly code = 'column_not_found';

  constructor(field: string) {
    super(`Column ${field} not found`, field);
  }
}

export class UnsupportedOperatorError extends QueryStringFilterError {
  readonly code = 'unsupported_operator';
  readonly operator: string;

  constructor(field: string, operator: string, reason?: string) {
    super(
      `Cannot apply operator "${operator}" to field ${field}${reason ? `: ${reason}` : ''}`,
      field,
    );
    this.operator = operator;
  }
}

export class ConversionError extends QueryStringFilterError {
  readonly code = 'conversion_error';

  constructor(field: string | undefined, value: string | undefined, expected: string) {
    super(
      value === undefined
        ? `Missing value${field ? ` for ${field}` : ''}, expected ${expected}`
        : `Cannot convert "${value}"${field ? ` for ${field}` : ''} to ${expected}`,
      field,
    );
  }
}

export class NotMappedError extends QueryStringFilterError {
  readonly code = 'not_mapped';

  constructor(field: string, reason = 'is not a relationship') {
    super(`Attribute ${field} ${reason}`, field);
  }
}

export class MalformedSubqueryError extends QueryStringFilterError {
  readonly code = 'malformed_subquery';

  constructor(field: string, expression: string) {
    super(
      `Sub-expression "${expression}" for ${field} must have the form field__operator=value`,
      field,
    );
  }
}

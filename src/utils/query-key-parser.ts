import { InvalidParameterError } from '../errors.js';
import { DEFAULT_OPERATOR } from './operator-registry.js';

export const OPERATOR_DELIMITER = '__';

/**
 * One parsed query-string filter. `value` is absent when the query carried
 * no value; unary operators ignore it either way.
 */
export interface FilterDescriptor {
  readonly name: string;
  readonly op: string;
  readonly value?: string;
}

export type QueryStringInput = Readonly<Record<string, string>> | URLSearchParams;

/**
 * Only two-character operators are lowercased (`EQ` -> `eq`); longer tokens
 * keep their case.
 */
function normalizeOperator(operator: string): string {
  return operator.length === 2 ? operator.toLowerCase() : operator;
}

/**
 * Splits a query key on the last delimiter into field name and operator.
 * A key without delimiter is an equality filter on the whole key.
 * @throws InvalidParameterError when the field name is empty.
 */
export function splitOperator(param: string): [name: string, operator: string] {
  const index = param.lastIndexOf(OPERATOR_DELIMITER);
  const name = index === -1 ? param : param.slice(0, index);
  const operator =
    index === -1
      ? DEFAULT_OPERATOR
      : normalizeOperator(param.slice(index + OPERATOR_DELIMITER.length));

  if (name === '') {
    throw new InvalidParameterError(param);
  }
  return [name, operator];
}

/**
 * Parses a single key/value pair. A key with exactly three delimiters
 * (`owner__with__pet_field__op`) is a relationship filter: the last two
 * segments move into the value as `pet_field__op=value`.
 */
export function parseFilter(key: string, value?: string): FilterDescriptor {
  const segments = key.split(OPERATOR_DELIMITER);

  if (segments.length === 4) {
    const [name = '', operator = '', relatedField = '', relatedOperator = ''] =
      segments;
    if (name === '') {
      throw new InvalidParameterError(key);
    }
    return Object.freeze({
      name,
      op: normalizeOperator(operator),
      value: `${relatedField}${OPERATOR_DELIMITER}${relatedOperator}=${value ?? ''}`,
    });
  }

  const [name, op] = splitOperator(key);
  return Object.freeze(value === undefined ? { name, op } : { name, op, value });
}

function entriesOf(query: QueryStringInput): Iterable<[string, string]> {
  return query instanceof URLSearchParams
    ? query.entries()
    : Object.entries(query);
}

/**
 * Builds one filter descriptor per query entry, in iteration order.
 * No schema validation happens here.
 */
export function buildFilters(query: QueryStringInput): FilterDescriptor[] {
  const filters: FilterDescriptor[] = [];
  for (const [key, value] of entriesOf(query)) {
    filters.push(parseFilter(key, value));
  }
  return filters;
}

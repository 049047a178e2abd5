import { ConversionError } from '../errors.js';
import { FieldTypeCategory } from './field-type-classifier.js';

export type ConvertedValue = number | string | Date;

const INTEGER_PATTERN = /^[+-]?\d+$/;

function convertInteger(raw: string, field?: string): number {
  const trimmed = raw.trim();
  const parsed = INTEGER_PATTERN.test(trimmed)
    ? Number.parseInt(trimmed, 10)
    : Number.NaN;
  if (!Number.isSafeInteger(parsed)) {
    throw new ConversionError(field, raw, 'an integer');
  }
  return parsed;
}

const ZONELESS_DATE_TIME_PATTERN =
  /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;

/**
 * ISO-style date-times without an offset are read as UTC, like date-only
 * values, so results do not depend on the host's time zone.
 */
function convertTimestamp(raw: string, field?: string): Date {
  const trimmed = raw.trim();
  const parsed = ZONELESS_DATE_TIME_PATTERN.test(trimmed)
    ? new Date(`${trimmed.replace(' ', 'T')}Z`)
    : new Date(raw);
  if (Number.isNaN(parsed.getTime())) {
    throw new ConversionError(field, raw, 'a date/time');
  }
  return parsed;
}

/**
 * Converts a raw query-string value into the native representation of the
 * given field category.
 * @throws ConversionError when the value cannot be represented.
 */
export function convertValue(
  category: FieldTypeCategory,
  raw: string,
  field?: string,
): ConvertedValue {
  switch (category) {
    case FieldTypeCategory.INTEGER:
      return convertInteger(raw, field);
    case FieldTypeCategory.TIMESTAMP:
      return convertTimestamp(raw, field);
    case FieldTypeCategory.TEXT:
    case FieldTypeCategory.BOOLEAN:
      return raw;
    default: {
      const _exhaustiveCheck: never = category;
      throw new Error(`Unknown field category: ${String(_exhaustiveCheck)}`);
    }
  }
}

/**
 * Converts a comma separated list. Items are trimmed but empty items are
 * kept and converted like any other value.
 */
export function convertList(
  category: FieldTypeCategory,
  raw: string,
  field?: string,
): ConvertedValue[] {
  return raw.split(',').map((item) => convertValue(category, item.trim(), field));
}

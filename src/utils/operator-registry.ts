import { FieldTypeCategory } from './field-type-classifier.js';
import type { IFilterOperatorHandler } from './filter-handlers/filter-operator-handler.interface.js';
import { BasicComparisonHandler } from './filter-handlers/basic-comparison.handler.js';
import { BooleanComparisonHandler } from './filter-handlers/boolean-comparison.handler.js';
import { IgnoreCaseEqualsHandler } from './filter-handlers/ignore-case-equals.handler.js';
import { InComparisonHandler } from './filter-handlers/in-comparison.handler.js';
import { LikeComparisonHandler } from './filter-handlers/like-comparison.handler.js';
import { NullComparisonHandler } from './filter-handlers/null-comparison.handler.js';
import type { ConvertedValue } from './value-converter.js';

export enum OperatorArity {
  UNARY = 'unary',
  BINARY = 'binary',
  LIST = 'list',
  RELATIONSHIP = 'relationship',
}

export const DEFAULT_OPERATOR = 'eq';
export const RELATIONSHIP_OPERATOR = 'with';

export type AllowedCategories = ReadonlySet<FieldTypeCategory> | 'any';

interface OperatorDefinitionBase {
  readonly symbol: string;
  readonly allowedCategories: AllowedCategories;
}

export interface UnaryOperatorDefinition extends OperatorDefinitionBase {
  readonly arity: OperatorArity.UNARY;
  readonly handler: IFilterOperatorHandler<undefined>;
}

export interface BinaryOperatorDefinition extends OperatorDefinitionBase {
  readonly arity: OperatorArity.BINARY;
  readonly handler: IFilterOperatorHandler<ConvertedValue>;
}

export interface ListOperatorDefinition extends OperatorDefinitionBase {
  readonly arity: OperatorArity.LIST;
  readonly handler: IFilterOperatorHandler<ConvertedValue[]>;
}

/**
 * `with` has no handler of its own: the fragment is an EXISTS subquery
 * assembled from the inner operator of the sub-expression.
 */
export interface RelationshipOperatorDefinition extends OperatorDefinitionBase {
  readonly arity: OperatorArity.RELATIONSHIP;
}

export type OperatorDefinition =
  | UnaryOperatorDefinition
  | BinaryOperatorDefinition
  | ListOperatorDefinition
  | RelationshipOperatorDefinition;

const categories = (
  ...allowed: FieldTypeCategory[]
): ReadonlySet<FieldTypeCategory> => Object.freeze(new Set(allowed));

const ORDERABLE = categories(
  FieldTypeCategory.INTEGER,
  FieldTypeCategory.TIMESTAMP,
);
const COMPARABLE = categories(
  FieldTypeCategory.INTEGER,
  FieldTypeCategory.TEXT,
  FieldTypeCategory.TIMESTAMP,
);
const TEXT_ONLY = categories(FieldTypeCategory.TEXT);
const LISTABLE = categories(FieldTypeCategory.INTEGER, FieldTypeCategory.TEXT);

const unary = (
  symbol: string,
  allowedCategories: AllowedCategories,
  handler: IFilterOperatorHandler<undefined>,
): UnaryOperatorDefinition => ({
  symbol,
  arity: OperatorArity.UNARY,
  allowedCategories,
  handler,
});

const binary = (
  symbol: string,
  allowedCategories: AllowedCategories,
  handler: IFilterOperatorHandler<ConvertedValue>,
): BinaryOperatorDefinition => ({
  symbol,
  arity: OperatorArity.BINARY,
  allowedCategories,
  handler,
});

const list = (
  symbol: string,
  allowedCategories: AllowedCategories,
  handler: IFilterOperatorHandler<ConvertedValue[]>,
): ListOperatorDefinition => ({
  symbol,
  arity: OperatorArity.LIST,
  allowedCategories,
  handler,
});

/**
 * Builds the operator catalogue. Called once at module load; the result is
 * frozen and shared by every translator.
 */
function initializeOperators(): ReadonlyMap<string, OperatorDefinition> {
  const definitions: OperatorDefinition[] = [
    unary('is_null', 'any', new NullComparisonHandler()),
    unary('is_not_null', 'any', new NullComparisonHandler(true)),
    unary(
      'is_true',
      categories(FieldTypeCategory.BOOLEAN),
      new BooleanComparisonHandler(true),
    ),
    unary(
      'is_false',
      categories(FieldTypeCategory.BOOLEAN),
      new BooleanComparisonHandler(false),
    ),

    binary('eq', COMPARABLE, new BasicComparisonHandler('=')),
    binary('ne', COMPARABLE, new BasicComparisonHandler('!=')),
    binary('ieq', TEXT_ONLY, new IgnoreCaseEqualsHandler()),
    binary('gt', ORDERABLE, new BasicComparisonHandler('>')),
    binary('gte', ORDERABLE, new BasicComparisonHandler('>=')),
    binary('lt', ORDERABLE, new BasicComparisonHandler('<')),
    binary('lte', ORDERABLE, new BasicComparisonHandler('<=')),
    binary('like', TEXT_ONLY, new LikeComparisonHandler()),
    binary('not_like', TEXT_ONLY, new LikeComparisonHandler(true)),
    binary('ilike', TEXT_ONLY, new LikeComparisonHandler(false, true)),
    binary('not_ilike', TEXT_ONLY, new LikeComparisonHandler(true, true)),

    list('in', LISTABLE, new InComparisonHandler()),
    list('not_in', LISTABLE, new InComparisonHandler(true)),

    {
      symbol: RELATIONSHIP_OPERATOR,
      arity: OperatorArity.RELATIONSHIP,
      allowedCategories: categories(),
    },
  ];

  for (const definition of definitions) {
    Object.freeze(definition);
  }
  return new FrozenOperatorMap(
    definitions.map((definition) => [definition.symbol, definition]),
  );
}

class FrozenOperatorMap extends Map<string, OperatorDefinition> {
  constructor(entries: Array<[string, OperatorDefinition]>) {
    super();
    for (const [symbol, definition] of entries) {
      super.set(symbol, definition);
    }
    Object.freeze(this);
  }

  override set(): this {
    throw new TypeError('The operator registry is read-only');
  }

  override delete(): boolean {
    throw new TypeError('The operator registry is read-only');
  }

  override clear(): void {
    throw new TypeError('The operator registry is read-only');
  }
}

export const OPERATORS: ReadonlyMap<string, OperatorDefinition> =
  initializeOperators();

export function getOperator(symbol: string): OperatorDefinition | undefined {
  return OPERATORS.get(symbol);
}

/**
 * Whether an operator may be applied to a column of the given category.
 * Unclassified columns (`undefined`) only accept operators allowed for any type.
 */
export function requiresCategory(
  definition: OperatorDefinition,
  category: FieldTypeCategory | undefined,
): boolean {
  if (definition.allowedCategories === 'any') {
    return true;
  }
  return category !== undefined && definition.allowedCategories.has(category);
}

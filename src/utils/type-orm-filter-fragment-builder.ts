import type { ObjectLiteral } from 'typeorm';
import { ConversionError, UnsupportedOperatorError } from '../errors.js';
import type { FieldTypeCategory } from './field-type-classifier.js';
import {
  getOperator,
  OperatorArity,
  requiresCategory,
} from './operator-registry.js';
import type { FilterDescriptor } from './query-key-parser.js';
import type { IQueryTarget, ResolvedColumn } from './query-target.js';
import type { TypeOrmParameterManager } from './type-orm-parameter-manager.js';
import { TypeOrmRelationSubqueryBuilder } from './type-orm-relation-subquery.builder.js';
import { convertList, convertValue } from './value-converter.js';

export type TypeOrmConditionFragment = {
  queryFragment: string;
  parameters: ObjectLiteral;
};

/**
 * Builds SQL query fragments and parameters for individual filters:
 * resolves the column, checks the operator against the column's category,
 * converts the raw value and dispatches to the registered handler.
 */
export class TypeOrmFilterFragmentBuilder {
  private readonly _relationSubqueryBuilder: TypeOrmRelationSubqueryBuilder;

  constructor(private _parameterManager: TypeOrmParameterManager) {
    this._relationSubqueryBuilder = new TypeOrmRelationSubqueryBuilder(this);
  }

  /**
   * Builds a TypeORM condition fragment for a given filter.
   * @param filter The parsed filter.
   * @param target The target the filter's field belongs to.
   * @param allowRelationships Whether `with` may be used; false inside a sub-expression.
   * @throws ColumnNotFoundError, UnsupportedOperatorError, ConversionError,
   * NotMappedError, MalformedSubqueryError
   */
  public build<T extends ObjectLiteral>(
    filter: FilterDescriptor,
    target: IQueryTarget<T>,
    allowRelationships: boolean = true,
  ): TypeOrmConditionFragment {
    const definition = getOperator(filter.op);

    if (definition?.arity === OperatorArity.RELATIONSHIP) {
      if (!allowRelationships) {
        throw new UnsupportedOperatorError(
          filter.name,
          filter.op,
          'relationships can only be traversed one level deep',
        );
      }
      return this._relationSubqueryBuilder.build(filter, target);
    }

    // Unknown fields are reported before unknown operators.
    const column = target.resolveColumn(filter.name);
    if (!definition) {
      throw new UnsupportedOperatorError(
        column.name,
        filter.op,
        'unknown operator',
      );
    }
    if (!requiresCategory(definition, column.category)) {
      throw new UnsupportedOperatorError(
        column.name,
        filter.op,
        column.category
          ? `not available for ${column.category} fields`
          : 'not available for fields of this type',
      );
    }

    switch (definition.arity) {
      case OperatorArity.UNARY:
        return definition.handler.build(
          column.path,
          undefined,
          this._parameterManager,
        );
      case OperatorArity.BINARY:
        return definition.handler.build(
          column.path,
          convertValue(
            this.categoryOf(column, filter.op),
            this.requireValue(filter, column),
            column.name,
          ),
          this._parameterManager,
        );
      case OperatorArity.LIST:
        return definition.handler.build(
          column.path,
          convertList(
            this.categoryOf(column, filter.op),
            this.requireValue(filter, column),
            column.name,
          ),
          this._parameterManager,
        );
      default: {
        const _exhaustiveCheck: never = definition;
        throw new Error(`Unsupported operator arity: ${String(_exhaustiveCheck)}`);
      }
    }
  }

  private requireValue(
    filter: FilterDescriptor,
    column: ResolvedColumn,
  ): string {
    if (filter.value === undefined) {
      throw new ConversionError(column.name, undefined, 'a value');
    }
    return filter.value;
  }

  /**
   * Typed operators only pass the category check for classified columns.
   */
  private categoryOf(
    column: ResolvedColumn,
    operator: string,
  ): FieldTypeCategory {
    if (column.category === undefined) {
      throw new UnsupportedOperatorError(column.name, operator);
    }
    return column.category;
  }
}

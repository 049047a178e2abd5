import type { TypeOrmConditionFragment } from '../type-orm-filter-fragment-builder.js';
import type { TypeOrmParameterManager } from '../type-orm-parameter-manager.js';

/**
 * Defines the contract for a class that handles a specific filter operator
 * and builds a TypeORM condition fragment for it.
 */
export interface IFilterOperatorHandler<TValue> {
  /**
   * Builds a TypeOrmConditionFragment for a specific filter operator.
   * @param fieldName The escaped, alias-qualified column (e.g. `"user"."u_id"`).
   * @param value The converted operand, or `undefined` for unary operators.
   * @param parameterManager The parameter manager to generate unique parameter names.
   */
  build(
    fieldName: string,
    value: TValue,
    parameterManager: TypeOrmParameterManager,
  ): TypeOrmConditionFragment;
}

import type { IFilterOperatorHandler } from './filter-operator-handler.interface.js';
import type { TypeOrmConditionFragment } from '../type-orm-filter-fragment-builder.js';
import type { TypeOrmParameterManager } from '../type-orm-parameter-manager.js';
import type { ConvertedValue } from '../value-converter.js';

/**
 * Handles case-insensitive equality by lowercasing both sides.
 */
export class IgnoreCaseEqualsHandler
  implements IFilterOperatorHandler<ConvertedValue>
{
  /**
   * @inheritdoc
   */
  public build(
    fieldName: string,
    value: ConvertedValue,
    parameterManager: TypeOrmParameterManager,
  ): TypeOrmConditionFragment {
    const paramName = parameterManager.generateParamName();
    return {
      queryFragment: `LOWER(${fieldName}) = :${paramName}`,
      parameters: { [paramName]: String(value).toLowerCase() },
    };
  }
}

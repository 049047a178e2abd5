import type { IFilterOperatorHandler } from './filter-operator-handler.interface.js';
import type { TypeOrmConditionFragment } from '../type-orm-filter-fragment-builder.js';
import type { TypeOrmParameterManager } from '../type-orm-parameter-manager.js';
import type { ConvertedValue } from '../value-converter.js';

/**
 * Handles basic comparison operators like =, !=, >, <, >=, <=.
 */
export class BasicComparisonHandler
  implements IFilterOperatorHandler<ConvertedValue>
{
  constructor(private operatorString: string) {}

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
      queryFragment: `${fieldName} ${this.operatorString} :${paramName}`,
      parameters: { [paramName]: value },
    };
  }
}

import type { IFilterOperatorHandler } from './filter-operator-handler.interface.js';
import type { TypeOrmConditionFragment } from '../type-orm-filter-fragment-builder.js';
import type { TypeOrmParameterManager } from '../type-orm-parameter-manager.js';
import type { ConvertedValue } from '../value-converter.js';

/**
 * Handles IN and NOT IN operators.
 */
export class InComparisonHandler
  implements IFilterOperatorHandler<ConvertedValue[]>
{
  constructor(private not: boolean = false) {}

  /**
   * @inheritdoc
   */
  public build(
    fieldName: string,
    values: ConvertedValue[],
    parameterManager: TypeOrmParameterManager,
  ): TypeOrmConditionFragment {
    const paramName = parameterManager.generateParamName();
    return {
      queryFragment: `${fieldName} ${this.not ? 'NOT ' : ''}IN (:...${paramName})`,
      parameters: { [paramName]: values },
    };
  }
}

import type { IFilterOperatorHandler } from './filter-operator-handler.interface.js';
import type { TypeOrmConditionFragment } from '../type-orm-filter-fragment-builder.js';
import type { TypeOrmParameterManager } from '../type-orm-parameter-manager.js';
import type { ConvertedValue } from '../value-converter.js';

/**
 * Handles LIKE based comparison operators and their NOT counterparts.
 * The case-insensitive variant compares LOWER() of both sides.
 */
export class LikeComparisonHandler
  implements IFilterOperatorHandler<ConvertedValue>
{
  constructor(
    private not: boolean = false,
    private ignoreCase: boolean = false,
  ) {}

  /**
   * @inheritdoc
   */
  public build(
    fieldName: string,
    value: ConvertedValue,
    parameterManager: TypeOrmParameterManager,
  ): TypeOrmConditionFragment {
    const paramName = parameterManager.generateParamName();
    const operator = `${this.not ? 'NOT ' : ''}LIKE`;
    const queryFragment = this.ignoreCase
      ? `LOWER(${fieldName}) ${operator} LOWER(:${paramName})`
      : `${fieldName} ${operator} :${paramName}`;
    return {
      queryFragment,
      parameters: { [paramName]: value },
    };
  }
}

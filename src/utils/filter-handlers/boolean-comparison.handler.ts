import type { IFilterOperatorHandler } from './filter-operator-handler.interface.js';
import type { TypeOrmConditionFragment } from '../type-orm-filter-fragment-builder.js';
import type { TypeOrmParameterManager } from '../type-orm-parameter-manager.js';

/**
 * Handles is_true and is_false. The literal is inlined; no parameter is bound.
 */
export class BooleanComparisonHandler
  implements IFilterOperatorHandler<undefined>
{
  constructor(private expected: boolean) {}

  /**
   * @inheritdoc
   */
  public build(
    fieldName: string,
    _value: undefined,
    _parameterManager: TypeOrmParameterManager,
  ): TypeOrmConditionFragment {
    return {
      queryFragment: `${fieldName} = ${this.expected ? 'TRUE' : 'FALSE'}`,
      parameters: {},
    };
  }
}

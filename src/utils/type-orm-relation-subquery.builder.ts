import type { ObjectLiteral } from 'typeorm';
import { MalformedSubqueryError } from '../errors.js';
import { parseFilter } from './query-key-parser.js';
import type { IQueryTarget } from './query-target.js';
import type {
  TypeOrmConditionFragment,
  TypeOrmFilterFragmentBuilder,
} from './type-orm-filter-fragment-builder.js';

const SUBQUERY_VALUE_SEPARATOR = '=';

/**
 * Builds the fragment of a `with` filter: a correlated EXISTS over the
 * related entity, restricted by the filter carried in the value
 * (`related_field__operator=value`).
 */
export class TypeOrmRelationSubqueryBuilder {
  constructor(private _filterFragmentBuilder: TypeOrmFilterFragmentBuilder) {}

  public build<T extends ObjectLiteral>(
    filter: { readonly name: string; readonly value?: string },
    target: IQueryTarget<T>,
  ): TypeOrmConditionFragment {
    const relationship = target.resolveRelationship(filter.name);

    const expression = filter.value ?? '';
    const separatorIndex = expression.indexOf(SUBQUERY_VALUE_SEPARATOR);
    if (separatorIndex === -1) {
      throw new MalformedSubqueryError(filter.name, expression);
    }

    const innerFilter = parseFilter(
      expression.slice(0, separatorIndex),
      expression.slice(separatorIndex + SUBQUERY_VALUE_SEPARATOR.length),
    );
    const inner = this._filterFragmentBuilder.build(
      innerFilter,
      relationship.target,
      false,
    );

    const subQuery = relationship.target
      .buildSelect()
      .select('1')
      .where(relationship.correlation)
      .andWhere(inner.queryFragment, inner.parameters);

    return {
      queryFragment: `EXISTS (${subQuery.getQuery()})`,
      parameters: inner.parameters,
    };
  }
}

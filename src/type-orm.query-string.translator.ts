import type { ObjectLiteral, SelectQueryBuilder } from 'typeorm';
import {
  buildFilters,
  type FilterDescriptor,
  type QueryStringInput,
} from './utils/query-key-parser.js';
import type { IQueryTarget } from './utils/query-target.js';
import {
  MAX_LIMIT,
  type PaginationOptions,
  QueryState,
} from './utils/query-state.js';
import { QueryApplier } from './utils/query-applier.js';
import { extractRequestParameters } from './utils/request-parameters.js';
import { TypeOrmConditionBuilder } from './utils/type-orm-condition-builder.js';
import {
  type TypeOrmConditionFragment,
  TypeOrmFilterFragmentBuilder,
} from './utils/type-orm-filter-fragment-builder.js';
import { TypeOrmParameterManager } from './utils/type-orm-parameter-manager.js';

/**
 * Translates query-string filters into a TypeORM SelectQueryBuilder.
 * Orchestrates query building by delegating to specialized helpers.
 *
 * The translator keeps no state between calls: every `apply` builds its own
 * parameter manager and query state, so one instance can serve all requests.
 */
export class TypeOrmQueryStringTranslator {
  private _conditionBuilder = new TypeOrmConditionBuilder();

  /**
   * Parses a query-string mapping (including the reserved `_limit`,
   * `_offset`, `_order` and `_desc` keys) and applies it to the target.
   * @param target The flat selection or entity to query.
   * @param query The already-parsed query string.
   * @returns The filtered, ordered and paginated query, not yet executed.
   */
  public translate<T extends ObjectLiteral>(
    target: IQueryTarget<T>,
    query: QueryStringInput,
  ): SelectQueryBuilder<T> {
    const { filters, pagination } = extractRequestParameters(query);
    return this.apply(target, buildFilters(filters), pagination);
  }

  /**
   * Main entry point. Applies filter descriptors, ordering, limit and offset
   * to a fresh select over the target.
   * @param target The flat selection or entity to query.
   * @param filters Parsed filters, combined with AND in the given order.
   * @param options Pagination and ordering.
   * @returns The composed SelectQueryBuilder. Executing it is up to the caller.
   */
  public apply<T extends ObjectLiteral>(
    target: IQueryTarget<T>,
    filters: ReadonlyArray<FilterDescriptor>,
    options: PaginationOptions = {},
  ): SelectQueryBuilder<T> {
    const { limit, offset, orderBy, ascending = true } = options;
    const queryState = new QueryState();
    const queryApplier = new QueryApplier<T>(queryState);
    const filterFragmentBuilder = new TypeOrmFilterFragmentBuilder(
      new TypeOrmParameterManager(),
    );

    const fragments: TypeOrmConditionFragment[] = filters.map((filter) =>
      filterFragmentBuilder.build(filter, target),
    );
    queryState.recordPagination(limit, offset);
    if (orderBy) {
      queryState.recordOrderBy(target.resolveColumn(orderBy), ascending);
    }

    const qb = target.buildSelect();
    queryState.setQueryHasWhereClauses(
      this._conditionBuilder.applyConjunction(qb, fragments),
    );
    queryApplier.applyOrderBy(qb);
    queryApplier.applyPagination(qb);

    this.log(qb, target, filters, queryState);
    return qb;
  }

  private log<T extends ObjectLiteral>(
    qb: SelectQueryBuilder<T>,
    target: IQueryTarget<T>,
    filters: ReadonlyArray<FilterDescriptor>,
    queryState: QueryState,
  ): void {
    const { logger } = qb.connection;
    if (queryState.limitWasClamped()) {
      logger.log('warn', `Requested limit clamped to ${MAX_LIMIT}`);
    }

    const orderBy = queryState.getOrderBy();
    logger.log(
      'info',
      `Query-string filters on ${target.kind} "${target.alias}": ` +
        `${filters.map((f) => `${f.name}__${f.op}`).join(', ') || 'none'}; ` +
        `where=${queryState.hasWhereClauses()} limit=${queryState.getLimit()} ` +
        `offset=${queryState.getOffset() ?? 0}` +
        (orderBy ? ` order=${orderBy[0].name} ${orderBy[1]}` : ''),
    );
  }
}

import type { ObjectLiteral, SelectQueryBuilder } from 'typeorm';
import type { QueryState } from './query-state.js';

/**
 * QueryApplier is responsible for applying the collected query state
 * (ordering, limit, offset) to a TypeORM SelectQueryBuilder.
 */
export class QueryApplier<T extends ObjectLiteral> {
  /**
   * Constructs a new QueryApplier instance.
   * @param _queryState The QueryState instance for accessing collected query state.
   */
  constructor(private _queryState: QueryState) {}

  /**
   * Applies the recorded order-by column, if any. Without one the row
   * order is whatever the database returns.
   * @param qb The TypeORM SelectQueryBuilder.
   */
  public applyOrderBy(qb: SelectQueryBuilder<T>): void {
    const orderBy = this._queryState.getOrderBy();
    if (orderBy) {
      const [column, direction] = orderBy;
      qb.orderBy(column.path, direction);
    }
  }

  /**
   * Applies the limit, always present, and the offset, only when one was
   * meaningfully requested.
   * @param qb The TypeORM SelectQueryBuilder.
   */
  public applyPagination(qb: SelectQueryBuilder<T>): void {
    qb.limit(this._queryState.getLimit());

    const offset = this._queryState.getOffset();
    if (offset !== undefined) {
      qb.offset(offset);
    }
  }
}

import { ConversionError } from '../errors.js';
import type { ResolvedColumn } from './query-target.js';

export const MAX_LIMIT = 10000;

export type OrderDirection = 'ASC' | 'DESC';

export interface PaginationOptions {
  limit?: number;
  offset?: number;
  orderBy?: string;
  ascending?: boolean;
}

/**
 * Holds the state of one query being built: the effective limit and
 * offset, the resolved order column and whether a WHERE clause exists.
 * A new instance is created for every translated request.
 */
export class QueryState {
  private _limit: number = MAX_LIMIT;
  private _limitWasClamped: boolean = false;
  private _offset: number | undefined = undefined;
  private _orderBy: [ResolvedColumn, OrderDirection] | undefined = undefined;
  private _queryHasWhereClauses: boolean = false;

  /**
   * Records limit and offset. The limit defaults to and never exceeds
   * MAX_LIMIT; an offset of 0 is the same as no offset.
   * @throws ConversionError for negative or non-integer values.
   */
  public recordPagination(limit?: number, offset?: number): void {
    if (limit !== undefined) {
      this.assertNonNegativeInteger('limit', limit);
      this._limit = Math.min(limit, MAX_LIMIT);
      this._limitWasClamped = limit > MAX_LIMIT;
    }
    if (offset !== undefined) {
      this.assertNonNegativeInteger('offset', offset);
    }
    this._offset = offset ? offset : undefined;
  }

  public recordOrderBy(column: ResolvedColumn, ascending: boolean): void {
    this._orderBy = [column, ascending ? 'ASC' : 'DESC'];
  }

  public getLimit(): number {
    return this._limit;
  }

  public limitWasClamped(): boolean {
    return this._limitWasClamped;
  }

  public getOffset(): number | undefined {
    return this._offset;
  }

  public getOrderBy(): [ResolvedColumn, OrderDirection] | undefined {
    return this._orderBy;
  }

  public setQueryHasWhereClauses(value: boolean): void {
    this._queryHasWhereClauses = value;
  }

  public hasWhereClauses(): boolean {
    return this._queryHasWhereClauses;
  }

  private assertNonNegativeInteger(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
      throw new ConversionError(name, String(value), 'a non-negative integer');
    }
  }
}

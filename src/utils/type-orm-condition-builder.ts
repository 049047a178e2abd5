import {
  Brackets,
  type ObjectLiteral,
  type SelectQueryBuilder,
  type WhereExpressionBuilder,
} from 'typeorm';
import type { TypeOrmConditionFragment } from './type-orm-filter-fragment-builder.js';

/**
 * TypeOrmConditionBuilder combines condition fragments into the WHERE
 * clause of a query. Fragments are always joined with AND.
 */
export class TypeOrmConditionBuilder {
  /**
   * Applies a condition to a TypeORM QueryBuilder, using `where` for the
   * first condition of a bracket and `andWhere` afterwards.
   * @param qb The TypeORM SelectQueryBuilder or WhereExpressionBuilder.
   * @param fragment The condition fragment to apply.
   * @param isFirstInThisBracket True if this is the first condition in its bracket.
   */
  public applyConditionToQueryBuilder(
    qb: WhereExpressionBuilder,
    fragment: TypeOrmConditionFragment,
    isFirstInThisBracket: boolean,
  ): void {
    if (isFirstInThisBracket) {
      qb.where(fragment.queryFragment, fragment.parameters);
    } else {
      qb.andWhere(fragment.queryFragment, fragment.parameters);
    }
  }

  /**
   * Adds all fragments as one bracketed conjunction.
   * @returns True if a WHERE clause was added. No clause at all is added
   * for an empty list.
   */
  public applyConjunction<T extends ObjectLiteral>(
    qb: SelectQueryBuilder<T>,
    fragments: ReadonlyArray<TypeOrmConditionFragment>,
  ): boolean {
    if (fragments.length === 0) {
      return false;
    }

    const rootBracket = new Brackets((bracketQb) => {
      fragments.forEach((fragment, index) => {
        this.applyConditionToQueryBuilder(bracketQb, fragment, index === 0);
      });
    });
    qb.where(rootBracket);
    return true;
  }
}

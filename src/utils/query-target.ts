import type {
  EntityMetadata,
  ObjectLiteral,
  SelectQueryBuilder,
} from 'typeorm';
import type { FieldTypeCategory } from './field-type-classifier.js';

export type ColumnMetadata = EntityMetadata['columns'][number];
export type RelationMetadata = EntityMetadata['relations'][number];

export enum QueryTargetKind {
  FLAT_SELECTION = 'flat_selection',
  RELATIONAL_ENTITY = 'relational_entity',
}

export enum RelationshipKind {
  TO_MANY = 'to_many',
  TO_ONE = 'to_one',
}

export interface ResolvedColumn {
  /** The column name as the target knows it. */
  readonly name: string;
  /** Escaped, alias-qualified SQL reference. */
  readonly path: string;
  readonly category: FieldTypeCategory | undefined;
}

export interface ResolvedRelationship {
  readonly name: string;
  readonly kind: RelationshipKind;
  /** The related entity, aliased for use inside a correlated subquery. */
  readonly target: IQueryTarget<ObjectLiteral>;
  /** SQL condition tying a row of `target` to the current outer row. */
  readonly correlation: string;
}

/**
 * Capabilities shared by every kind of query target.
 */
export interface IQueryTarget<T extends ObjectLiteral> {
  readonly kind: QueryTargetKind;
  readonly alias: string;

  /**
   * @throws ColumnNotFoundError
   */
  resolveColumn(name: string): ResolvedColumn;

  /**
   * @throws NotMappedError when `name` is not a traversable relationship.
   */
  resolveRelationship(name: string): ResolvedRelationship;

  /**
   * Returns a fresh, unfiltered select over the target.
   */
  buildSelect(): SelectQueryBuilder<T>;
}

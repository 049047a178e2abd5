import type {
  DataSource,
  EntityMetadata,
  EntityTarget,
  ObjectLiteral,
  SelectQueryBuilder,
} from 'typeorm';
import { ColumnNotFoundError, NotMappedError } from '../errors.js';
import { classifyFieldType } from './field-type-classifier.js';
import {
  type ColumnMetadata,
  type IQueryTarget,
  QueryTargetKind,
  type RelationMetadata,
  RelationshipKind,
  type ResolvedColumn,
  type ResolvedRelationship,
} from './query-target.js';

/**
 * An entity known to a TypeORM DataSource. Columns are looked up by entity
 * property name; relationships come from the entity's relation metadata.
 */
export class RelationalEntity<T extends ObjectLiteral>
  implements IQueryTarget<T>
{
  public readonly kind = QueryTargetKind.RELATIONAL_ENTITY;
  public readonly alias: string;
  private readonly _metadata: EntityMetadata;

  constructor(
    private readonly _dataSource: DataSource,
    private readonly _target: EntityTarget<T>,
    alias?: string,
  ) {
    this._metadata = _dataSource.getMetadata(_target);
    this.alias = alias ?? this._metadata.tableName;
  }

  public buildSelect(): SelectQueryBuilder<T> {
    return this._dataSource
      .getRepository(this._target)
      .createQueryBuilder(this.alias);
  }

  public resolveColumn(name: string): ResolvedColumn {
    const column = this._metadata.findColumnWithPropertyName(name);
    // Implicit join columns carry the relation's property name.
    if (!column || this._metadata.findRelationWithPropertyPath(name)) {
      throw new ColumnNotFoundError(name);
    }
    return {
      name,
      path: this.qualify(this.alias, column),
      category: classifyFieldType(column.type),
    };
  }

  public resolveRelationship(name: string): ResolvedRelationship {
    const relation = this._metadata.findRelationWithPropertyPath(name);
    if (!relation) {
      throw new NotMappedError(name);
    }
    if (relation.isManyToMany) {
      throw new NotMappedError(name, 'is a many-to-many relationship');
    }

    const related = new RelationalEntity<ObjectLiteral>(
      this._dataSource,
      relation.inverseEntityMetadata.target,
      `${this.alias}_${relation.propertyName}`,
    );

    return {
      name,
      kind:
        relation.isOneToMany
          ? RelationshipKind.TO_MANY
          : RelationshipKind.TO_ONE,
      target: related,
      correlation: this.buildCorrelation(name, relation, related.alias),
    };
  }

  /**
   * Equates the join columns of the owning side with the columns they
   * reference, whichever side of the relation the current entity is on.
   */
  private buildCorrelation(
    name: string,
    relation: RelationMetadata,
    relatedAlias: string,
  ): string {
    const owning = relation.isOwning;
    const joinColumns = owning
      ? relation.joinColumns
      : (relation.inverseRelation?.joinColumns ?? []);

    if (joinColumns.length === 0) {
      throw new NotMappedError(name, 'has no join columns');
    }

    return joinColumns
      .map((joinColumn) => {
        const referenced = joinColumn.referencedColumn;
        if (!referenced) {
          throw new NotMappedError(name, 'has no referenced column');
        }
        return owning
          ? `${this.qualify(relatedAlias, referenced)} = ${this.qualify(this.alias, joinColumn)}`
          : `${this.qualify(relatedAlias, joinColumn)} = ${this.qualify(this.alias, referenced)}`;
      })
      .join(' AND ');
  }

  private qualify(alias: string, column: ColumnMetadata): string {
    const { driver } = this._dataSource;
    return `${driver.escape(alias)}.${driver.escape(column.databaseName)}`;
  }
}

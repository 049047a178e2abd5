import type {
  DataSource,
  EntityTarget,
  ObjectLiteral,
  SelectQueryBuilder,
} from 'typeorm';
import { ColumnNotFoundError, NotMappedError } from '../errors.js';
import {
  classifyFieldType,
  type FieldTypeDeclaration,
} from './field-type-classifier.js';
import {
  type IQueryTarget,
  QueryTargetKind,
  type ResolvedColumn,
  type ResolvedRelationship,
} from './query-target.js';

export interface FlatColumn {
  readonly name: string;
  readonly type: FieldTypeDeclaration;
}

export const FLAT_SELECTION_ALIAS = 'query';

/**
 * Any select (a table, a join, a view-like query) seen as a flat set of
 * named, typed columns. The source query is wrapped as a subquery so that
 * filters address its output columns, never the underlying tables.
 */
export class FlatSelection implements IQueryTarget<ObjectLiteral> {
  public readonly kind = QueryTargetKind.FLAT_SELECTION;
  private readonly _columns: ReadonlyArray<FlatColumn>;

  constructor(
    private readonly _source: SelectQueryBuilder<ObjectLiteral>,
    columns: ReadonlyArray<FlatColumn>,
    public readonly alias: string = FLAT_SELECTION_ALIAS,
  ) {
    this._columns = Object.freeze([...columns]);
  }

  /**
   * Selects every column of an entity under its database name.
   */
  static fromEntity<E extends ObjectLiteral>(
    dataSource: DataSource,
    target: EntityTarget<E>,
  ): FlatSelection {
    const metadata = dataSource.getMetadata(target);
    const sourceAlias = metadata.tableName;
    const source = dataSource.createQueryBuilder();
    source.from(target, sourceAlias);
    const columns: FlatColumn[] = [];

    metadata.columns.forEach((column, index) => {
      const selection = `${sourceAlias}.${column.propertyPath}`;
      if (index === 0) {
        source.select(selection, column.databaseName);
      } else {
        source.addSelect(selection, column.databaseName);
      }
      columns.push({ name: column.databaseName, type: column.type });
    });

    return new FlatSelection(source, columns);
  }

  public get columns(): ReadonlyArray<FlatColumn> {
    return this._columns;
  }

  public buildSelect(): SelectQueryBuilder<ObjectLiteral> {
    return this._source.connection
      .createQueryBuilder()
      .select('*')
      .from(`(${this._source.getQuery()})`, this.alias)
      .setParameters(this._source.getParameters());
  }

  /**
   * Case-insensitive exact match against the declared column names.
   */
  public resolveColumn(name: string): ResolvedColumn {
    const wanted = name.toLowerCase();
    const column = this._columns.find((c) => c.name.toLowerCase() === wanted);
    if (!column) {
      throw new ColumnNotFoundError(name);
    }

    const { driver } = this._source.connection;
    return {
      name: column.name,
      path: `${driver.escape(this.alias)}.${driver.escape(column.name)}`,
      category: classifyFieldType(column.type),
    };
  }

  public resolveRelationship(name: string): ResolvedRelationship {
    throw new NotMappedError(name, 'cannot be traversed on a flat selection');
  }
}

import type { ColumnType } from 'typeorm';

export enum FieldTypeCategory {
  INTEGER = 'integer',
  BOOLEAN = 'boolean',
  TEXT = 'text',
  TIMESTAMP = 'timestamp',
}

/**
 * A column type wrapped in an application-level type (e.g. an `email` type
 * stored as `varchar`). Classification looks through the wrapper to `impl`.
 */
export interface DecoratedFieldType {
  readonly name?: string;
  readonly impl: FieldTypeDeclaration;
}

export type FieldTypeDeclaration = ColumnType | DecoratedFieldType;

const CATEGORY_BY_TYPE_NAME: ReadonlyMap<string, FieldTypeCategory> = new Map(
  [
    ...[
      'int',
      'int2',
      'int4',
      'int8',
      'integer',
      'tinyint',
      'smallint',
      'mediumint',
      'bigint',
    ].map((name) => [name, FieldTypeCategory.INTEGER] as const),
    ...['boolean', 'bool'].map(
      (name) => [name, FieldTypeCategory.BOOLEAN] as const,
    ),
    ...[
      'varchar',
      'character varying',
      'nvarchar',
      'national varchar',
      'char',
      'character',
      'nchar',
      'text',
      'tinytext',
      'mediumtext',
      'longtext',
      'string',
      'citext',
      'uuid',
    ].map((name) => [name, FieldTypeCategory.TEXT] as const),
    ...[
      'timestamp',
      'timestamptz',
      'timestamp with time zone',
      'timestamp without time zone',
      'datetime',
      'datetime2',
      'datetimeoffset',
      'date',
    ].map((name) => [name, FieldTypeCategory.TIMESTAMP] as const),
  ],
);

function isDecoratedFieldType(
  type: FieldTypeDeclaration,
): type is DecoratedFieldType {
  return typeof type === 'object' && type !== null && 'impl' in type;
}

/**
 * Classifies a declared column type into the category operators are
 * restricted by. Returns `undefined` for types no typed operator accepts.
 */
export function classifyFieldType(
  type: FieldTypeDeclaration | undefined,
): FieldTypeCategory | undefined {
  if (type === undefined) {
    return undefined;
  }
  if (isDecoratedFieldType(type)) {
    return classifyFieldType(type.impl);
  }

  switch (type) {
    case Number:
      return FieldTypeCategory.INTEGER;
    case Boolean:
      return FieldTypeCategory.BOOLEAN;
    case String:
      return FieldTypeCategory.TEXT;
    case Date:
      return FieldTypeCategory.TIMESTAMP;
  }

  if (typeof type !== 'string') {
    return undefined;
  }
  return CATEGORY_BY_TYPE_NAME.get(type.toLowerCase());
}

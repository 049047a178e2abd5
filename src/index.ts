export { TypeOrmQueryStringTranslator } from './type-orm.query-string.translator.js';
export * from './errors.js';
export {
  buildFilters,
  parseFilter,
  splitOperator,
  OPERATOR_DELIMITER,
  type FilterDescriptor,
  type QueryStringInput,
} from './utils/query-key-parser.js';
export {
  classifyFieldType,
  FieldTypeCategory,
  type DecoratedFieldType,
  type FieldTypeDeclaration,
} from './utils/field-type-classifier.js';
export {
  convertList,
  convertValue,
  type ConvertedValue,
} from './utils/value-converter.js';
export {
  DEFAULT_OPERATOR,
  getOperator,
  OperatorArity,
  OPERATORS,
  RELATIONSHIP_OPERATOR,
  requiresCategory,
  type OperatorDefinition,
} from './utils/operator-registry.js';
export {
  QueryTargetKind,
  RelationshipKind,
  type IQueryTarget,
  type ResolvedColumn,
  type ResolvedRelationship,
} from './utils/query-target.js';
export {
  FlatSelection,
  FLAT_SELECTION_ALIAS,
  type FlatColumn,
} from './utils/flat-selection.target.js';
export { RelationalEntity } from './utils/relational-entity.target.js';
export { MAX_LIMIT, type PaginationOptions } from './utils/query-state.js';
export {
  extractRequestParameters,
  type RequestParameters,
} from './utils/request-parameters.js';

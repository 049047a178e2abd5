import { describe, expect, it } from 'vitest';
import {
  getOperator,
  OperatorArity,
  OPERATORS,
  requiresCategory,
  type OperatorDefinition,
} from '../../utils/operator-registry.js';
import { FieldTypeCategory } from '../../utils/field-type-classifier.js';
import { TypeOrmParameterManager } from '../../utils/type-orm-parameter-manager.js';

function operator(symbol: string): OperatorDefinition {
  const definition = getOperator(symbol);
  if (!definition) {
    throw new Error(`Operator ${symbol} is not registered`);
  }
  return definition;
}

describe('Operator registry', () => {
  it('should register the full catalogue', () => {
    expect([...OPERATORS.keys()].sort()).toEqual(
      [
        'is_null',
        'is_not_null',
        'is_true',
        'is_false',
        'eq',
        'ne',
        'ieq',
        'gt',
        'gte',
        'lt',
        'lte',
        'like',
        'not_like',
        'ilike',
        'not_ilike',
        'in',
        'not_in',
        'with',
      ].sort(),
    );
  });

  it('should not return unknown operators', () => {
    expect(getOperator('between')).toBeUndefined();
  });

  it('should assign arities', () => {
    expect(operator('is_null').arity).toBe(OperatorArity.UNARY);
    expect(operator('is_true').arity).toBe(OperatorArity.UNARY);
    expect(operator('eq').arity).toBe(OperatorArity.BINARY);
    expect(operator('not_ilike').arity).toBe(OperatorArity.BINARY);
    expect(operator('in').arity).toBe(OperatorArity.LIST);
    expect(operator('with').arity).toBe(OperatorArity.RELATIONSHIP);
  });

  it('should be read-only', () => {
    expect(Object.isFrozen(OPERATORS)).toBe(true);
    expect(Object.isFrozen(operator('eq'))).toBe(true);
    if (!(OPERATORS instanceof Map)) {
      throw new Error('OPERATORS must be a Map');
    }
    expect(() => OPERATORS.set('eq', operator('ne'))).toThrow(TypeError);
    expect(() => OPERATORS.delete('eq')).toThrow(TypeError);
    expect(operator('eq').symbol).toBe('eq');
  });

  describe('requiresCategory', () => {
    it('should accept null checks for every column, classified or not', () => {
      for (const category of [...Object.values(FieldTypeCategory), undefined]) {
        expect(requiresCategory(operator('is_null'), category)).toBe(true);
        expect(requiresCategory(operator('is_not_null'), category)).toBe(true);
      }
    });

    it('should restrict boolean operators to boolean columns', () => {
      expect(
        requiresCategory(operator('is_true'), FieldTypeCategory.BOOLEAN),
      ).toBe(true);
      expect(
        requiresCategory(operator('is_false'), FieldTypeCategory.INTEGER),
      ).toBe(false);
    });

    it('should restrict ordering operators to integer and timestamp columns', () => {
      expect(requiresCategory(operator('gt'), FieldTypeCategory.INTEGER)).toBe(
        true,
      );
      expect(
        requiresCategory(operator('lte'), FieldTypeCategory.TIMESTAMP),
      ).toBe(true);
      expect(requiresCategory(operator('gt'), FieldTypeCategory.TEXT)).toBe(
        false,
      );
    });

    it('should restrict pattern operators to text columns', () => {
      expect(requiresCategory(operator('like'), FieldTypeCategory.TEXT)).toBe(
        true,
      );
      expect(
        requiresCategory(operator('like'), FieldTypeCategory.INTEGER),
      ).toBe(false);
      expect(
        requiresCategory(operator('ieq'), FieldTypeCategory.TIMESTAMP),
      ).toBe(false);
    });

    it('should restrict list operators to integer and text columns', () => {
      expect(requiresCategory(operator('in'), FieldTypeCategory.TEXT)).toBe(
        true,
      );
      expect(
        requiresCategory(operator('not_in'), FieldTypeCategory.TIMESTAMP),
      ).toBe(false);
    });

    it('should reject typed operators on unclassified columns', () => {
      expect(requiresCategory(operator('eq'), undefined)).toBe(false);
    });
  });

  describe('handlers', () => {
    const field = '"user"."u_name"';

    it('should build comparison fragments with generated parameters', () => {
      const definition = operator('ne');
      if (definition.arity !== OperatorArity.BINARY) {
        throw new Error('ne must be binary');
      }

      expect(
        definition.handler.build(field, 'Oli', new TypeOrmParameterManager()),
      ).toEqual({
        queryFragment: '"user"."u_name" != :param_0',
        parameters: { param_0: 'Oli' },
      });
    });

    it('should lowercase both sides for ieq', () => {
      const definition = operator('ieq');
      if (definition.arity !== OperatorArity.BINARY) {
        throw new Error('ieq must be binary');
      }

      expect(
        definition.handler.build(field, 'OLI', new TypeOrmParameterManager()),
      ).toEqual({
        queryFragment: 'LOWER("user"."u_name") = :param_0',
        parameters: { param_0: 'oli' },
      });
    });

    it('should build case-insensitive negated patterns', () => {
      const definition = operator('not_ilike');
      if (definition.arity !== OperatorArity.BINARY) {
        throw new Error('not_ilike must be binary');
      }

      expect(
        definition.handler.build(field, '%O%', new TypeOrmParameterManager()),
      ).toEqual({
        queryFragment: 'LOWER("user"."u_name") NOT LIKE LOWER(:param_0)',
        parameters: { param_0: '%O%' },
      });
    });

    it('should build list fragments', () => {
      const definition = operator('not_in');
      if (definition.arity !== OperatorArity.LIST) {
        throw new Error('not_in must be a list operator');
      }

      expect(
        definition.handler.build(
          '"user"."u_id"',
          [1, 3],
          new TypeOrmParameterManager(),
        ),
      ).toEqual({
        queryFragment: '"user"."u_id" NOT IN (:...param_0)',
        parameters: { param_0: [1, 3] },
      });
    });

    it('should build unary fragments without parameters', () => {
      const isTrue = operator('is_true');
      const isNotNull = operator('is_not_null');
      if (
        isTrue.arity !== OperatorArity.UNARY ||
        isNotNull.arity !== OperatorArity.UNARY
      ) {
        throw new Error('is_true and is_not_null must be unary');
      }

      expect(
        isTrue.handler.build(
          '"user"."u_active"',
          undefined,
          new TypeOrmParameterManager(),
        ),
      ).toEqual({ queryFragment: '"user"."u_active" = TRUE', parameters: {} });
      expect(
        isNotNull.handler.build(field, undefined, new TypeOrmParameterManager()),
      ).toEqual({ queryFragment: '"user"."u_name" IS NOT NULL', parameters: {} });
    });
  });
});

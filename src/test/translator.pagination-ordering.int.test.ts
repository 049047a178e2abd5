import {
  afterAll,
  afterEach,
  beforeAll,
  beforeEach,
  describe,
  expect,
  it,
  vi,
} from 'vitest';
import type { DataSource } from 'typeorm';
import {
  createSeededDataSource,
  teardownDataSourceService,
} from './utils/type-orm.utils.js';
import { UserEntity } from './utils/entities/user.entity.js';
import type { User } from './utils/fake-entities.js';
import { TypeOrmQueryStringTranslator } from '../type-orm.query-string.translator.js';
import { RelationalEntity } from '../utils/relational-entity.target.js';
import { ConversionError } from '../errors.js';
import { MAX_LIMIT } from '../utils/query-state.js';

describe('TypeOrmQueryStringTranslator - Pagination and Ordering', () => {
  let dataSource: DataSource;
  let translator: TypeOrmQueryStringTranslator;
  let users: RelationalEntity<User>;

  beforeAll(async () => {
    dataSource = await createSeededDataSource();
  });

  afterAll(async () => {
    await teardownDataSourceService(dataSource);
  });

  beforeEach(() => {
    translator = new TypeOrmQueryStringTranslator();
    users = new RelationalEntity(dataSource, UserEntity);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should apply the maximum limit by default', () => {
    const qb = translator.apply(users, []);

    expect(qb.expressionMap.limit).toBe(MAX_LIMIT);
    expect(qb.expressionMap.offset).toBeUndefined();
  });

  it('should apply a requested limit', async () => {
    const result = await translator
      .apply(users, [], { limit: 2, orderBy: 'u_id' })
      .getMany();

    expect(result.map((user) => user.u_id)).toEqual([1, 2]);
  });

  it('should clamp a limit above the maximum and warn about it', () => {
    const log = vi.spyOn(dataSource.logger, 'log');

    const qb = translator.apply(users, [], { limit: 999999 });

    expect(qb.expressionMap.limit).toBe(MAX_LIMIT);
    expect(log).toHaveBeenCalledWith(
      'warn',
      `Requested limit clamped to ${MAX_LIMIT}`,
    );
  });

  it('should not warn for a limit within range', () => {
    const log = vi.spyOn(dataSource.logger, 'log');

    translator.apply(users, [], { limit: MAX_LIMIT });

    expect(log).not.toHaveBeenCalledWith('warn', expect.anything());
    expect(log).toHaveBeenCalledWith('info', expect.any(String));
  });

  it('should accept a limit of zero', async () => {
    const result = await translator.apply(users, [], { limit: 0 }).getMany();

    expect(result).toEqual([]);
  });

  it('should skip rows with an offset', async () => {
    const result = await translator
      .apply(users, [], { offset: 2, orderBy: 'u_id' })
      .getMany();

    expect(result.map((user) => user.u_name)).toEqual(['Tom']);
  });

  it('should omit an offset of zero', () => {
    const qb = translator.apply(users, [], { offset: 0 });

    expect(qb.expressionMap.offset).toBeUndefined();
  });

  it('should order descending', async () => {
    const result = await translator
      .apply(users, [], { orderBy: 'u_id', ascending: false })
      .getMany();

    expect(result.map((user) => user.u_id)).toEqual([3, 2, 1]);
  });

  it('should order by a text column', async () => {
    const result = await translator
      .apply(users, [], { orderBy: 'u_name' })
      .getMany();

    expect(result.map((user) => user.u_name)).toEqual(['Micha', 'Oli', 'Tom']);
  });

  it('should reject negative or fractional pagination', () => {
    expect(() => translator.apply(users, [], { limit: -1 })).toThrow(
      ConversionError,
    );
    expect(() => translator.apply(users, [], { offset: -5 })).toThrow(
      ConversionError,
    );
    expect(() => translator.apply(users, [], { limit: 1.5 })).toThrow(
      ConversionError,
    );
  });

  describe('translate', () => {
    it('should read pagination from reserved query keys', async () => {
      const result = await translator
        .translate(users, { _limit: '2', _order: 'u_id', _desc: '' })
        .getMany();

      expect(result.map((user) => user.u_id)).toEqual([3, 2]);
    });

    it('should combine reserved keys with filters', async () => {
      const result = await translator
        .translate(
          users,
          new URLSearchParams('u_active__is_true=&_order=u_name&_offset=1'),
        )
        .getMany();

      expect(result.map((user) => user.u_name)).toEqual(['Tom']);
    });

    it('should reject a non-integer limit', () => {
      expect(() => translator.translate(users, { _limit: 'all' })).toThrow(
        ConversionError,
      );
    });
  });
});

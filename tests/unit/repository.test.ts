import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { knex } from 'knex';
import type { Knex } from 'knex';
import { z } from 'zod';
import logger from '../../src/infra/logger/logger.js';
import { InMemoryCacheService, type ICacheService } from '../../src/infra/cache/index.js';
import { BaseRepository, type RepositoryOptions } from '../../src/infra/db/repositories/BaseRepository.js';
import { ProductRepository, isDuplicateKeyError } from '../../src/infra/db/repositories/ProductRepository.js';
import { TransactionManager } from '../../src/infra/db/TransactionManager.js';
import { Product } from '../../src/domain/models/Product.js';
import { ConflictError, TimeoutError } from '../../src/shared/errors/index.js';

const CREATED_AT = '2024-01-01T00:00:00.000Z';

const createTestDb = (): Knex =>
  knex({ client: 'better-sqlite3', connection: { filename: ':memory:' }, useNullAsDefault: true });

const widgetSchema = z.object({ id: z.number(), label: z.string() });
type Widget = z.infer<typeof widgetSchema>;

/** Exposes the protected helpers of BaseRepository */
class WidgetRepository extends BaseRepository {
  constructor(db: Knex, cache: ICacheService, options: Partial<RepositoryOptions> = {}) {
    super(db, cache, logger, {
      tableName: 'widgets',
      cachePrefix: 'widget',
      queryTimeoutMs: 100,
      cacheTtlSeconds: 60,
      ...options,
    });
  }

  query<R>(operation: string, query: () => Promise<R>): Promise<R> {
    return this.run(operation, query);
  }

  load(id: number, loader: () => Promise<Widget | null>): Promise<Widget | null> {
    return this.cached(this.idKey(id), widgetSchema, loader);
  }

  save<R>(work: () => Promise<R>): Promise<R> {
    return this.write(work);
  }
}

describe('BaseRepository', () => {
  let db: Knex;
  let cache: InMemoryCacheService;
  let repository: WidgetRepository;

  beforeEach(() => {
    db = createTestDb();
    cache = new InMemoryCacheService(60);
    repository = new WidgetRepository(db, cache);
  });

  afterEach(async () => {
    vi.useRealTimers();
    await db.destroy();
  });

  describe('run', () => {
    it('should return the query result', async () => {
      await expect(repository.query('findAll', () => Promise.resolve(['a', 'b']))).resolves.toEqual(['a', 'b']);
    });

    it('should warn about queries slower than 80% of the timeout', async () => {
      vi.useFakeTimers();
      const warn = vi.spyOn(logger, 'warn');

      const pending = repository.query(
        'search',
        () => new Promise<string>((resolve) => setTimeout(() => resolve('done'), 90))
      );
      await vi.advanceTimersByTimeAsync(90);

      await expect(pending).resolves.toBe('done');
      expect(warn).toHaveBeenCalledWith(
        { table: 'widgets', operation: 'search', durationMs: 90, thresholdMs: 80, timeoutMs: 100 },
        'Slow query detected in widgets'
      );
    });

    it('should turn an overdue query into a 504 TimeoutError', async () => {
      vi.useFakeTimers();

      const pending = repository.query('stuck', () => new Promise<string>(() => undefined));
      const assertion = expect(pending).rejects.toMatchObject({
        statusCode: 504,
        code: 'TIMEOUT',
        message: "Operation 'widgets.stuck' timed out after 100ms",
      });
      await vi.advanceTimersByTimeAsync(100);

      await assertion;
      await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    });

    it('should rethrow query failures', async () => {
      await expect(repository.query('findAll', () => Promise.reject(new Error('syntax error')))).rejects.toThrow(
        'syntax error'
      );
    });
  });

  describe('cached', () => {
    it('should load once and serve later reads from the cache', async () => {
      const loader = vi.fn(() => Promise.resolve({ id: 1, label: 'first' }));

      expect(await repository.load(1, loader)).toEqual({ id: 1, label: 'first' });
      expect(await repository.load(1, loader)).toEqual({ id: 1, label: 'first' });
      expect(loader).toHaveBeenCalledTimes(1);
      expect(await cache.get('widget:id:1')).toEqual({ id: 1, label: 'first' });
    });

    it('should not cache missing rows', async () => {
      const loader = vi.fn(() => Promise.resolve(null));

      await repository.load(1, loader);
      await repository.load(1, loader);

      expect(loader).toHaveBeenCalledTimes(2);
    });

    it('should reload over a malformed cache entry', async () => {
      await cache.set('widget:id:1', { id: 'one' });

      expect(await repository.load(1, () => Promise.resolve({ id: 1, label: 'fresh' }))).toEqual({
        id: 1,
        label: 'fresh',
      });
      expect(await cache.get('widget:id:1')).toEqual({ id: 1, label: 'fresh' });
    });

    it('should not cache a row loaded while a write was running', async () => {
      let release: (row: Widget) => void = () => undefined;
      const loading = repository.load(
        1,
        () =>
          new Promise<Widget>((resolve) => {
            release = resolve;
          })
      );

      await repository.save(async () => {
        await cache.invalidate('widget:*');
      });
      release({ id: 1, label: 'before update' });

      expect(await loading).toEqual({ id: 1, label: 'before update' });
      expect(await cache.get('widget:id:1')).toBeUndefined();

      await repository.load(1, () => Promise.resolve({ id: 1, label: 'after update' }));
      expect(await cache.get('widget:id:1')).toEqual({ id: 1, label: 'after update' });
    });
  });
});

describe('TransactionManager', () => {
  let db: Knex;
  let cache: InMemoryCacheService;
  let transactions: TransactionManager;

  beforeEach(async () => {
    db = createTestDb();
    cache = new InMemoryCacheService(60);
    transactions = new TransactionManager(db, cache, logger);
    await cache.set('product:id:1', { id: 1 });
    await cache.set('order:id:1', { id: 1 });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('should clear the given patterns after commit', async () => {
    const result = await transactions.runInTransaction(
      async (trx) => {
        await trx.raw('select 1');
        return 'committed';
      },
      { invalidateCachePatterns: 'product:*' }
    );

    expect(result).toBe('committed');
    expect(await cache.get('product:id:1')).toBeUndefined();
    expect(await cache.get('order:id:1')).toEqual({ id: 1 });
  });

  it('should accept several patterns', async () => {
    await transactions.runInTransaction(() => Promise.resolve(), {
      invalidateCachePatterns: ['product:*', 'order:*'],
    });

    expect(cache.size).toBe(0);
  });

  it('should keep the cache when the transaction rolls back', async () => {
    await expect(
      transactions.runInTransaction(
        () => Promise.reject(new Error('constraint failed')),
        { invalidateCachePatterns: 'product:*' }
      )
    ).rejects.toThrow('constraint failed');

    expect(await cache.get('product:id:1')).toEqual({ id: 1 });
  });
});

/** Fails every transaction with the given error */
class FailingTransactions extends TransactionManager {
  constructor(
    db: Knex,
    cache: ICacheService,
    private readonly failure: Error
  ) {
    super(db, cache, logger);
  }

  override runInTransaction<T>(): Promise<T> {
    return Promise.reject(this.failure);
  }
}

describe('ProductRepository', () => {
  let db: Knex;
  let cache: InMemoryCacheService;
  let repository: ProductRepository;

  const options = { queryTimeoutMs: 1000, cacheTtlSeconds: 60 };

  beforeEach(async () => {
    db = createTestDb();
    cache = new InMemoryCacheService(60);
    repository = new ProductRepository(db, cache, logger, new TransactionManager(db, cache, logger), options);

    await db.schema.createTable('products', (table) => {
      table.increments('id');
      table.string('name', 100).notNullable();
      table.string('created_at').notNullable();
      table.string('updated_at').notNullable();
    });
    await db('products').insert({ name: 'Desk', created_at: CREATED_AT, updated_at: CREATED_AT });
    await db('products').insert({ name: 'Chair', created_at: CREATED_AT, updated_at: CREATED_AT });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('should read through the cache by id', async () => {
    expect((await repository.findById(1))?.name).toBe('Desk');
    expect(await cache.get('product:id:1')).toMatchObject({ id: 1, name: 'Desk' });

    await db('products').where('id', 1).update({ name: 'Renamed elsewhere' });

    expect((await repository.findById(1))?.name).toBe('Desk');
    expect(await repository.findById(99)).toBeNull();
  });

  it('should find names regardless of case and surrounding spaces', async () => {
    expect((await repository.findByName(' DESK '))?.id).toBe(1);
    expect(await repository.findByName('Lamp')).toBeNull();
  });

  it('should page in id order and count every row', async () => {
    expect((await repository.findAll(1, 1)).map((product) => product.name)).toEqual(['Chair']);
    expect(await repository.count()).toBe(2);
  });

  it('should drop cached rows once a delete commits', async () => {
    await repository.findById(1);

    expect(await repository.delete(1)).toBe(true);
    expect(await cache.get('product:id:1')).toBeUndefined();
    expect(await repository.findById(1)).toBeNull();
    expect(await repository.delete(1)).toBe(false);
  });

  describe('duplicate names', () => {
    const duplicateEntry = () =>
      Object.assign(new Error("Duplicate entry 'lamp' for key 'products.uq_products_name'"), {
        code: 'ER_DUP_ENTRY',
        errno: 1062,
      });

    const withFailingWrites = (failure: Error) =>
      new ProductRepository(db, cache, logger, new FailingTransactions(db, cache, failure), options);

    it('should map a unique index violation on create to ConflictError', async () => {
      const failing = withFailingWrites(duplicateEntry());

      await expect(failing.create(Product.create({ name: 'Lamp' }))).rejects.toMatchObject({
        statusCode: 409,
        code: 'CONFLICT',
        message: 'Product with name "Lamp" already exists',
        details: { field: 'name', value: 'Lamp' },
      });
    });

    it('should map a unique index violation on update to ConflictError', async () => {
      const failing = withFailingWrites(duplicateEntry());
      const product = Product.fromPersistence({
        id: 2,
        name: 'Lamp',
        created_at: CREATED_AT,
        updated_at: CREATED_AT,
      });

      await expect(failing.update(product)).rejects.toBeInstanceOf(ConflictError);
    });

    it('should pass other write failures through', async () => {
      const failing = withFailingWrites(new Error('connection lost'));

      await expect(failing.create(Product.create({ name: 'Lamp' }))).rejects.toThrow('connection lost');
    });

    it('should recognise mysql2 duplicate key errors by code or errno', () => {
      expect(isDuplicateKeyError({ code: 'ER_DUP_ENTRY' })).toBe(true);
      expect(isDuplicateKeyError({ errno: 1062 })).toBe(true);
      expect(isDuplicateKeyError({ code: 'ER_LOCK_DEADLOCK', errno: 1213 })).toBe(false);
      expect(isDuplicateKeyError('ER_DUP_ENTRY')).toBe(false);
    });
  });
});

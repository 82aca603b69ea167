import type { Entity } from './entity.js';
import { EntityCollection } from './entity-collection.js';
import type {
  DeleteOptions,
  DeleteTarget,
  LifecycleOptions,
  SoftDeleteOptions,
} from './entity-lifecycle.js';
import { EntityLifecycle } from './entity-lifecycle.js';
import type { FilterSpec } from './predicate-compiler.js';
import { QueryBuilder } from './query-builder.js';
import type { JsonObject, SchemaDescriptor, SchemaRegistry } from './schema.js';
import type { SerializeOptions } from './serializer.js';
import { serializeMany } from './serializer.js';
import type { SessionHandle } from './session.js';

export interface FindOptions {
  fields?: string[];
  include?: string[];
}

export interface FinderOptions extends FindOptions {
  filters?: FilterSpec;
  /** Signed order paths, or one comma-separated string */
  orders?: string | string[];
}

export interface ListOptions extends FinderOptions {
  offset?: number | null;
  limit?: number | null;
}

export interface Page<TRecord extends object> {
  items: EntityCollection<TRecord>;
  total: number;
}

const normalizeOrders = (orders: string | string[] | undefined): string[] => {
  if (!orders) {
    return [];
  }
  const list = typeof orders === 'string' ? orders.split(',') : orders;
  return list.map(order => order.trim()).filter(order => order.length > 0);
};

/**
 * Model-level finders and writes for one schema within one session.
 *
 * Reads go through {@link QueryBuilder}; writes delegate to an
 * {@link EntityLifecycle} built with the repository's options.
 */
export class Repository<TRecord extends object = object> {
  readonly schema: SchemaDescriptor<TRecord>;
  readonly registry: SchemaRegistry;
  readonly session: SessionHandle;
  readonly lifecycle: EntityLifecycle<TRecord>;

  constructor(
    schema: SchemaDescriptor<TRecord>,
    registry: SchemaRegistry,
    session: SessionHandle,
    options: LifecycleOptions<TRecord> = {}
  ) {
    this.schema = schema;
    this.registry = registry;
    this.session = session;
    this.lifecycle = new EntityLifecycle(schema, registry, session, options);
  }

  query(): QueryBuilder<TRecord> {
    return new QueryBuilder(this.schema, this.registry, this.session);
  }

  private build({ fields, filters, orders, include }: FinderOptions): QueryBuilder<TRecord> {
    return this.query().buildQuery({
      fields: fields ?? [],
      filters: filters ?? {},
      orders: normalizeOrders(orders),
      includes: include ?? [],
    });
  }

  async first(options: FinderOptions = {}): Promise<Entity<TRecord> | null> {
    return this.build(options).first();
  }

  async find(primaryKey: unknown, options: FindOptions = {}): Promise<Entity<TRecord> | null> {
    if (primaryKey === null || primaryKey === undefined) {
      return null;
    }
    return this.first({
      ...options,
      filters: { [`${this.schema.name}.${this.schema.primaryKey}`]: primaryKey },
    });
  }

  async findBy(field: string, value: unknown, options: FindOptions = {}): Promise<Entity<TRecord> | null> {
    return this.first({ ...options, filters: { [`${this.schema.name}.${field}`]: value } });
  }

  async all(options: ListOptions = {}): Promise<EntityCollection<TRecord>> {
    const builder = this.build(options);
    if (options.offset !== undefined) {
      builder.offset(options.offset);
    }
    if (options.limit !== undefined) {
      builder.limit(options.limit);
    }
    return new EntityCollection(await builder.all());
  }

  /**
   * Serialized rows for `options`, rendered with the same field list.
   */
  async allSerialized(
    options: ListOptions = {},
    serializeOptions: Omit<SerializeOptions, 'fields'> = {}
  ): Promise<JsonObject[]> {
    const items = await this.all(options);
    return serializeMany(items, { fields: options.fields ?? [], includes: serializeOptions.includes ?? [] });
  }

  /**
   * One page of results plus the total count under the same filters.
   */
  async paginate(options: ListOptions = {}): Promise<Page<TRecord>> {
    const items = await this.all(options);
    const total = await this.count(options.filters);
    return { items, total };
  }

  async count(filters?: FilterSpec): Promise<number> {
    return this.query().where(filters ?? null).count();
  }

  /**
   * Whether a record has `field` (primary key by default) equal to `value`,
   * optionally ignoring the record whose primary key is `excludeValue`.
   */
  async exists(value: unknown, field?: string, excludeValue?: unknown): Promise<boolean> {
    if (value === null || value === undefined) {
      return false;
    }
    const filters: FilterSpec = { [field ?? this.schema.primaryKey]: value };
    if (excludeValue !== null && excludeValue !== undefined) {
      filters[`${this.schema.primaryKey}__ne`] = excludeValue;
    }
    return this.query().where(filters).exists();
  }

  findByUniqueColumns(data: JsonObject): Promise<Entity<TRecord> | null> {
    return this.lifecycle.findByUniqueColumns(data);
  }

  create(data: JsonObject = {}, entity?: Entity<TRecord>): Promise<Entity<TRecord> | null> {
    return this.lifecycle.create(data, entity);
  }

  update(data: JsonObject = {}, entity?: Entity<TRecord>): Promise<Entity<TRecord> | null> {
    return this.lifecycle.update(data, entity);
  }

  save(data: JsonObject = {}, entity?: Entity<TRecord>): Promise<Entity<TRecord> | null> {
    return this.lifecycle.save(data, entity);
  }

  upsert(data: JsonObject): Promise<Entity<TRecord> | null> {
    return this.lifecycle.upsert(data);
  }

  delete(target: Entity<TRecord> | DeleteTarget, options: DeleteOptions = {}): Promise<boolean> {
    return this.lifecycle.delete(target, options);
  }

  softDelete(entity: Entity<TRecord>, options: SoftDeleteOptions = {}): Promise<Entity<TRecord> | null> {
    return this.lifecycle.softDelete(entity, options);
  }

  restore(entity: Entity<TRecord>): Promise<Entity<TRecord> | null> {
    return this.lifecycle.restore(entity);
  }

  getOrCreate(data: JsonObject, filters?: FilterSpec): Promise<Entity<TRecord> | null> {
    return this.lifecycle.getOrCreate(data, filters);
  }

  createOrUpdate(data: JsonObject, filters?: FilterSpec): Promise<Entity<TRecord> | null> {
    return this.lifecycle.createOrUpdate(data, filters);
  }
}

export default Repository;

import { Entity } from './entity.js';
import { ConfigurationError, NotFound, ValidationError } from './errors.js';
import type { FilterSpec } from './predicate-compiler.js';
import { QueryBuilder } from './query-builder.js';
import type { JsonObject, SchemaDescriptor, SchemaRegistry } from './schema.js';
import { SOFT_DELETE_COLUMNS } from './schema.js';
import type { SessionHandle } from './session.js';
import type { TransactionOptions } from './transaction-hook-runner.js';
import { runWithTransaction } from './transaction-hook-runner.js';

/** Audit columns that mass assignment never writes */
export const AUDIT_FIELDS = ['created_at', 'creator', 'updated_at', 'updator'] as const;

type HookOutcome = boolean | Promise<boolean>;

/**
 * Optional lifecycle callbacks. A callback resolving `false` vetoes the
 * operation; a missing callback always proceeds.
 */
export interface LifecycleHooks<TRecord extends object = object> {
  beforeCreate?: (entity: Entity<TRecord>) => HookOutcome;
  afterCreate?: (entity: Entity<TRecord>) => HookOutcome;
  beforeUpdate?: (entity: Entity<TRecord>) => HookOutcome;
  afterUpdate?: (entity: Entity<TRecord>, prior: Entity<TRecord>) => HookOutcome;
  beforeSave?: (entity: Entity<TRecord>) => HookOutcome;
  afterSave?: (entity: Entity<TRecord>, prior: Entity<TRecord> | null) => HookOutcome;
  beforeDelete?: (entity: Entity<TRecord>) => HookOutcome;
  afterDelete?: (entity: Entity<TRecord>) => HookOutcome;
  beforeSoftDelete?: (entity: Entity<TRecord>) => HookOutcome;
  afterSoftDelete?: (entity: Entity<TRecord>) => HookOutcome;
  beforeRestore?: (entity: Entity<TRecord>) => HookOutcome;
  afterRestore?: (entity: Entity<TRecord>) => HookOutcome;
}

export interface LifecycleOptions<TRecord extends object = object>
  extends Omit<TransactionOptions, 'returnSelfOnSuccess'> {
  /** Extra columns excluded from mass assignment */
  guardFields?: string[];
  /** When non-empty, only these columns are mass-assignable */
  whitelistFields?: string[];
  /** Let `populate` write the primary key */
  allowManualPrimaryKey?: boolean;
  hooks?: LifecycleHooks<TRecord>;
}

export interface SoftDeleteOptions {
  by?: unknown;
  reason?: string;
}

export interface DeleteOptions {
  permanent?: boolean;
}

/** Lookup form accepted by {@link EntityLifecycle.delete} */
export interface DeleteTarget {
  value: unknown;
  field?: string;
}

/**
 * Persistence flows for one schema, bound to a session.
 *
 * Every write runs through {@link runWithTransaction}, so whether a call
 * commits, flushes or rolls back depends on the lifecycle's `autocommit`
 * option and on the session's transaction state at the time of the call.
 */
export class EntityLifecycle<TRecord extends object = object> {
  readonly schema: SchemaDescriptor<TRecord>;
  readonly registry: SchemaRegistry;
  readonly session: SessionHandle;
  readonly options: LifecycleOptions<TRecord>;
  private hooks: LifecycleHooks<TRecord>;

  constructor(
    schema: SchemaDescriptor<TRecord>,
    registry: SchemaRegistry,
    session: SessionHandle,
    options: LifecycleOptions<TRecord> = {}
  ) {
    this.schema = schema;
    this.registry = registry;
    this.session = session;
    this.options = options;
    this.hooks = options.hooks ?? {};
  }

  /**
   * Assign the mass-assignable subset of `data` to `entity`. Non-columns,
   * guard fields, the primary key (unless manual keys are allowed) and keys
   * outside a configured whitelist are skipped; strings are trimmed.
   */
  populate(entity: Entity<TRecord>, data: JsonObject | null | undefined): Entity<TRecord> {
    if (!data) {
      return entity;
    }

    const guarded = new Set<string>([...AUDIT_FIELDS, ...(this.options.guardFields ?? [])]);
    if (!this.options.allowManualPrimaryKey) {
      guarded.add(this.schema.primaryKey);
    }
    const whitelist = this.options.whitelistFields ?? [];

    for (const [key, value] of Object.entries(data)) {
      if (!this.schema.hasColumn(key) || guarded.has(key)) {
        continue;
      }
      if (whitelist.length > 0 && !whitelist.includes(key)) {
        continue;
      }
      entity.setValue(key, typeof value === 'string' ? value.trim() : value);
    }
    return entity;
  }

  /**
   * Insert a new entity built from `data` (or the entity given).
   */
  async create(data: JsonObject = {}, entity?: Entity<TRecord>): Promise<Entity<TRecord> | null> {
    const target = entity ?? new Entity(this.schema);
    return this.transaction('create', async () => {
      this.populate(target, data);
      if (!(await this.hook('beforeCreate', target)) || !(await this.hook('beforeSave', target))) {
        return null;
      }

      for (const column of SOFT_DELETE_COLUMNS) {
        target.unsetValue(column);
      }
      this.session.add(target);
      await this.session.flush();

      return (await this.hook('afterCreate', target)) && (await this.afterSave(target, null))
        ? target
        : null;
    });
  }

  /**
   * Update an existing record. The primary key comes from `entity` or from
   * `data`; the stored row is read first and handed to the after-hooks.
   *
   * @throws {ValidationError} when no primary key is available
   * @throws {NotFound} when no row has that key (nothing is written)
   */
  async update(data: JsonObject = {}, entity?: Entity<TRecord>): Promise<Entity<TRecord> | null> {
    const primaryKey = entity?.primaryKeyValue ?? data[this.schema.primaryKey];
    if (primaryKey === null || primaryKey === undefined) {
      throw new ValidationError(
        `Cannot update ${this.schema.name} without a primary key value`,
        this.schema.primaryKey
      );
    }

    return this.transaction('update', async () => {
      const prior = await this.session.get(this.schema, primaryKey);
      if (!prior) {
        throw new NotFound(`${this.schema.name} ${String(primaryKey)} does not exist`);
      }
      const target = entity ?? Entity.fromRow(this.schema, prior.snapshot());

      this.populate(target, data);
      if (!(await this.hook('beforeUpdate', target)) || !(await this.hook('beforeSave', target))) {
        return null;
      }

      this.session.add(target);
      await this.session.flush();

      return (await this.afterUpdate(target, prior)) && (await this.afterSave(target, prior))
        ? target
        : null;
    });
  }

  /**
   * Update when a primary key is present on the entity or in `data`,
   * otherwise create.
   */
  async save(data: JsonObject = {}, entity?: Entity<TRecord>): Promise<Entity<TRecord> | null> {
    const primaryKey = entity?.primaryKeyValue ?? data[this.schema.primaryKey];
    if (primaryKey === null || primaryKey === undefined) {
      return this.create(data, entity);
    }
    return this.update(data, entity);
  }

  /**
   * First record matching any unique column present in `data`, primary key
   * first.
   */
  async findByUniqueColumns(data: JsonObject): Promise<Entity<TRecord> | null> {
    for (const column of this.schema.uniqueColumns) {
      const value = data[column];
      if (value === undefined || value === null) {
        continue;
      }
      const match = await this.query().where({ [column]: value }).first();
      if (match) {
        return match;
      }
    }
    return null;
  }

  async upsert(data: JsonObject): Promise<Entity<TRecord> | null> {
    const existing = await this.findByUniqueColumns(data);
    return existing ? this.update(data, existing) : this.create(data);
  }

  /**
   * Mark an entity deleted. Already deleted entities succeed without a write.
   * @throws {ConfigurationError} when the schema has no `deleted_at` column
   */
  async softDelete(
    entity: Entity<TRecord>,
    { by, reason }: SoftDeleteOptions = {}
  ): Promise<Entity<TRecord> | null> {
    this.assertSoftDelete('soft deletion');

    return this.transaction('softDelete', async () => {
      if (entity.isDeleted) {
        return entity;
      }
      if (!(await this.hook('beforeSoftDelete', entity))) {
        return null;
      }

      entity.setValue('deleted_at', new Date());
      if (by !== undefined && this.schema.hasColumn('deleted_by')) {
        entity.setValue('deleted_by', by);
      }
      if (reason !== undefined && this.schema.hasColumn('deletion_reason')) {
        entity.setValue('deletion_reason', reason);
      }
      this.session.add(entity);
      await this.session.flush();

      return (await this.hook('afterSoftDelete', entity)) ? entity : null;
    });
  }

  /**
   * Clear the soft-delete columns. Entities that are not deleted succeed
   * without a write.
   */
  async restore(entity: Entity<TRecord>): Promise<Entity<TRecord> | null> {
    this.assertSoftDelete('restore');

    return this.transaction('restore', async () => {
      if (!entity.isDeleted) {
        return entity;
      }
      if (!(await this.hook('beforeRestore', entity))) {
        return null;
      }

      for (const column of SOFT_DELETE_COLUMNS) {
        if (this.schema.hasColumn(column)) {
          entity.setValue(column, null);
        }
      }
      this.session.add(entity);
      await this.session.flush();

      return (await this.hook('afterRestore', entity)) ? entity : null;
    });
  }

  /**
   * Delete an entity, or the first record whose `field` (primary key by
   * default) equals `value`. Schemas with soft deletion are soft-deleted
   * unless `permanent` is set.
   *
   * @returns whether the deletion went through
   * @throws {NotFound} when there is nothing to delete
   */
  async delete(
    target: Entity<TRecord> | DeleteTarget,
    { permanent = false }: DeleteOptions = {}
  ): Promise<boolean> {
    const entity = await this.resolveDeleteTarget(target);

    if (this.schema.supportsSoftDelete && !permanent) {
      return (await this.softDelete(entity)) !== null;
    }

    const outcome = await this.transaction(
      'delete',
      async () => {
        if (!(await this.hook('beforeDelete', entity))) {
          return null;
        }
        this.session.delete(entity);
        await this.session.flush();
        return (await this.hook('afterDelete', entity)) ? entity : null;
      },
      { refreshOnCommit: false }
    );

    return outcome !== null;
  }

  /**
   * First record matching `filters` (default: `data`), created from `data`
   * when none exists.
   */
  async getOrCreate(data: JsonObject, filters?: FilterSpec): Promise<Entity<TRecord> | null> {
    const existing = await this.query().where(filters ?? data).first();
    return existing ?? this.create(data);
  }

  /**
   * Update the first record matching `filters` (default: `data`) or create one.
   */
  async createOrUpdate(data: JsonObject, filters?: FilterSpec): Promise<Entity<TRecord> | null> {
    const existing = await this.query().where(filters ?? data).first();
    return existing ? this.update(data, existing) : this.create(data);
  }

  query(): QueryBuilder<TRecord> {
    return new QueryBuilder(this.schema, this.registry, this.session);
  }

  private async resolveDeleteTarget(target: Entity<TRecord> | DeleteTarget): Promise<Entity<TRecord>> {
    if (target instanceof Entity) {
      if (target.primaryKeyValue === null || target.primaryKeyValue === undefined) {
        throw new NotFound(`Cannot delete a ${this.schema.name} that was never stored`);
      }
      return target;
    }

    const field = target.field ?? this.schema.primaryKey;
    const found =
      target.value === null || target.value === undefined
        ? null
        : await this.query().where({ [field]: target.value }).first();
    if (!found) {
      throw new NotFound(`No ${this.schema.name} with ${field}=${String(target.value)} to delete`);
    }
    return found;
  }

  private assertSoftDelete(operation: string): void {
    if (!this.schema.supportsSoftDelete) {
      throw new ConfigurationError(
        `${this.schema.name} does not support ${operation} (no deleted_at column)`
      );
    }
  }

  private async hook(
    name: Exclude<keyof LifecycleHooks<TRecord>, 'afterUpdate' | 'afterSave'>,
    entity: Entity<TRecord>
  ): Promise<boolean> {
    const hook = this.hooks[name];
    return hook ? Boolean(await hook(entity)) : true;
  }

  private async afterUpdate(entity: Entity<TRecord>, prior: Entity<TRecord>): Promise<boolean> {
    const hook = this.hooks.afterUpdate;
    return hook ? Boolean(await hook(entity, prior)) : true;
  }

  private async afterSave(entity: Entity<TRecord>, prior: Entity<TRecord> | null): Promise<boolean> {
    const hook = this.hooks.afterSave;
    return hook ? Boolean(await hook(entity, prior)) : true;
  }

  private transaction(
    operation: string,
    unitOfWork: () => Promise<Entity<TRecord> | null>,
    overrides: TransactionOptions = {}
  ): Promise<Entity<TRecord> | null> {
    const { autocommit = false, refreshOnCommit = true } = this.options;
    return runWithTransaction<Entity<TRecord>>(
      { session: this.session, operation },
      unitOfWork,
      { autocommit, refreshOnCommit, ...overrides }
    );
  }
}

export default EntityLifecycle;

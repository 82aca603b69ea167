import { convertPostgreSQLError, InvalidOperand, QueryError, UnknownAttribute } from './errors.js';
import { Entity } from './entity.js';
import type { RelationStep } from './path-resolver.js';
import { resolvePath, resolveRelationPath } from './path-resolver.js';
import type { Predicate, RenderContext } from './predicate.js';
import { group, renderPredicates } from './predicate.js';
import type { FilterSpec } from './predicate-compiler.js';
import { compileFilters } from './predicate-compiler.js';
import type { QueryBackend } from './query-backend.js';
import { selectBackend } from './query-backend.js';
import type { JsonObject, SchemaDescriptor, SchemaRegistry } from './schema.js';
import type { SessionHandle, Statement } from './session.js';

const JOIN_SOURCE_ALIAS = '_join_source_id';

interface JoinClause {
  path: string;
  alias: string;
  outer: boolean;
  /** True when this join or one before it on the path is to-many */
  crossesMany: boolean;
  sql: string;
}

interface OrderTerm {
  alias: string;
  column: string;
  direction: 'ASC' | 'DESC';
  joined: boolean;
}

/**
 * Options accepted by {@link QueryBuilder.buildQuery}.
 */
export interface QueryOptions {
  fields?: string[];
  filters?: FilterSpec;
  orders?: string[];
  includes?: string[];
  offset?: number | null;
  limit?: number | null;
}

const tableRef = (table: string, alias: string): string =>
  table === alias ? table : `${table} ${alias}`;

const valueKey = (value: unknown): string =>
  value instanceof Date ? String(value.getTime()) : String(value);

const pathDepth = (path: string): number => path.split('.').length;

function uniqueValues(values: unknown[]): unknown[] {
  const seen = new Set<string>();
  const unique: unknown[] = [];
  for (const value of values) {
    if (value === undefined || value === null) {
      continue;
    }
    const key = valueKey(value);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(value);
    }
  }
  return unique;
}

function assertCount(name: string, value: number | null): void {
  if (value !== null && (!Number.isInteger(value) || value < 0)) {
    throw new InvalidOperand(name, 'a non-negative integer');
  }
}

/**
 * Chainable query over one root schema.
 *
 * Filters, orderings and projections may traverse relations with dotted
 * paths; every relation crossed registers a join once per relation path and
 * join kind. When any registered join reaches a to-many relation the
 * statement groups by the root primary key, and orderings on joined columns
 * aggregate with `MIN` (ascending) or `MAX` (descending).
 *
 * Included relations are loaded after the main statement with one batched
 * `= ANY($1)` statement per relation level.
 */
export class QueryBuilder<TRecord extends object = object> {
  readonly schema: SchemaDescriptor<TRecord>;
  readonly registry: SchemaRegistry;
  readonly session: SessionHandle;
  readonly backend: QueryBackend;
  readonly rootAlias: string;

  private _predicates: Predicate[];
  private _joins: Map<string, JoinClause>;
  private _aliases: Set<string>;
  private _orders: OrderTerm[];
  private _rootColumns: Set<string> | null;
  private _includes: Map<string, Set<string> | null>;
  private _fields: string[];
  private _fieldAliases: Map<string, string>;
  private _limit: number | null;
  private _offset: number | null;

  constructor(schema: SchemaDescriptor<TRecord>, registry: SchemaRegistry, session: SessionHandle) {
    this.schema = schema;
    this.registry = registry;
    this.session = session;
    this.backend = selectBackend(session);
    this.rootAlias = schema.tableName.split('.').pop() ?? schema.tableName;

    this._predicates = [];
    this._joins = new Map();
    this._aliases = new Set([this.rootAlias]);
    this._orders = [];
    this._rootColumns = null;
    this._includes = new Map();
    this._fields = [];
    this._fieldAliases = new Map();
    this._limit = null;
    this._offset = null;
  }

  /** Projection paths as given, aliases included */
  get fields(): string[] {
    return [...this._fields];
  }

  /** Output aliases keyed by projection path */
  get fieldAliases(): Map<string, string> {
    return new Map(this._fieldAliases);
  }

  get includes(): string[] {
    return [...this._includes.keys()];
  }

  /**
   * Restrict the loaded columns. Root columns narrow the main SELECT (the
   * primary key is always kept); dotted paths eager-load the relation they
   * name with only the listed columns.
   */
  projection(...paths: string[]): this {
    for (const reference of paths) {
      const resolved = resolvePath(this.registry, this.schema, reference, {
        allowRelationTerminal: true,
      });
      this._fields.push(reference);
      if (resolved.alias) {
        this._fieldAliases.set(resolved.path, resolved.alias);
      }

      if (!resolved.column) {
        this._addInclude(resolved.steps, null);
        continue;
      }

      if (resolved.steps.length === 0) {
        this._rootColumns ??= new Set();
        this._rootColumns.add(resolved.column.name);
        continue;
      }

      this._addInclude(resolved.steps, new Set([resolved.column.name]));
    }
    return this;
  }

  /**
   * Add filters. The mapping compiles first; pre-built predicates follow in
   * the order given. All are AND-combined with earlier filters.
   */
  where(spec?: FilterSpec | null, ...predicates: Predicate[]): this {
    if (spec) {
      this._predicates.push(...compileFilters(this._compileContext(), spec));
    }
    this._predicates.push(...predicates);
    return this;
  }

  /**
   * Compile a filter mapping into one predicate bound to this builder's
   * joins, for use inside `__or` / `__and` groups.
   */
  predicate(spec: FilterSpec): Predicate {
    return group('AND', compileFilters(this._compileContext(), spec));
  }

  join(...paths: string[]): this {
    for (const path of paths) {
      this._registerJoin(resolveRelationPath(this.registry, this.schema, path).steps, false);
    }
    return this;
  }

  outerJoin(...paths: string[]): this {
    for (const path of paths) {
      this._registerJoin(resolveRelationPath(this.registry, this.schema, path).steps, true);
    }
    return this;
  }

  /**
   * Order by column paths; a leading `-` sorts descending.
   */
  orderBy(...paths: string[]): this {
    for (const signed of paths) {
      const descending = signed.startsWith('-');
      const reference = signed.replace(/^[-+]/, '');
      const resolved = resolvePath(this.registry, this.schema, reference);
      if (!resolved.column) {
        throw new UnknownAttribute(this.schema.name, reference);
      }
      const column = resolved.column.name;
      const alias =
        resolved.steps.length > 0 ? this._registerJoin(resolved.steps, true) : this.rootAlias;
      this._orders.push({
        alias,
        column,
        direction: descending ? 'DESC' : 'ASC',
        joined: resolved.steps.length > 0,
      });
    }
    return this;
  }

  /**
   * Eager-load relations (dotted for nested levels) after the main query.
   */
  include(...paths: string[]): this {
    for (const path of paths) {
      const resolved = resolveRelationPath(this.registry, this.schema, path);
      this._addInclude(resolved.steps, null);
    }
    return this;
  }

  limit(count: number | null): this {
    assertCount('limit', count);
    this._limit = count;
    return this;
  }

  offset(count: number | null): this {
    assertCount('offset', count);
    this._offset = count;
    return this;
  }

  /**
   * Apply a whole query description at once.
   */
  buildQuery({ fields, filters, orders, includes, offset, limit }: QueryOptions = {}): this {
    if (fields?.length) {
      this.projection(...fields);
    }
    if (filters) {
      this.where(filters);
    }
    if (orders?.length) {
      this.orderBy(...orders);
    }
    if (includes?.length) {
      this.include(...includes);
    }
    if (offset !== undefined) {
      this.offset(offset);
    }
    if (limit !== undefined) {
      this.limit(limit);
    }
    return this;
  }

  toSQL(): Statement {
    return this._buildSelectQuery();
  }

  async all(): Promise<Entity<TRecord>[]> {
    try {
      const rows = await this.backend.fetchAll(this._buildSelectQuery());
      const entities = this._hydrate(rows);
      await this._loadIncludes(entities);
      return entities;
    } catch (error) {
      throw convertPostgreSQLError(error);
    }
  }

  /**
   * First matching entity. The builder's own limit is left untouched.
   */
  async first(): Promise<Entity<TRecord> | null> {
    try {
      const row = await this.backend.fetchFirst(this._buildSelectQuery({ limit: 1 }));
      if (!row) {
        return null;
      }
      const entities = this._hydrate([row]);
      await this._loadIncludes(entities);
      return entities[0] ?? null;
    } catch (error) {
      throw convertPostgreSQLError(error);
    }
  }

  /**
   * The single matching entity, or null.
   * @throws {QueryError} when more than one entity matches
   */
  async oneOrNone(): Promise<Entity<TRecord> | null> {
    let entities: Entity<TRecord>[];
    try {
      entities = this._hydrate(await this.backend.fetchAll(this._buildSelectQuery({ limit: 2 })));
    } catch (error) {
      throw convertPostgreSQLError(error);
    }
    if (entities.length > 1) {
      throw new QueryError(`Expected at most one ${this.schema.name} but found several`);
    }
    if (entities.length === 0) {
      return null;
    }
    try {
      await this._loadIncludes(entities);
    } catch (error) {
      throw convertPostgreSQLError(error);
    }
    return entities[0] ?? null;
  }

  /**
   * Number of distinct root records matching the filters and joins.
   */
  async count(): Promise<number> {
    try {
      const row = await this.backend.fetchFirst(this._buildCountQuery());
      return Number.parseInt(String(row?.count ?? '0'), 10);
    } catch (error) {
      throw convertPostgreSQLError(error);
    }
  }

  async exists(): Promise<boolean> {
    try {
      const row = await this.backend.fetchFirst(this._buildExistsQuery());
      return row !== null;
    } catch (error) {
      throw convertPostgreSQLError(error);
    }
  }

  private _compileContext() {
    return {
      registry: this.registry,
      schema: this.schema,
      rootAlias: this.rootAlias,
      registerJoin: (steps: RelationStep[], outer: boolean) => this._registerJoin(steps, outer),
    };
  }

  private _allocateAlias(base: string): string {
    let alias = base;
    let suffix = 2;
    while (this._aliases.has(alias)) {
      alias = `${base}_${suffix++}`;
    }
    this._aliases.add(alias);
    return alias;
  }

  /**
   * Ensure a join exists for every step and return the alias of the last one.
   */
  private _registerJoin(steps: RelationStep[], outer: boolean): string {
    let sourceAlias = this.rootAlias;
    let crossesMany = false;

    for (const step of steps) {
      crossesMany = crossesMany || step.relation.cardinality === 'many';
      const key = `${step.path}|${outer ? 'outer' : 'inner'}`;
      let join = this._joins.get(key);
      if (!join) {
        const alias = this._allocateAlias(step.path.replace(/\./g, '_'));
        join = {
          path: step.path,
          alias,
          outer,
          crossesMany,
          sql: this._buildJoinClause(step, sourceAlias, alias, outer),
        };
        this._joins.set(key, join);
      }
      sourceAlias = join.alias;
    }

    return sourceAlias;
  }

  private _buildJoinClause(
    step: RelationStep,
    sourceAlias: string,
    alias: string,
    outer: boolean
  ): string {
    const keyword = outer ? 'LEFT JOIN' : 'JOIN';
    const { relation, target } = step;

    if (relation.through) {
      const linkAlias = this._allocateAlias(`${alias}_link`);
      const { through } = relation;
      return (
        `${keyword} ${tableRef(through.table, linkAlias)} ` +
        `ON ${linkAlias}.${through.sourceColumn} = ${sourceAlias}.${relation.sourceColumn} ` +
        `${keyword} ${tableRef(target.tableName, alias)} ` +
        `ON ${alias}.${relation.targetColumn} = ${linkAlias}.${through.targetColumn}`
      );
    }

    return (
      `${keyword} ${tableRef(target.tableName, alias)} ` +
      `ON ${alias}.${relation.targetColumn} = ${sourceAlias}.${relation.sourceColumn}`
    );
  }

  private _addInclude(steps: RelationStep[], columns: Set<string> | null): void {
    steps.forEach((step, index) => {
      const isTerminal = index === steps.length - 1;
      const existing = this._includes.get(step.path);

      if (!isTerminal) {
        // A full include loads every relation on its path in full.
        if (columns === null) {
          this._includes.set(step.path, null);
        } else if (existing === undefined) {
          this._includes.set(step.path, new Set());
        }
        return;
      }

      if (existing === null) {
        return;
      }
      if (columns === null || existing === undefined) {
        this._includes.set(step.path, columns === null ? null : new Set(columns));
        return;
      }
      for (const column of columns) {
        existing.add(column);
      }
    });
  }

  private get _grouped(): boolean {
    for (const join of this._joins.values()) {
      if (join.crossesMany) {
        return true;
      }
    }
    return false;
  }

  /**
   * Relations included directly below `parentPath` (root when null).
   */
  private _childIncludes(parentPath: string | null): string[] {
    return [...this._includes.keys()].filter(path => {
      const cut = path.lastIndexOf('.');
      return parentPath === null ? cut === -1 : path.slice(0, cut) === parentPath && cut !== -1;
    });
  }

  private _selectedRootColumns(): string[] {
    if (this._rootColumns === null) {
      return this.schema.columnNames;
    }

    const columns = new Set<string>([this.schema.primaryKey]);
    for (const column of this._rootColumns) {
      columns.add(column);
    }
    for (const path of this._childIncludes(null)) {
      const relation = this.schema.getRelation(path);
      if (relation) {
        columns.add(relation.sourceColumn);
      }
    }
    return [...columns];
  }

  private _fromClause(context: RenderContext): string {
    let sql = `FROM ${tableRef(this.schema.tableName, this.rootAlias)}`;
    for (const join of this._joins.values()) {
      sql += ` ${join.sql}`;
    }
    const where = renderPredicates(this._predicates, context);
    if (where) {
      sql += ` WHERE ${where}`;
    }
    return sql;
  }

  private _orderExpression(term: OrderTerm, grouped: boolean): string {
    const column = `${term.alias}.${term.column}`;
    if (term.joined && grouped) {
      const aggregate = term.direction === 'DESC' ? 'MAX' : 'MIN';
      return `${aggregate}(${column}) ${term.direction}`;
    }
    return `${column} ${term.direction}`;
  }

  private _buildSelectQuery({ limit = this._limit }: { limit?: number | null } = {}): Statement {
    const context: RenderContext = { params: [] };
    const columns = this._selectedRootColumns().map(column => `${this.rootAlias}.${column}`);
    const grouped = this._grouped;

    let sql = `SELECT ${columns.join(', ')} ${this._fromClause(context)}`;
    if (grouped) {
      sql += ` GROUP BY ${this.rootAlias}.${this.schema.primaryKey}`;
    }
    if (this._orders.length > 0) {
      sql += ` ORDER BY ${this._orders.map(term => this._orderExpression(term, grouped)).join(', ')}`;
    }
    if (limit !== null) {
      sql += ` LIMIT ${limit}`;
    }
    if (this._offset !== null) {
      sql += ` OFFSET ${this._offset}`;
    }
    return { sql, params: context.params };
  }

  private _buildCountQuery(): Statement {
    const context: RenderContext = { params: [] };
    const pk = `${this.rootAlias}.${this.schema.primaryKey}`;
    const sql = `SELECT COUNT(DISTINCT ${pk}) AS count ${this._fromClause(context)}`;
    return { sql, params: context.params };
  }

  /**
   * Row test matching what `first()` would return: grouped per root record
   * and skipping the configured offset.
   */
  private _buildExistsQuery(): Statement {
    const context: RenderContext = { params: [] };
    let sql = `SELECT 1 AS present ${this._fromClause(context)}`;
    if (this._grouped) {
      sql += ` GROUP BY ${this.rootAlias}.${this.schema.primaryKey}`;
    }
    sql += ' LIMIT 1';
    if (this._offset !== null) {
      sql += ` OFFSET ${this._offset}`;
    }
    return { sql, params: context.params };
  }

  /**
   * Turn rows into entities, keeping the first row seen for each primary key.
   */
  private _hydrate(rows: JsonObject[]): Entity<TRecord>[] {
    const seen = new Set<string>();
    const entities: Entity<TRecord>[] = [];
    for (const row of rows) {
      const key = valueKey(row[this.schema.primaryKey]);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      entities.push(Entity.fromRow(this.schema, row));
    }
    return entities;
  }

  private async _loadIncludes(roots: Entity<TRecord>[]): Promise<void> {
    if (roots.length === 0 || this._includes.size === 0) {
      return;
    }

    const paths = [...this._includes.keys()].sort((a, b) => pathDepth(a) - pathDepth(b));
    for (const path of paths) {
      const step = resolveRelationPath(this.registry, this.schema, path).relation;
      const cut = path.lastIndexOf('.');
      const parents = cut === -1 ? roots : collectRelated(roots, path.slice(0, cut));
      await this._loadRelation(parents, step, path);
    }
  }

  private _includeColumns(step: RelationStep, path: string): string[] {
    const requested = this._includes.get(path);
    const { relation, target } = step;
    if (requested === null || requested === undefined) {
      return target.columnNames;
    }

    const columns = new Set<string>([target.primaryKey]);
    if (!relation.through) {
      columns.add(relation.targetColumn);
    }
    for (const column of requested) {
      columns.add(column);
    }
    for (const childPath of this._childIncludes(path)) {
      const child = target.getRelation(childPath.slice(path.length + 1));
      if (child) {
        columns.add(child.sourceColumn);
      }
    }
    return [...columns];
  }

  private _buildIncludeQuery(step: RelationStep, columns: string[], values: unknown[]): Statement {
    const { relation, target } = step;
    const targetAlias = `${relation.name}_target`;
    const select = columns.map(column => `${targetAlias}.${column}`).join(', ');
    const orderClause = ` ORDER BY ${targetAlias}.${target.primaryKey}`;

    if (relation.through) {
      const throughAlias = `${relation.name}_through`;
      const { through } = relation;
      return {
        sql:
          `SELECT ${select}, ${throughAlias}.${through.sourceColumn} AS ${JOIN_SOURCE_ALIAS} ` +
          `FROM ${target.tableName} ${targetAlias} ` +
          `JOIN ${through.table} ${throughAlias} ` +
          `ON ${throughAlias}.${through.targetColumn} = ${targetAlias}.${relation.targetColumn} ` +
          `WHERE ${throughAlias}.${through.sourceColumn} = ANY($1)${orderClause}`,
        params: [values],
      };
    }

    return {
      sql:
        `SELECT ${select}, ${targetAlias}.${relation.targetColumn} AS ${JOIN_SOURCE_ALIAS} ` +
        `FROM ${target.tableName} ${targetAlias} ` +
        `WHERE ${targetAlias}.${relation.targetColumn} = ANY($1)${orderClause}`,
      params: [values],
    };
  }

  private async _loadRelation(parents: Entity[], step: RelationStep, path: string): Promise<void> {
    const { relation, target } = step;
    const values = uniqueValues(parents.map(parent => parent.getValue(relation.sourceColumn)));

    const grouped = new Map<string, Entity[]>();
    if (values.length > 0) {
      const statement = this._buildIncludeQuery(step, this._includeColumns(step, path), values);
      const rows = await this.backend.fetchAll(statement);
      for (const row of rows) {
        const { [JOIN_SOURCE_ALIAS]: source, ...data } = row;
        if (source === undefined || source === null) {
          continue;
        }
        const key = valueKey(source);
        const bucket = grouped.get(key) ?? [];
        bucket.push(Entity.fromRow(target, data));
        grouped.set(key, bucket);
      }
    }

    for (const parent of parents) {
      const source = parent.getValue(relation.sourceColumn);
      const related =
        source === undefined || source === null ? [] : (grouped.get(valueKey(source)) ?? []);
      parent.setRelated(relation.name, relation.cardinality === 'many' ? related : (related[0] ?? null));
    }
  }
}

/**
 * Entities reached from `roots` by following an already loaded relation path.
 */
export function collectRelated(roots: Entity[], path: string): Entity[] {
  let current: Entity[] = roots;
  for (const segment of path.split('.')) {
    const next: Entity[] = [];
    for (const entity of current) {
      const related = entity.getRelated(segment);
      if (Array.isArray(related)) {
        next.push(...related);
      } else if (related) {
        next.push(related);
      }
    }
    current = next;
  }
  return current;
}

export default QueryBuilder;

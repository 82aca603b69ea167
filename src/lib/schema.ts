import { ConfigurationError, UnknownAttribute } from './errors.js';
import type { ColumnType, InferFieldValue } from './type.js';

export type JsonObject = Record<string, unknown>;

export type Cardinality = 'one' | 'many';

/**
 * Join-table description for many-to-many relations.
 */
export interface ThroughRelationConfig {
  table: string;
  sourceColumn: string;
  targetColumn: string;
}

/**
 * Relation shorthand accepted by {@link defineSchema}. Column defaults follow
 * the direction of the relation: to-one relations point from a local foreign
 * key to the target's primary key, to-many relations from the local primary
 * key to a foreign key on the target.
 */
export interface RelationConfig {
  target: string;
  cardinality: Cardinality;
  sourceColumn?: string;
  targetColumn?: string;
  through?: ThroughRelationConfig;
}

export interface RelationDescriptor {
  readonly name: string;
  readonly target: string;
  readonly cardinality: Cardinality;
  readonly sourceColumn: string;
  readonly targetColumn: string;
  readonly through: ThroughRelationConfig | null;
}

export type ColumnMap = Record<string, ColumnType>;

export interface ColumnDescriptor {
  readonly name: string;
  readonly type: ColumnType;
  readonly primaryKey: boolean;
  readonly unique: boolean;
}

export interface SchemaDefinition<TColumns extends ColumnMap = ColumnMap> {
  name: string;
  tableName?: string;
  columns: TColumns;
  relations?: Record<string, RelationConfig>;
  labelColumn?: string;
}

/**
 * Row shape inferred from a column map. Every column may be absent from a
 * partially loaded entity, so values are nullable.
 */
export type InferRecord<TColumns extends ColumnMap> = {
  [K in keyof TColumns]: InferFieldValue<TColumns[K]>;
};

export const SOFT_DELETE_COLUMNS = ['deleted_at', 'deleted_by', 'deletion_reason'] as const;

/**
 * Immutable description of one model: its columns, relations and keys.
 *
 * The type parameter records the row shape so entities, lifecycles and
 * repositories built from the descriptor can offer typed accessors.
 */
export class SchemaDescriptor<TRecord extends object = object> {
  readonly name: string;
  readonly tableName: string;
  readonly primaryKey: string;
  readonly columns: ReadonlyMap<string, ColumnDescriptor>;
  readonly relations: ReadonlyMap<string, RelationDescriptor>;
  readonly labelColumn: string | null;
  declare readonly __record?: TRecord;

  constructor(definition: SchemaDefinition) {
    const columns = new Map<string, ColumnDescriptor>();
    for (const [name, type] of Object.entries(definition.columns)) {
      columns.set(
        name,
        Object.freeze({ name, type, primaryKey: type.isPrimaryKey, unique: type.isUnique })
      );
    }

    const primaryKey = columns.has('id')
      ? 'id'
      : [...columns.values()].find(column => column.primaryKey)?.name;
    if (!primaryKey) {
      throw new ConfigurationError(`No primary key defined for ${definition.name}`);
    }

    const relations = new Map<string, RelationDescriptor>();
    for (const [name, config] of Object.entries(definition.relations ?? {})) {
      if (columns.has(name)) {
        throw new ConfigurationError(
          `Relation '${name}' on ${definition.name} shadows a column of the same name`
        );
      }
      relations.set(name, normalizeRelation(definition.name, name, primaryKey, config));
    }

    if (definition.labelColumn && !columns.has(definition.labelColumn)) {
      throw new UnknownAttribute(definition.name, definition.labelColumn);
    }

    this.name = definition.name;
    this.tableName = definition.tableName ?? definition.name.toLowerCase();
    this.primaryKey = primaryKey;
    this.columns = columns;
    this.relations = relations;
    this.labelColumn = definition.labelColumn ?? null;
    Object.freeze(this);
  }

  hasColumn(name: string): boolean {
    return this.columns.has(name);
  }

  getColumn(name: string): ColumnDescriptor | null {
    return this.columns.get(name) ?? null;
  }

  getRelation(name: string): RelationDescriptor | null {
    return this.relations.get(name) ?? null;
  }

  get columnNames(): string[] {
    return [...this.columns.keys()];
  }

  /**
   * Columns that identify a single record (primary key first).
   */
  get uniqueColumns(): string[] {
    const unique = [...this.columns.values()].filter(column => column.unique);
    return [
      this.primaryKey,
      ...unique.map(column => column.name).filter(name => name !== this.primaryKey),
    ];
  }

  get supportsSoftDelete(): boolean {
    return this.columns.has('deleted_at');
  }
}

function normalizeRelation(
  schemaName: string,
  name: string,
  primaryKey: string,
  config: RelationConfig
): RelationDescriptor {
  if (config.cardinality !== 'one' && config.cardinality !== 'many') {
    throw new ConfigurationError(
      `Relation '${name}' on ${schemaName} must have cardinality 'one' or 'many'`
    );
  }

  const snakeSchema = schemaName.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
  const sourceColumn =
    config.sourceColumn ??
    (config.cardinality === 'one' && !config.through ? `${name}_id` : primaryKey);
  const targetColumn =
    config.targetColumn ??
    (config.cardinality === 'many' && !config.through ? `${snakeSchema}_id` : 'id');

  return Object.freeze({
    name,
    target: config.target,
    cardinality: config.cardinality,
    sourceColumn,
    targetColumn,
    through: config.through ? Object.freeze({ ...config.through }) : null,
  });
}

/**
 * Build a frozen schema descriptor from a declarative definition.
 */
export function defineSchema<TColumns extends ColumnMap>(
  definition: SchemaDefinition<TColumns>
): SchemaDescriptor<InferRecord<TColumns>> {
  return new SchemaDescriptor<InferRecord<TColumns>>(definition);
}

/**
 * Track schema descriptors by name so relation targets can be resolved
 * lazily (relations may point at schemas registered later, or at themselves).
 */
export class SchemaRegistry {
  private schemas: Map<string, SchemaDescriptor>;

  constructor(schemas: Iterable<SchemaDescriptor> = []) {
    this.schemas = new Map();
    for (const schema of schemas) {
      this.register(schema);
    }
  }

  /**
   * Register a descriptor under its name.
   * @returns The registered descriptor.
   */
  register<TRecord extends object>(
    schema: SchemaDescriptor<TRecord>
  ): SchemaDescriptor<TRecord> {
    const existing = this.schemas.get(schema.name);
    if (existing && existing !== schema) {
      throw new ConfigurationError(`Schema '${schema.name}' already registered.`);
    }
    this.schemas.set(schema.name, schema);
    return schema;
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  /**
   * Retrieve a registered descriptor by name.
   */
  get(name: string): SchemaDescriptor {
    const schema = this.schemas.get(name);
    if (!schema) {
      throw new ConfigurationError(`Schema '${name}' is not registered`);
    }
    return schema;
  }

  /**
   * Resolve the target schema of a relation.
   */
  target(relation: RelationDescriptor): SchemaDescriptor {
    return this.get(relation.target);
  }

  list(): SchemaDescriptor[] {
    return [...this.schemas.values()];
  }

  clear(): void {
    this.schemas.clear();
  }
}

import type { JsonObject, SchemaDescriptor } from './schema.js';

export type RelatedValue = Entity | Entity[] | null;

/**
 * Live record bound to a schema.
 *
 * Column values are reached through `get` / `set` (typed by the schema's
 * row shape) or the untyped `getValue` / `setValue` used by generic code.
 * Assigned columns are tracked until the session persists them.
 */
export class Entity<TRecord extends object = object> {
  readonly schema: SchemaDescriptor<TRecord>;
  private _data: Map<string, unknown>;
  private _changed: Set<string>;
  private _related: Map<string, RelatedValue>;
  private _isNew: boolean;

  constructor(schema: SchemaDescriptor<TRecord>, data: JsonObject = {}, { isNew = true } = {}) {
    this.schema = schema;
    this._data = new Map();
    this._changed = new Set();
    this._related = new Map();
    this._isNew = isNew;

    for (const [key, value] of Object.entries(data)) {
      if (schema.hasColumn(key)) {
        this._data.set(key, value);
        if (isNew) {
          this._changed.add(key);
        }
      }
    }
  }

  /**
   * Build a persisted entity from a database row. Keys that are not columns
   * of the schema are ignored.
   */
  static fromRow<TRecord extends object>(
    schema: SchemaDescriptor<TRecord>,
    row: JsonObject
  ): Entity<TRecord> {
    return new Entity(schema, row, { isNew: false });
  }

  get<K extends keyof TRecord & string>(key: K): TRecord[K] | undefined {
    return this._data.get(key) as TRecord[K] | undefined;
  }

  set<K extends keyof TRecord & string>(key: K, value: TRecord[K] | null): this {
    return this.setValue(key, value);
  }

  getValue(key: string): unknown {
    return this._data.get(key);
  }

  setValue(key: string, value: unknown): this {
    const previous = this._data.get(key);
    if (this._data.has(key) && Object.is(previous, value)) {
      return this;
    }
    this._data.set(key, value);
    this._changed.add(key);
    return this;
  }

  hasValue(key: string): boolean {
    return this._data.has(key);
  }

  /**
   * Forget a column value, so it is neither written nor reported as loaded.
   */
  unsetValue(key: string): this {
    this._data.delete(key);
    this._changed.delete(key);
    return this;
  }

  get primaryKeyValue(): unknown {
    return this._data.get(this.schema.primaryKey);
  }

  get isNew(): boolean {
    return this._isNew;
  }

  get isDeleted(): boolean {
    const deletedAt = this._data.get('deleted_at');
    return deletedAt !== undefined && deletedAt !== null;
  }

  /** Column names assigned since the entity was loaded or last persisted */
  get changedColumns(): string[] {
    return [...this._changed];
  }

  get loadedColumns(): string[] {
    return [...this._data.keys()];
  }

  getRelated(name: string): RelatedValue | undefined {
    return this._related.get(name);
  }

  setRelated(name: string, value: RelatedValue): this {
    this._related.set(name, value);
    return this;
  }

  hasRelated(name: string): boolean {
    return this._related.has(name);
  }

  /**
   * Replace column data with values read back from the store and mark the
   * entity persisted.
   */
  markPersisted(row: JsonObject = {}): this {
    for (const [key, value] of Object.entries(row)) {
      if (this.schema.hasColumn(key)) {
        this._data.set(key, value);
      }
    }
    this._changed.clear();
    this._isNew = false;
    return this;
  }

  /**
   * Copy of the loaded column values.
   */
  snapshot(): JsonObject {
    return Object.fromEntries(this._data);
  }

  toJSON(): JsonObject {
    return this.snapshot();
  }
}

export default Entity;

import type { Entity } from './entity.js';
import type { JsonObject } from './schema.js';

/**
 * Read-only list of entities returned by repository finders.
 */
export class EntityCollection<TRecord extends object = object> implements Iterable<Entity<TRecord>> {
  private items: Entity<TRecord>[];

  constructor(items: Iterable<Entity<TRecord>> = []) {
    this.items = [...items];
  }

  get length(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<Entity<TRecord>> {
    return this.items[Symbol.iterator]();
  }

  first(): Entity<TRecord> | null {
    return this.items[0] ?? null;
  }

  at(index: number): Entity<TRecord> | null {
    return this.items.at(index) ?? null;
  }

  where(predicate: (entity: Entity<TRecord>) => boolean): EntityCollection<TRecord> {
    return new EntityCollection(this.items.filter(predicate));
  }

  byAttr(column: string, value: unknown): Entity<TRecord>[] {
    return this.items.filter(entity => entity.getValue(column) === value);
  }

  /**
   * Sum of a numeric column; missing and non-numeric values count as 0.
   */
  sumAttr(column: string): number {
    return this.items.reduce((total, entity) => {
      const value = Number(entity.getValue(column) ?? 0);
      return total + (Number.isFinite(value) ? value : 0);
    }, 0);
  }

  /**
   * Values of one column (the primary key by default).
   */
  values(column?: string): unknown[] {
    return this.items.map(entity =>
      entity.getValue(column ?? entity.schema.primaryKey) ?? null
    );
  }

  /**
   * Number of entities, or of entities whose primary key equals `value`.
   */
  count(value?: unknown): number {
    if (value === undefined) {
      return this.items.length;
    }
    return this.items.filter(entity => entity.primaryKeyValue === value).length;
  }

  toArray(): Entity<TRecord>[] {
    return [...this.items];
  }

  toJSON(): JsonObject[] {
    return this.items.map(entity => entity.snapshot());
  }
}

export default EntityCollection;

import { Entity } from './entity.js';
import { UnknownAttribute } from './errors.js';
import { splitAlias, stripModelPrefix } from './path-resolver.js';
import type { ColumnDescriptor, JsonObject } from './schema.js';

export interface SerializeOptions {
  /**
   * Paths to output, with optional `" as Alias"`. Dotted paths follow loaded
   * relations and become arrays across to-many relations.
   */
  fields?: string[];
  /** Relations rendered as nested objects (or arrays of them) */
  includes?: string[];
}

/** Output name per requested leaf, keyed by the relation it was requested on */
type RequestedLeaves = Map<string, Map<string, string>>;

const pad = (value: number): string => String(value).padStart(2, '0');

function formatDate(value: Date): string {
  return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
}

/**
 * Convert a column value into a JSON-safe primitive.
 */
export function toPrimitive(value: unknown, column: ColumnDescriptor | null = null): unknown {
  if (value === null || value === undefined) {
    return null;
  }
  if (Array.isArray(value)) {
    return value.map(item => toPrimitive(item, column));
  }

  const kind = column?.type.kind;
  if (value instanceof Date) {
    return kind === 'date' ? formatDate(value) : value.toISOString();
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string') {
    return kind === 'decimal' ? Number(value) : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (kind === 'json') {
    return value;
  }
  if (typeof value === 'object') {
    const scalar: unknown = value.valueOf();
    if (scalar !== value && scalar !== null && typeof scalar !== 'object') {
      return toPrimitive(scalar, column);
    }
  }
  return String(value);
}

/**
 * Follow `segments` from `value`, mapping over arrays. Column leaves come
 * back as primitives; relation leaves come back as entities.
 */
function walk(value: unknown, segments: string[], path: string): unknown {
  if (Array.isArray(value)) {
    return value.map(item => walk(item, segments, path));
  }
  if (segments.length === 0 || value === null || value === undefined) {
    return value ?? null;
  }
  if (!(value instanceof Entity)) {
    throw new UnknownAttribute(typeof value, segments[0], path);
  }

  const [segment, ...rest] = segments;
  const relation = value.schema.getRelation(segment);
  if (relation) {
    const related = value.getRelated(segment);
    const loaded = related === undefined ? (relation.cardinality === 'many' ? [] : null) : related;
    return walk(loaded, rest, path);
  }

  const column = value.schema.getColumn(segment);
  if (column && rest.length === 0) {
    return toPrimitive(value.getValue(segment), column);
  }
  throw new UnknownAttribute(value.schema.name, segment, path);
}

function label(entity: Entity): string {
  const { labelColumn, name } = entity.schema;
  if (labelColumn) {
    const value = entity.getValue(labelColumn);
    if (value !== null && value !== undefined) {
      return String(toPrimitive(value, entity.schema.getColumn(labelColumn)));
    }
  }
  return `${name}#${String(toPrimitive(entity.primaryKeyValue))}`;
}

function serializeRelated(entity: Entity, requested?: Map<string, string>): JsonObject {
  if (!requested || requested.size === 0) {
    const { primaryKey } = entity.schema;
    return {
      [primaryKey]: toPrimitive(entity.primaryKeyValue, entity.schema.getColumn(primaryKey)),
      label: label(entity),
    };
  }

  const output: JsonObject = {};
  for (const [leaf, name] of requested) {
    output[name] = render(walk(entity, leaf.split('.'), leaf));
  }
  return output;
}

/**
 * Replace entities left in a walked value by their slim or requested form.
 */
function render(value: unknown, requested?: Map<string, string>): unknown {
  if (Array.isArray(value)) {
    return value.map(item => render(item, requested));
  }
  if (value instanceof Entity) {
    return serializeRelated(value, requested);
  }
  return value;
}

/**
 * Serialize one entity to primitives. Without `fields` every loaded column
 * is output under its own name.
 */
export function serialize(entity: Entity, { fields = [], includes = [] }: SerializeOptions = {}): JsonObject {
  const result: JsonObject = {};
  const requested: RequestedLeaves = new Map();

  if (fields.length === 0) {
    for (const column of entity.loadedColumns) {
      result[column] = toPrimitive(entity.getValue(column), entity.schema.getColumn(column));
    }
  }

  for (const field of fields) {
    const { path: aliased, alias } = splitAlias(field);
    const path = stripModelPrefix(entity.schema, aliased);
    const dot = path.indexOf('.');
    if (dot !== -1) {
      const relation = path.slice(0, dot);
      const leaf = path.slice(dot + 1);
      const leaves = requested.get(relation) ?? new Map<string, string>();
      leaves.set(leaf, alias ?? leaf);
      requested.set(relation, leaves);
    }
    result[alias ?? path] = render(walk(entity, path.split('.'), path));
  }

  for (const include of includes) {
    const path = stripModelPrefix(entity.schema, include);
    result[path] = render(walk(entity, path.split('.'), path), requested.get(path));
  }

  return result;
}

export function serializeMany(entities: Iterable<Entity>, options: SerializeOptions = {}): JsonObject[] {
  return [...entities].map(entity => serialize(entity, options));
}

const serializer = {
  serialize,
  serializeMany,
  toPrimitive,
} as const;

export default serializer;

import { InvalidOperand, UnknownAttribute, UnsupportedOperator } from './errors.js';
import type { RelationStep } from './path-resolver.js';
import { resolvePath } from './path-resolver.js';
import type { Predicate } from './predicate.js';
import { comparison, group, isPredicate, never } from './predicate.js';
import type { SchemaDescriptor, SchemaRegistry } from './schema.js';

export const FILTER_OPERATORS = [
  'eq',
  'ne',
  'lt',
  'lte',
  'gt',
  'gte',
  'in',
  'between',
  'like',
  'ilike',
  'contains',
  'icontains',
  'startswith',
  'istartswith',
  'endswith',
  'iendswith',
  'isnull',
  'notnull',
] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

/**
 * Filter mapping. Keys are `field`, `field__op`, `relation.field__op` or
 * `Model.field`; the reserved keys `__or` / `__and` take a list of nested
 * mappings or pre-built predicates.
 */
export type FilterSpec = Record<string, unknown>;

export interface CompileContext {
  registry: SchemaRegistry;
  schema: SchemaDescriptor;
  /** Alias of the root table in the statement */
  rootAlias: string;
  /**
   * Register the joins needed to reach the end of `steps` and return the
   * alias of the last joined table.
   */
  registerJoin: (steps: RelationStep[], outer: boolean) => string;
}

interface ColumnRef {
  table: string;
  column: string;
}

const GROUP_KEYS = { __or: 'OR', __and: 'AND' } as const;

const isGroupKey = (key: string): key is keyof typeof GROUP_KEYS =>
  Object.prototype.hasOwnProperty.call(GROUP_KEYS, key);

const isFilterOperator = (value: string): value is FilterOperator =>
  (FILTER_OPERATORS as readonly string[]).includes(value);

/**
 * Split a filter key on its first `__` into field path and operator.
 */
export function splitFilterKey(key: string): { field: string; operator: string } {
  const index = key.indexOf('__');
  if (index === -1) {
    return { field: key, operator: 'eq' };
  }
  return { field: key.slice(0, index), operator: key.slice(index + 2) };
}

function toList(key: string, value: unknown): unknown[] {
  if (Array.isArray(value)) {
    return [...value];
  }
  if (value instanceof Set) {
    return [...value];
  }
  throw new InvalidOperand(key, 'an array or Set of values');
}

function likePattern(value: unknown, { leading, trailing }: { leading: boolean; trailing: boolean }) {
  return `${leading ? '%' : ''}${String(value)}${trailing ? '%' : ''}`;
}

type OperatorCompiler = (ref: ColumnRef, value: unknown, key: string) => Predicate;

const OPERATORS: Record<FilterOperator, OperatorCompiler> = {
  eq: ({ table, column }, value) =>
    value === null ? comparison(table, column, 'IS') : comparison(table, column, '=', value),
  ne: ({ table, column }, value) =>
    value === null ? comparison(table, column, 'IS NOT') : comparison(table, column, '!=', value),
  lt: ({ table, column }, value) => comparison(table, column, '<', value),
  lte: ({ table, column }, value) => comparison(table, column, '<=', value),
  gt: ({ table, column }, value) => comparison(table, column, '>', value),
  gte: ({ table, column }, value) => comparison(table, column, '>=', value),
  in: ({ table, column }, value, key) => {
    const values = toList(key, value);
    return values.length === 0 ? never() : comparison(table, column, '= ANY', values);
  },
  between: ({ table, column }, value, key) => {
    if (!Array.isArray(value) || value.length !== 2) {
      throw new InvalidOperand(key, 'an array of exactly two values');
    }
    return comparison(table, column, 'BETWEEN', [value[0], value[1]]);
  },
  like: ({ table, column }, value) => comparison(table, column, 'LIKE', value),
  ilike: ({ table, column }, value) => comparison(table, column, 'ILIKE', value),
  contains: ({ table, column }, value) =>
    comparison(table, column, 'LIKE', likePattern(value, { leading: true, trailing: true })),
  icontains: ({ table, column }, value) =>
    comparison(table, column, 'ILIKE', likePattern(value, { leading: true, trailing: true })),
  startswith: ({ table, column }, value) =>
    comparison(table, column, 'LIKE', likePattern(value, { leading: false, trailing: true })),
  istartswith: ({ table, column }, value) =>
    comparison(table, column, 'ILIKE', likePattern(value, { leading: false, trailing: true })),
  endswith: ({ table, column }, value) =>
    comparison(table, column, 'LIKE', likePattern(value, { leading: true, trailing: false })),
  iendswith: ({ table, column }, value) =>
    comparison(table, column, 'ILIKE', likePattern(value, { leading: true, trailing: false })),
  isnull: ({ table, column }, value) =>
    comparison(table, column, value === false ? 'IS NOT' : 'IS'),
  notnull: ({ table, column }, value) =>
    comparison(table, column, value === false ? 'IS' : 'IS NOT'),
};

export function isFilterSpec(value: unknown): value is FilterSpec {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value) && !isPredicate(value);
}

function resolveColumn(context: CompileContext, field: string): ColumnRef {
  const resolved = resolvePath(context.registry, context.schema, field);
  if (!resolved.column) {
    throw new UnknownAttribute(context.schema.name, field);
  }
  const table =
    resolved.steps.length > 0 ? context.registerJoin(resolved.steps, true) : context.rootAlias;
  return { table, column: resolved.column.name };
}

function compileGroup(
  context: CompileContext,
  key: keyof typeof GROUP_KEYS,
  value: unknown
): Predicate {
  if (!Array.isArray(value)) {
    throw new InvalidOperand(key, 'an array of filter mappings or predicates');
  }

  const entries: unknown[] = value;
  const members: Predicate[] = [];
  for (const entry of entries) {
    if (isPredicate(entry)) {
      members.push(entry);
    } else if (isFilterSpec(entry)) {
      members.push(group('AND', compileFilters(context, entry)));
    } else {
      throw new InvalidOperand(key, 'an array of filter mappings or predicates');
    }
  }
  return group(GROUP_KEYS[key], members);
}

/**
 * Compile a filter mapping into an ordered list of predicates. Plain field
 * predicates come first in key order, followed by `__or` / `__and` groups.
 *
 * @throws {UnsupportedOperator} for an unknown `__op` suffix
 * @throws {InvalidOperand} for an operand of the wrong shape
 * @throws {UnknownAttribute} when a field path cannot be resolved
 */
export function compileFilters(context: CompileContext, spec: FilterSpec): Predicate[] {
  const plain: Predicate[] = [];
  const groups: Predicate[] = [];

  for (const [key, value] of Object.entries(spec)) {
    if (value === undefined) {
      continue;
    }
    if (isGroupKey(key)) {
      groups.push(compileGroup(context, key, value));
      continue;
    }

    const { field, operator } = splitFilterKey(key);
    if (!isFilterOperator(operator)) {
      throw new UnsupportedOperator(operator, field);
    }
    const ref = resolveColumn(context, field);
    plain.push(OPERATORS[operator](ref, value, key));
  }

  return [...plain, ...groups];
}

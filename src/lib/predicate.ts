/**
 * Predicate tree produced by the filter compiler and rendered into
 * parameterized PostgreSQL.
 *
 * Predicates carry a private brand so a pre-built predicate placed inside an
 * `__or` / `__and` group is never mistaken for a nested filter mapping (which
 * may legitimately contain keys such as `type`).
 */

const PREDICATE_TOKEN = Symbol('strata-dal.predicate');

export type ComparisonOperator =
  | '='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '= ANY'
  | 'BETWEEN'
  | 'LIKE'
  | 'ILIKE'
  | 'IS'
  | 'IS NOT';

export interface BasicPredicate {
  readonly [PREDICATE_TOKEN]: true;
  readonly type: 'basic';
  /** Table alias the column belongs to */
  readonly table: string;
  readonly column: string;
  readonly operator: ComparisonOperator;
  /** Omitted for `IS NULL` style tests */
  readonly value?: unknown;
}

export interface GroupPredicate {
  readonly [PREDICATE_TOKEN]: true;
  readonly type: 'group';
  readonly conjunction: 'AND' | 'OR';
  readonly predicates: readonly Predicate[];
}

export interface RawPredicate {
  readonly [PREDICATE_TOKEN]: true;
  readonly type: 'raw';
  /** SQL text using `?` for each bound value */
  readonly sql: string;
  readonly values: readonly unknown[];
}

export type Predicate = BasicPredicate | GroupPredicate | RawPredicate;

export interface RenderContext {
  params: unknown[];
}

export function isPredicate(value: unknown): value is Predicate {
  return Boolean(value && typeof value === 'object' && PREDICATE_TOKEN in value);
}

export function comparison(
  table: string,
  column: string,
  operator: ComparisonOperator,
  value?: unknown
): BasicPredicate {
  if (value === undefined) {
    return { [PREDICATE_TOKEN]: true, type: 'basic', table, column, operator };
  }
  return { [PREDICATE_TOKEN]: true, type: 'basic', table, column, operator, value };
}

export function group(conjunction: 'AND' | 'OR', predicates: readonly Predicate[]): GroupPredicate {
  return { [PREDICATE_TOKEN]: true, type: 'group', conjunction, predicates: [...predicates] };
}

export const and = (...predicates: Predicate[]): GroupPredicate => group('AND', predicates);

export const or = (...predicates: Predicate[]): GroupPredicate => group('OR', predicates);

/**
 * Raw SQL predicate. Each `?` in the text is bound to the next value.
 */
export function raw(sql: string, ...values: unknown[]): RawPredicate {
  const markers = sql.split('?').length - 1;
  if (markers !== values.length) {
    throw new TypeError(
      `Raw predicate has ${markers} placeholder(s) but ${values.length} value(s) were supplied`
    );
  }
  return { [PREDICATE_TOKEN]: true, type: 'raw', sql, values: [...values] };
}

/**
 * Predicate that never matches, used for empty `IN` lists.
 */
export const never = (): RawPredicate => raw('FALSE');

const bind = (context: RenderContext, value: unknown): string => {
  context.params.push(value);
  return `$${context.params.length}`;
};

/**
 * Render one predicate, appending bound values to the context.
 */
export function renderPredicate(predicate: Predicate, context: RenderContext): string {
  if (predicate.type === 'group') {
    const inner = predicate.predicates
      .map(child => renderPredicate(child, context))
      .filter(fragment => fragment.length > 0);
    if (inner.length === 0) {
      return '';
    }
    if (inner.length === 1) {
      return inner[0];
    }
    return `(${inner.join(` ${predicate.conjunction} `)})`;
  }

  if (predicate.type === 'raw') {
    let index = 0;
    return predicate.sql.replace(/\?/g, () => bind(context, predicate.values[index++]));
  }

  const column = `${predicate.table}.${predicate.column}`;
  const { operator } = predicate;

  if (operator === 'IS' || operator === 'IS NOT') {
    return `${column} ${operator} NULL`;
  }

  if (operator === 'BETWEEN') {
    const bounds = Array.isArray(predicate.value) ? predicate.value : [];
    const low = bind(context, bounds[0]);
    const high = bind(context, bounds[1]);
    return `${column} BETWEEN ${low} AND ${high}`;
  }

  if (operator === '= ANY') {
    return `${column} = ANY(${bind(context, predicate.value)})`;
  }

  return `${column} ${operator} ${bind(context, predicate.value)}`;
}

/**
 * Render a list of predicates AND-combined, in order.
 */
export function renderPredicates(predicates: readonly Predicate[], context: RenderContext): string {
  return predicates
    .map(predicate => renderPredicate(predicate, context))
    .filter(fragment => fragment.length > 0)
    .join(' AND ');
}

const predicates = {
  isPredicate,
  comparison,
  group,
  and,
  or,
  raw,
  never,
  renderPredicate,
  renderPredicates,
} as const;

export default predicates;

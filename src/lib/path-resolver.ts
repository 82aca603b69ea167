import { UnknownAttribute } from './errors.js';
import type {
  ColumnDescriptor,
  RelationDescriptor,
  SchemaDescriptor,
  SchemaRegistry,
} from './schema.js';

const ALIAS_PATTERN = /\s+as\s+/i;

/**
 * One relationship hop taken while walking a dotted path.
 */
export interface RelationStep {
  /** Dotted path from the root up to and including this relation */
  path: string;
  relation: RelationDescriptor;
  source: SchemaDescriptor;
  target: SchemaDescriptor;
}

export interface ResolvedPath {
  /** Path without alias or model-name prefix */
  path: string;
  alias: string | null;
  steps: RelationStep[];
  /** Schema that owns the terminal segment */
  schema: SchemaDescriptor;
  /** Terminal column, or null when the path ends on a relation */
  column: ColumnDescriptor | null;
  /** Terminal relation when the path ends on one */
  relation: RelationStep | null;
  /** True when any traversed relation is to-many */
  crossesMany: boolean;
}

/**
 * Split `"field as Alias"` into its path and alias.
 */
export function splitAlias(reference: string): { path: string; alias: string | null } {
  const parts = reference.split(ALIAS_PATTERN).map(part => part.trim());
  if (parts.length === 2 && parts[0] && parts[1]) {
    return { path: parts[0], alias: parts[1] };
  }
  return { path: reference.trim(), alias: null };
}

/**
 * Drop a leading `"<SchemaName>."` qualifier unless the first segment is
 * itself an attribute of the schema.
 */
export function stripModelPrefix(schema: SchemaDescriptor, path: string): string {
  const prefix = `${schema.name}.`;
  if (!path.startsWith(prefix)) {
    return path;
  }
  if (schema.hasColumn(schema.name) || schema.getRelation(schema.name)) {
    return path;
  }
  return path.slice(prefix.length);
}

/**
 * Resolve a dotted attribute path against a root schema.
 *
 * Relation segments move to the target schema; the last segment may be a
 * column or, when `allowRelationTerminal` is set, a relation.
 *
 * @throws {UnknownAttribute} when a segment does not exist where it is used
 */
export function resolvePath(
  registry: SchemaRegistry,
  root: SchemaDescriptor,
  reference: string,
  { allowRelationTerminal = false }: { allowRelationTerminal?: boolean } = {}
): ResolvedPath {
  const { path: aliased, alias } = splitAlias(reference);
  const path = stripModelPrefix(root, aliased);
  const segments = path.split('.');

  const steps: RelationStep[] = [];
  let current = root;

  for (let index = 0; index < segments.length; index++) {
    const segment = segments[index];
    const isLast = index === segments.length - 1;
    if (!segment) {
      throw new UnknownAttribute(current.name, segment, path);
    }

    const relation = current.getRelation(segment);
    if (relation) {
      const target = registry.target(relation);
      steps.push({
        path: segments.slice(0, index + 1).join('.'),
        relation,
        source: current,
        target,
      });
      if (isLast) {
        if (!allowRelationTerminal) {
          throw new UnknownAttribute(current.name, segment, path);
        }
        return {
          path,
          alias,
          steps,
          schema: current,
          column: null,
          relation: steps[steps.length - 1] ?? null,
          crossesMany: steps.some(step => step.relation.cardinality === 'many'),
        };
      }
      current = target;
      continue;
    }

    const column = current.getColumn(segment);
    if (column && isLast) {
      return {
        path,
        alias,
        steps,
        schema: current,
        column,
        relation: null,
        crossesMany: steps.some(step => step.relation.cardinality === 'many'),
      };
    }

    throw new UnknownAttribute(current.name, segment, path);
  }

  throw new UnknownAttribute(root.name, path, path);
}

/**
 * Resolve a path that must end on a relation (joins and includes).
 */
export function resolveRelationPath(
  registry: SchemaRegistry,
  root: SchemaDescriptor,
  reference: string
): ResolvedPath & { relation: RelationStep } {
  const resolved = resolvePath(registry, root, reference, { allowRelationTerminal: true });
  const { relation } = resolved;
  if (!relation) {
    throw new UnknownAttribute(resolved.schema.name, resolved.path, reference);
  }
  return { ...resolved, relation };
}

import DataAccessLayer from './lib/data-access-layer.js';
import { Entity } from './lib/entity.js';
import { EntityCollection } from './lib/entity-collection.js';
import { EntityLifecycle } from './lib/entity-lifecycle.js';
import Errors from './lib/errors.js';
import predicates from './lib/predicate.js';
import type { PostgresConfig } from './lib/postgres-config.js';
import QueryBuilder from './lib/query-builder.js';
import { Repository } from './lib/repository.js';
import { defineSchema, SchemaDescriptor, SchemaRegistry } from './lib/schema.js';
import serializer from './lib/serializer.js';
import runWithTransaction from './lib/transaction-hook-runner.js';
import types from './lib/type.js';

/**
 * Data Access Layer (DAL) for PostgreSQL
 *
 * Schema-driven query building with relationship paths, entity lifecycle
 * flows with hook-aware transactions, and serialization of loaded graphs.
 */

type CreateDataAccessLayer = ((config?: Partial<PostgresConfig>) => DataAccessLayer) & {
  DataAccessLayer: typeof DataAccessLayer;
  QueryBuilder: typeof QueryBuilder;
  Repository: typeof Repository;
  types: typeof types;
  Errors: typeof Errors;
  predicates: typeof predicates;
  serializer: typeof serializer;
};

/**
 * Create a PostgreSQL Data Access Layer (DAL) instance.
 *
 * @param config Optional PostgreSQL configuration overrides; unset values
 * come from the environment and then from the defaults.
 */
const createDataAccessLayer: CreateDataAccessLayer = Object.assign(
  (config?: Partial<PostgresConfig>) => new DataAccessLayer(config),
  {
    DataAccessLayer,
    QueryBuilder,
    Repository,
    types,
    Errors,
    predicates,
    serializer,
  }
);

export {
  DataAccessLayer,
  QueryBuilder,
  Repository,
  EntityLifecycle,
  EntityCollection,
  Entity,
  SchemaDescriptor,
  SchemaRegistry,
  defineSchema,
  runWithTransaction,
  types,
  Errors,
  predicates,
  serializer,
  createDataAccessLayer,
};

export * from './lib/errors.js';
export { comparison, and, or, raw, never, isPredicate } from './lib/predicate.js';
export { serialize, serializeMany, toPrimitive } from './lib/serializer.js';
export { resolvePath, resolveRelationPath } from './lib/path-resolver.js';
export { compileFilters, FILTER_OPERATORS } from './lib/predicate-compiler.js';
export { TransactionScope } from './lib/transaction-scope.js';
export { PgSession, PgCursorSession, fromPoolClient } from './lib/pg-session.js';
export { resolvePostgresConfig, toPoolConfig, DEFAULT_POSTGRES_CONFIG } from './lib/postgres-config.js';
export { setDebugLogger, resetDebugLogger } from './lib/runtime.js';

export type { PostgresConfig };
export type { SessionOptions } from './lib/data-access-layer.js';
export type { DalDebugLogger } from './lib/runtime.js';
export type { FilterSpec, FilterOperator } from './lib/predicate-compiler.js';
export type { Predicate, ComparisonOperator } from './lib/predicate.js';
export type { QueryOptions } from './lib/query-builder.js';
export type { FindOptions, FinderOptions, ListOptions, Page } from './lib/repository.js';
export type {
  DeleteOptions,
  DeleteTarget,
  LifecycleHooks,
  LifecycleOptions,
  SoftDeleteOptions,
} from './lib/entity-lifecycle.js';
export type { TransactionOptions, TransactionContext } from './lib/transaction-hook-runner.js';
export type {
  SessionHandle,
  Statement,
  StatementCursor,
  StatementResult,
} from './lib/session.js';
export type { SqlClient } from './lib/pg-session.js';
export type { SerializeOptions } from './lib/serializer.js';
export type {
  ColumnMap,
  InferRecord,
  JsonObject,
  RelationConfig,
  RelationDescriptor,
  SchemaDefinition,
} from './lib/schema.js';

export default createDataAccessLayer;

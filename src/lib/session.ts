import type { Entity } from './entity.js';
import type { JsonObject, SchemaDescriptor } from './schema.js';
import type { TransactionScope } from './transaction-scope.js';

/**
 * Parameterized SQL using `$n` placeholders.
 */
export interface Statement {
  sql: string;
  params: unknown[];
}

export interface StatementResult<TRow extends JsonObject = JsonObject> {
  rows: TRow[];
  rowCount: number;
}

/**
 * Forward-only reader over a statement's rows.
 */
export interface StatementCursor<TRow extends JsonObject = JsonObject> {
  /** Read up to `count` rows; an empty array means the rows are exhausted */
  read(count: number): Promise<TRow[]>;
  close(): Promise<void>;
}

/**
 * Unit-of-work contract the query builder and entity lifecycle talk to.
 *
 * A session exposes exactly one execution capability: `execute` for
 * statement-style stores or `cursor` for cursor-style ones.
 */
export interface SessionHandle {
  readonly scope: TransactionScope;
  add(entity: Entity): void;
  delete(entity: Entity): void;
  flush(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  refresh(entity: Entity): Promise<void>;
  get<TRecord extends object>(
    schema: SchemaDescriptor<TRecord>,
    primaryKey: unknown
  ): Promise<Entity<TRecord> | null>;
  inTransaction(): boolean;
  close(): Promise<void>;
  execute?(statement: Statement): Promise<StatementResult>;
  cursor?(statement: Statement): StatementCursor;
}

export type StatementSession = SessionHandle & {
  execute(statement: Statement): Promise<StatementResult>;
};

export type CursorSession = SessionHandle & {
  cursor(statement: Statement): StatementCursor;
};

export const isStatementSession = (session: SessionHandle): session is StatementSession =>
  typeof session.execute === 'function';

export const isCursorSession = (session: SessionHandle): session is CursorSession =>
  typeof session.cursor === 'function';

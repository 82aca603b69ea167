import type { PoolClient } from 'pg';

import { Entity } from './entity.js';
import { ConfigurationError, convertPostgreSQLError, NotFound } from './errors.js';
import { debug, describeError } from './runtime.js';
import type { JsonObject, SchemaDescriptor } from './schema.js';
import type {
  SessionHandle,
  Statement,
  StatementCursor,
  StatementResult,
} from './session.js';
import { TransactionScope } from './transaction-scope.js';

/**
 * Minimal query surface a session needs from a PostgreSQL connection.
 */
export interface SqlClient {
  query(text: string, params: unknown[]): Promise<{ rows: JsonObject[]; rowCount: number | null }>;
  release?(): void;
}

/**
 * Adapt a pooled `pg` client. Releasing the session returns it to the pool.
 */
export function fromPoolClient(client: PoolClient): SqlClient {
  return {
    query: async (text, params) => {
      const result = await client.query<JsonObject>(text, params);
      return { rows: result.rows, rowCount: result.rowCount };
    },
    release: () => client.release(),
  };
}

function encodeValue(entity: Entity, column: string, value: unknown): unknown {
  const descriptor = entity.schema.getColumn(column);
  if (descriptor?.type.kind === 'json' && value !== null && value !== undefined) {
    return JSON.stringify(value);
  }
  return value;
}

/**
 * Unit of work over one PostgreSQL connection.
 *
 * Writes open a transaction; reads run in autocommit unless one is already
 * open. Added entities are written on
 * `flush` (INSERT for new ones, UPDATE of changed columns for loaded ones),
 * deletions after them. `commit` flushes and commits; `rollback` discards
 * pending work.
 */
export abstract class BasePgSession implements SessionHandle {
  readonly scope: TransactionScope;
  protected client: SqlClient;
  private _inTransaction: boolean;
  private _closed: boolean;
  private _pendingWrites: Set<Entity>;
  private _pendingDeletes: Set<Entity>;

  constructor(client: SqlClient) {
    this.client = client;
    this.scope = new TransactionScope();
    this._inTransaction = false;
    this._closed = false;
    this._pendingWrites = new Set();
    this._pendingDeletes = new Set();
  }

  get closed(): boolean {
    return this._closed;
  }

  inTransaction(): boolean {
    return this._inTransaction;
  }

  /**
   * Run a statement. With `transactional` set, a transaction is opened first
   * when none is active.
   */
  protected async run(statement: Statement, transactional = false): Promise<StatementResult> {
    if (this._closed) {
      throw new ConfigurationError('Session is closed');
    }
    if (transactional) {
      await this.ensureTransaction();
    }
    return this.query(statement);
  }

  protected async ensureTransaction(): Promise<void> {
    if (!this._inTransaction) {
      await this.query({ sql: 'BEGIN', params: [] });
      this._inTransaction = true;
      debug.db('Transaction started');
    }
  }

  private async query({ sql, params }: Statement): Promise<StatementResult> {
    try {
      const start = Date.now();
      const result = await this.client.query(sql, params);
      const duration = Date.now() - start;
      debug.db(`Query executed in ${duration}ms: ${sql.substring(0, 100)}`);
      return { rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
    } catch (error) {
      debug.error(`Query error: ${describeError(error)}`);
      debug.error(`Query text: ${sql}`);
      debug.error(`Query params: ${JSON.stringify(params)}`);
      throw convertPostgreSQLError(error);
    }
  }

  /**
   * Begin a transaction explicitly, outside any scoped block.
   */
  async begin(): Promise<void> {
    if (this._closed) {
      throw new ConfigurationError('Session is closed');
    }
    this.scope.markExplicitBegin();
    await this.ensureTransaction();
  }

  /**
   * Run `work` in a scoped block with a transaction open. The outermost
   * block commits when `work` resolves, rolls back when it rejects, and
   * closes the session either way.
   */
  async transaction<T>(work: (session: this) => Promise<T>): Promise<T> {
    return this.scope.run(this, async () => {
      if (this._closed) {
        throw new ConfigurationError('Session is closed');
      }
      await this.ensureTransaction();
      return work(this);
    });
  }

  add(entity: Entity): void {
    this._pendingDeletes.delete(entity);
    this._pendingWrites.add(entity);
  }

  delete(entity: Entity): void {
    this._pendingWrites.delete(entity);
    if (!entity.isNew) {
      this._pendingDeletes.add(entity);
    }
  }

  async flush(): Promise<void> {
    const writes = [...this._pendingWrites];
    const deletes = [...this._pendingDeletes];
    this._pendingWrites.clear();
    this._pendingDeletes.clear();

    for (const entity of writes) {
      if (entity.isNew) {
        await this.insert(entity);
      } else if (entity.changedColumns.length > 0) {
        await this.update(entity);
      }
    }
    for (const entity of deletes) {
      await this.remove(entity);
    }
  }

  private async insert(entity: Entity): Promise<void> {
    const { schema } = entity;
    const columns: string[] = [];
    const params: unknown[] = [];

    for (const [name, descriptor] of schema.columns) {
      let value = entity.getValue(name);
      if (value === undefined && descriptor.type.hasDefault) {
        value = descriptor.type.getDefault();
        entity.setValue(name, value);
      }
      if (value === undefined) {
        descriptor.type.validate(value, name);
        continue;
      }
      columns.push(name);
      params.push(encodeValue(entity, name, descriptor.type.validate(value, name)));
    }

    const sql =
      columns.length === 0
        ? `INSERT INTO ${schema.tableName} DEFAULT VALUES RETURNING *`
        : `INSERT INTO ${schema.tableName} (${columns.join(', ')}) ` +
          `VALUES (${params.map((_, index) => `$${index + 1}`).join(', ')}) RETURNING *`;

    const result = await this.run({ sql, params }, true);
    entity.markPersisted(result.rows[0] ?? {});
  }

  private async update(entity: Entity): Promise<void> {
    const { schema } = entity;
    const assignments: string[] = [];
    const params: unknown[] = [];

    for (const name of entity.changedColumns) {
      const descriptor = schema.getColumn(name);
      if (!descriptor || name === schema.primaryKey) {
        continue;
      }
      params.push(encodeValue(entity, name, descriptor.type.validate(entity.getValue(name), name)));
      assignments.push(`${name} = $${params.length}`);
    }
    if (assignments.length === 0) {
      return;
    }

    params.push(entity.primaryKeyValue);
    const sql =
      `UPDATE ${schema.tableName} SET ${assignments.join(', ')} ` +
      `WHERE ${schema.primaryKey} = $${params.length} RETURNING *`;

    const result = await this.run({ sql, params }, true);
    const [row] = result.rows;
    if (!row) {
      throw new NotFound(`${schema.name} ${String(entity.primaryKeyValue)} no longer exists`);
    }
    entity.markPersisted(row);
  }

  private async remove(entity: Entity): Promise<void> {
    const { schema } = entity;
    await this.run({
      sql: `DELETE FROM ${schema.tableName} WHERE ${schema.primaryKey} = $1`,
      params: [entity.primaryKeyValue],
    }, true);
  }

  async commit(): Promise<void> {
    await this.flush();
    await this.endTransaction('COMMIT');
  }

  async rollback(): Promise<void> {
    this._pendingWrites.clear();
    this._pendingDeletes.clear();
    await this.endTransaction('ROLLBACK');
  }

  protected async endTransaction(command: 'COMMIT' | 'ROLLBACK'): Promise<void> {
    if (!this._inTransaction) {
      return;
    }
    try {
      await this.query({ sql: command, params: [] });
      debug.db(command === 'COMMIT' ? 'Transaction committed' : 'Transaction rolled back');
    } finally {
      this._inTransaction = false;
    }
  }

  /**
   * Reload an entity's columns from the store.
   * @throws {NotFound} when the row is gone
   */
  async refresh(entity: Entity): Promise<void> {
    const { schema } = entity;
    const result = await this.run({
      sql: `SELECT * FROM ${schema.tableName} WHERE ${schema.primaryKey} = $1`,
      params: [entity.primaryKeyValue],
    });
    const [row] = result.rows;
    if (!row) {
      throw new NotFound(`${schema.name} ${String(entity.primaryKeyValue)} no longer exists`);
    }
    entity.markPersisted(row);
  }

  async get<TRecord extends object>(
    schema: SchemaDescriptor<TRecord>,
    primaryKey: unknown
  ): Promise<Entity<TRecord> | null> {
    if (primaryKey === null || primaryKey === undefined) {
      return null;
    }
    const result = await this.run({
      sql: `SELECT * FROM ${schema.tableName} WHERE ${schema.primaryKey} = $1`,
      params: [primaryKey],
    });
    const [row] = result.rows;
    return row ? Entity.fromRow(schema, row) : null;
  }

  /**
   * Roll back unfinished work and release the connection. Safe to call twice.
   */
  async close(): Promise<void> {
    if (this._closed) {
      return;
    }
    try {
      if (this._inTransaction) {
        await this.rollback();
      }
    } catch (error) {
      debug.error(`Rollback while closing session failed: ${describeError(error)}`);
    } finally {
      this._closed = true;
      this.client.release?.();
    }
  }
}

/**
 * Session whose queries run as plain statements.
 */
export class PgSession extends BasePgSession {
  async execute(statement: Statement): Promise<StatementResult> {
    return this.run(statement);
  }
}

let cursorSequence = 0;

/**
 * Session whose queries are read through server-side cursors
 * (`DECLARE` / `FETCH` / `CLOSE`). Cursors need a transaction; when none is
 * open the cursor begins one and ends it on close: committed after clean
 * reads, rolled back after a failed one.
 */
export class PgCursorSession extends BasePgSession {
  cursor(statement: Statement): StatementCursor {
    const name = `strata_cursor_${++cursorSequence}`;
    let declared = false;
    let ownsTransaction = false;
    let failed = false;
    let closed = false;

    return {
      read: async (count: number): Promise<JsonObject[]> => {
        if (closed) {
          return [];
        }
        try {
          if (!declared) {
            if (!this.inTransaction()) {
              await this.ensureTransaction();
              ownsTransaction = true;
            }
            await this.run({
              sql: `DECLARE ${name} NO SCROLL CURSOR FOR ${statement.sql}`,
              params: statement.params,
            });
            declared = true;
          }
          const result = await this.run({ sql: `FETCH FORWARD ${count} FROM ${name}`, params: [] });
          return result.rows;
        } catch (error) {
          failed = true;
          throw error;
        }
      },
      close: async (): Promise<void> => {
        if (closed) {
          return;
        }
        closed = true;
        if (!this.inTransaction()) {
          return;
        }
        // After a failed read the transaction is aborted and only ROLLBACK is accepted.
        const clean = declared && !failed;
        if (clean) {
          await this.run({ sql: `CLOSE ${name}`, params: [] });
        }
        if (ownsTransaction) {
          await this.endTransaction(clean ? 'COMMIT' : 'ROLLBACK');
        }
      },
    };
  }
}

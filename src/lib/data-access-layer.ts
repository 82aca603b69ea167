import type { PoolClient, QueryResult } from 'pg';
import { Pool } from 'pg';

import { ConfigurationError, ConnectionError, convertPostgreSQLError } from './errors.js';
import type { LifecycleOptions } from './entity-lifecycle.js';
import type { BasePgSession, SqlClient } from './pg-session.js';
import { fromPoolClient, PgCursorSession, PgSession } from './pg-session.js';
import type { PostgresConfig } from './postgres-config.js';
import { resolvePostgresConfig, toPoolConfig } from './postgres-config.js';
import { Repository } from './repository.js';
import { debug, describeError } from './runtime.js';
import type {
  ColumnMap,
  InferRecord,
  JsonObject,
  SchemaDefinition,
  SchemaDescriptor,
} from './schema.js';
import { defineSchema, SchemaRegistry } from './schema.js';
import type { SessionHandle } from './session.js';
import types from './type.js';

export interface SessionOptions {
  /** Read query results through server-side cursors instead of plain statements */
  cursor?: boolean;
}

/**
 * Main Data Access Layer class for PostgreSQL
 *
 * Owns the connection pool and the schema registry, and hands out sessions
 * bound to one pooled connection each.
 */
class DataAccessLayer {
  config: Partial<PostgresConfig>;
  pool: Pool | null;
  readonly registry: SchemaRegistry;
  private _connected: boolean;

  types = types;

  constructor(config: Partial<PostgresConfig> = {}) {
    this.config = { ...resolvePostgresConfig(), ...config };
    this.pool = null;
    this._connected = false;
    this.registry = new SchemaRegistry();
  }

  /**
   * Initialize the connection pool and connect to PostgreSQL
   * @returns This instance for chaining
   */
  async connect(): Promise<this> {
    if (this._connected) {
      return this;
    }

    try {
      this.pool = new Pool(toPoolConfig(this.config));

      const client = await this.pool.connect();
      await client.query('SELECT NOW()');
      client.release();

      this._connected = true;
      debug.db('PostgreSQL connection pool established');

      this.pool.on('connect', () => {
        debug.db('New PostgreSQL client connected');
      });

      this.pool.on('error', (err: Error) => {
        debug.error(`PostgreSQL pool error: ${err.message}`);
        debug.error({ error: err });
      });

      return this;
    } catch (error) {
      debug.error(`Failed to connect to PostgreSQL: ${describeError(error)}`);
      const pool = this.pool;
      this.pool = null;
      if (pool) {
        await pool.end().catch((endError: unknown) => {
          debug.error(`Closing pool after failed connect failed: ${describeError(endError)}`);
        });
      }
      throw new ConnectionError(`Failed to connect to PostgreSQL: ${describeError(error)}`, error);
    }
  }

  /**
   * Close all connections. Registered schemas are kept.
   */
  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this._connected = false;
      debug.db('PostgreSQL connection pool closed');
    }
  }

  isConnected(): boolean {
    return Boolean(this._connected && this.pool && !this.pool.ended);
  }

  getPoolStats(): { totalCount: number; idleCount: number; waitingCount: number } | null {
    if (!this.pool) {
      return null;
    }

    return {
      totalCount: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount,
    };
  }

  private async getConnection(): Promise<PoolClient> {
    if (!this._connected || !this.pool) {
      throw new ConfigurationError('DAL not connected. Call connect() first.');
    }
    return this.pool.connect();
  }

  /**
   * Execute one statement on the pool, outside any session.
   */
  async query<TRow extends JsonObject = JsonObject>(
    text: string,
    params: unknown[] = []
  ): Promise<QueryResult<TRow>> {
    if (!this.pool) {
      throw new ConfigurationError('DAL not connected. Call connect() first.');
    }

    try {
      const start = Date.now();
      const result = await this.pool.query<TRow>(text, params);
      const duration = Date.now() - start;

      debug.db(`Query executed in ${duration}ms: ${text.substring(0, 100)}`);
      return result;
    } catch (error) {
      debug.error(`Query error: ${describeError(error)}`);
      debug.error(`Query text: ${text}`);
      debug.error(`Query params: ${JSON.stringify(params)}`);
      throw convertPostgreSQLError(error);
    }
  }

  /**
   * Define and register a schema in one step.
   */
  defineSchema<TColumns extends ColumnMap>(
    definition: SchemaDefinition<TColumns>
  ): SchemaDescriptor<InferRecord<TColumns>> {
    const schema = defineSchema(definition);
    this.registry.register(schema);
    debug.db(`Schema '${schema.name}' registered`);
    return schema;
  }

  registerSchema(schema: SchemaDescriptor): void {
    this.registry.register(schema);
    debug.db(`Schema '${schema.name}' registered`);
  }

  /**
   * Session over an arbitrary client, for callers that manage connections
   * themselves.
   */
  createSession(client: SqlClient, { cursor = false }: SessionOptions = {}): BasePgSession {
    return cursor ? new PgCursorSession(client) : new PgSession(client);
  }

  /**
   * Acquire a pooled connection, run `work` with a session over it and
   * close the session afterwards. Work left uncommitted is rolled back.
   */
  async withSession<T>(
    work: (session: BasePgSession) => Promise<T>,
    options: SessionOptions = {}
  ): Promise<T> {
    const client = await this.getConnection();
    const session = this.createSession(fromPoolClient(client), options);
    try {
      return await work(session);
    } finally {
      await session.close();
    }
  }

  repository<TRecord extends object>(
    schema: SchemaDescriptor<TRecord>,
    session: SessionHandle,
    options: LifecycleOptions<TRecord> = {}
  ): Repository<TRecord> {
    if (!this.registry.has(schema.name)) {
      this.registry.register(schema);
    }
    return new Repository(schema, this.registry, session, options);
  }
}

export { DataAccessLayer };
export default DataAccessLayer;

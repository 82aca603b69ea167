import { ConfigurationError } from './errors.js';
import type { JsonObject } from './schema.js';
import type { CursorSession, SessionHandle, Statement, StatementSession } from './session.js';
import { isCursorSession, isStatementSession } from './session.js';

/**
 * Row source the query builder executes its statements against.
 */
export interface QueryBackend {
  readonly kind: 'statement' | 'cursor';
  fetchAll(statement: Statement): Promise<JsonObject[]>;
  fetchFirst(statement: Statement): Promise<JsonObject | null>;
}

const DEFAULT_BATCH_SIZE = 100;

export class StatementBackend implements QueryBackend {
  readonly kind = 'statement' as const;
  private session: StatementSession;

  constructor(session: StatementSession) {
    this.session = session;
  }

  async fetchAll(statement: Statement): Promise<JsonObject[]> {
    const result = await this.session.execute(statement);
    return result.rows;
  }

  async fetchFirst(statement: Statement): Promise<JsonObject | null> {
    const result = await this.session.execute(statement);
    return result.rows[0] ?? null;
  }
}

/**
 * Reads rows through a session cursor in batches. The cursor is always
 * closed, also when reading fails.
 */
export class CursorBackend implements QueryBackend {
  readonly kind = 'cursor' as const;
  private session: CursorSession;
  private batchSize: number;

  constructor(session: CursorSession, batchSize = DEFAULT_BATCH_SIZE) {
    this.session = session;
    this.batchSize = batchSize;
  }

  async fetchAll(statement: Statement): Promise<JsonObject[]> {
    const cursor = this.session.cursor(statement);
    const rows: JsonObject[] = [];
    try {
      for (;;) {
        const batch = await cursor.read(this.batchSize);
        if (batch.length === 0) {
          break;
        }
        rows.push(...batch);
      }
    } finally {
      await cursor.close();
    }
    return rows;
  }

  async fetchFirst(statement: Statement): Promise<JsonObject | null> {
    const cursor = this.session.cursor(statement);
    try {
      const [row] = await cursor.read(1);
      return row ?? null;
    } finally {
      await cursor.close();
    }
  }
}

/**
 * Pick the backend matching the session's execution capability.
 *
 * @throws {ConfigurationError} when the session can neither execute
 * statements nor open cursors
 */
export function selectBackend(session: SessionHandle): QueryBackend {
  if (isStatementSession(session)) {
    return new StatementBackend(session);
  }
  if (isCursorSession(session)) {
    return new CursorBackend(session);
  }
  throw new ConfigurationError(
    'Session supports neither statement execution nor cursors; cannot run queries'
  );
}

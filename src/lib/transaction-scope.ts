import { debug, describeError } from './runtime.js';

/**
 * The parts of a session a scope drives when its outermost block exits.
 */
export interface ScopedSession {
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Per-session record of scoped transaction blocks.
 *
 * `openedViaScope` is raised when a scoped block is entered and lowered only
 * when a transaction is begun explicitly, so it stays set after the block
 * exits. Lifecycle operations read it to decide whether they own the commit.
 */
export class TransactionScope {
  private _depth = 0;
  private _openedViaScope = false;

  get depth(): number {
    return this._depth;
  }

  get openedViaScope(): boolean {
    return this._openedViaScope;
  }

  get active(): boolean {
    return this._depth > 0;
  }

  enter(): void {
    this._depth += 1;
    this._openedViaScope = true;
  }

  /**
   * Leave one block.
   * @returns true when the outermost block was left
   */
  exit(): boolean {
    if (this._depth === 0) {
      return false;
    }
    this._depth -= 1;
    return this._depth === 0;
  }

  /** Record that a transaction was begun outside any scoped block */
  markExplicitBegin(): void {
    this._openedViaScope = false;
  }

  /**
   * Run `work` inside a scoped block. Only the outermost block commits on
   * success, rolls back on failure and closes the session; nested blocks
   * just track depth.
   */
  async run<T>(session: ScopedSession, work: () => Promise<T>): Promise<T> {
    this.enter();
    let result: T;
    try {
      result = await work();
    } catch (error) {
      if (this.exit()) {
        try {
          await session.rollback();
        } catch (rollbackError) {
          debug.error(`Rollback after failed transaction block failed: ${describeError(rollbackError)}`);
        }
        await session.close();
      }
      throw error;
    }

    if (this.exit()) {
      try {
        await session.commit();
      } finally {
        await session.close();
      }
    }
    return result;
  }
}

export default TransactionScope;

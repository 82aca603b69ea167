import { Entity } from './entity.js';
import { HookDeclined, isStoreError } from './errors.js';
import { debug, describeError } from './runtime.js';
import type { SessionHandle } from './session.js';

export interface TransactionOptions {
  /** Commit when no transaction is already open */
  autocommit?: boolean;
  /** Reload the entity after a commit this call made */
  refreshOnCommit?: boolean;
  /** Resolve with the context's caller instead of the unit of work's result */
  returnSelfOnSuccess?: boolean;
}

export interface TransactionContext<TCaller = never> {
  session: SessionHandle;
  /** Operation name used in log lines and `HookDeclined` errors */
  operation?: string;
  caller?: TCaller;
}

/**
 * Result of a unit of work. Any falsy value means a hook declined.
 */
export type UnitOfWorkResult<TResult> = TResult | null | undefined | false;

export const DEFAULT_TRANSACTION_OPTIONS: Required<TransactionOptions> = {
  autocommit: false,
  refreshOnCommit: true,
  returnSelfOnSuccess: false,
};

/**
 * Run a persistence unit of work with commit, flush and rollback handling.
 *
 * The call manages the transaction when autocommit is on (explicitly or
 * because the session was opened through a scoped block) and no transaction
 * is open yet. A managed call commits a truthy result, and rolls back and
 * resolves `null` for a falsy result or a store failure. An unmanaged call
 * only flushes; a falsy result raises `HookDeclined` and store failures are
 * re-raised after a rollback attempt. Rollback is attempted at most once and
 * its own failure is logged, never raised in place of the original error.
 */
export async function runWithTransaction<TResult, TCaller = never>(
  context: TransactionContext<TCaller>,
  unitOfWork: () => Promise<UnitOfWorkResult<TResult>> | UnitOfWorkResult<TResult>,
  options: TransactionOptions = {}
): Promise<TResult | TCaller | null> {
  const { session, operation = 'operation' } = context;
  const { autocommit, refreshOnCommit, returnSelfOnSuccess } = {
    ...DEFAULT_TRANSACTION_OPTIONS,
    ...options,
  };

  const manage = (autocommit || session.scope.openedViaScope) && !session.inTransaction();

  let rolledBack = false;
  const rollbackOnce = async (): Promise<void> => {
    if (rolledBack) {
      return;
    }
    rolledBack = true;
    try {
      await session.rollback();
      debug.db(`Rolled back ${operation}`);
    } catch (rollbackError) {
      debug.error(`Rollback of ${operation} failed: ${describeError(rollbackError)}`);
    }
  };

  let result: UnitOfWorkResult<TResult>;
  try {
    result = await unitOfWork();

    if (result) {
      if (manage) {
        try {
          await session.commit();
        } catch (commitError) {
          await rollbackOnce();
          throw commitError;
        }
        if (refreshOnCommit && result instanceof Entity) {
          try {
            await session.refresh(result);
          } catch (refreshError) {
            debug.error(`Refresh after ${operation} failed: ${describeError(refreshError)}`);
          }
        }
      } else {
        await session.flush();
      }
    }
  } catch (error) {
    if (isStoreError(error)) {
      await rollbackOnce();
      if (manage) {
        debug.error(`${operation} failed and was rolled back: ${describeError(error)}`);
        return null;
      }
      throw error;
    }
    if (manage) {
      await rollbackOnce();
    }
    throw error;
  }

  if (result) {
    return returnSelfOnSuccess && context.caller !== undefined ? context.caller : result;
  }

  if (manage) {
    await rollbackOnce();
    return null;
  }
  throw new HookDeclined(operation);
}

export default runWithTransaction;

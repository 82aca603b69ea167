import assert from 'node:assert/strict';
import test from 'node:test';

import {
  ConnectionError,
  ConstraintViolation,
  convertPostgreSQLError,
  DALError,
  InvalidOperand,
  isStoreError,
  NotFound,
  QueryError,
  StoreError,
} from '../src/lib/errors.js';

const pgError = (code: string, fields: Record<string, string> = {}) =>
  Object.assign(new Error('server said no'), { code, ...fields });

test('unique and foreign key violations become ConstraintViolation', () => {
  const unique = convertPostgreSQLError(
    pgError('23505', { detail: 'Key (mrn)=(M1) already exists.', constraint: 'patients_mrn_key' })
  );
  assert.ok(unique instanceof ConstraintViolation);
  assert.equal(unique.message, 'Unique constraint violation: Key (mrn)=(M1) already exists.');
  assert.equal(unique.constraint, 'patients_mrn_key');

  const foreign = convertPostgreSQLError(pgError('23503'));
  assert.ok(foreign instanceof ConstraintViolation);
  assert.equal(foreign.message, 'Foreign key constraint violation: server said no');
});

test('connection and catalogue errors map to their classes', () => {
  assert.ok(convertPostgreSQLError(pgError('08006')) instanceof ConnectionError);

  const missing = convertPostgreSQLError(pgError('42P01'));
  assert.ok(missing instanceof QueryError);
  assert.equal(missing.message, 'Table does not exist: server said no');

  assert.ok(convertPostgreSQLError(pgError('40P01')) instanceof QueryError);
});

test('DAL errors and plain programming errors pass through', () => {
  const notFound = new NotFound();
  assert.equal(convertPostgreSQLError(notFound), notFound);

  const operand = new InvalidOperand('id__in', 'an array or Set of values');
  assert.equal(convertPostgreSQLError(operand), operand);

  const bug = new TypeError('undefined is not a function');
  assert.equal(convertPostgreSQLError(bug), bug);

  assert.ok(convertPostgreSQLError('boom') instanceof QueryError);
});

test('only store failures count as store errors', () => {
  assert.equal(isStoreError(new QueryError('x')), true);
  assert.equal(isStoreError(new ConstraintViolation('x')), true);
  assert.equal(isStoreError(new NotFound()), false);
  assert.equal(isStoreError(new Error('x')), false);
});

test('error classes carry names and codes', () => {
  const error = new NotFound('Study 4 does not exist');
  assert.ok(error instanceof DALError);
  assert.equal(error.name, 'NotFound');
  assert.equal(error.code, 'NOT_FOUND');

  const store = new QueryError('x');
  assert.ok(store instanceof StoreError);
  assert.equal(store.code, 'QUERY_ERROR');

  const operand = new InvalidOperand('id__between', 'an array of exactly two values');
  assert.ok(operand instanceof TypeError);
  assert.equal(operand.message, "'id__between' expects an array of exactly two values");
});

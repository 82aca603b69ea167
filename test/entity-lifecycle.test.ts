import assert from 'node:assert/strict';
import test from 'node:test';

import { Entity } from '../src/lib/entity.js';
import type { LifecycleOptions } from '../src/lib/entity-lifecycle.js';
import { EntityLifecycle } from '../src/lib/entity-lifecycle.js';
import {
  ConfigurationError,
  HookDeclined,
  NotFound,
  ValidationError,
} from '../src/lib/errors.js';
import type { SchemaDescriptor } from '../src/lib/schema.js';
import { FakeStatementSession } from './helpers/fake-session.js';
import { createRegistry, Patient, Study } from './helpers/schemas.js';

const lifecycle = <TRecord extends object>(
  schema: SchemaDescriptor<TRecord>,
  options: LifecycleOptions<TRecord> = {},
  session = new FakeStatementSession()
) => ({ session, flows: new EntityLifecycle(schema, createRegistry(), session, options) });

test('populate skips guarded, unknown and primary key fields and trims strings', () => {
  const { flows } = lifecycle(Patient, { guardFields: ['mrn'] });
  const entity = flows.populate(new Entity(Patient), {
    id: 5,
    name: '  Ann  ',
    mrn: 'M1',
    created_at: '2024-01-01',
    favourite_colour: 'teal',
    birth_date: '1990-04-01',
  });

  assert.deepEqual(entity.snapshot(), { name: 'Ann', birth_date: '1990-04-01' });
});

test('populate honours a whitelist and manual primary keys', () => {
  const { flows: whitelisted } = lifecycle(Patient, { whitelistFields: ['name'] });
  assert.deepEqual(whitelisted.populate(new Entity(Patient), { name: 'Ann', mrn: 'M1' }).snapshot(), {
    name: 'Ann',
  });

  const { flows: manual } = lifecycle(Patient, { allowManualPrimaryKey: true });
  assert.equal(manual.populate(new Entity(Patient), { id: 9 }).primaryKeyValue, 9);
});

test('create inserts, commits and refreshes under autocommit', async () => {
  const { session, flows } = lifecycle(Patient, { autocommit: true });

  const created = await flows.create({ name: 'Ann', mrn: 'M1', deleted_at: new Date() });

  assert.equal(created?.primaryKeyValue, 100);
  assert.equal(created?.hasValue('deleted_at'), false);
  assert.deepEqual(session.events, ['add:Patient', 'flush', 'flush', 'commit', 'refresh:Patient']);
  assert.deepEqual(session.stored(Patient, 100), { name: 'Ann', mrn: 'M1', id: 100 });
});

test('a declining before-hook rolls back a managed create', async () => {
  const { session, flows } = lifecycle(Patient, {
    autocommit: true,
    hooks: { beforeCreate: () => false },
  });

  assert.equal(await flows.create({ name: 'Ann' }), null);
  assert.deepEqual(session.events, ['rollback']);
  assert.equal(session.stored(Patient, 100), undefined);
});

test('a declining hook raises HookDeclined when the caller owns the transaction', async () => {
  const { flows } = lifecycle(Patient, { hooks: { afterSave: async () => false } });
  await assert.rejects(flows.create({ name: 'Ann' }), HookDeclined);
});

test('update passes the stored row to after-hooks', async () => {
  const session = new FakeStatementSession().seed(Patient, { id: 1, name: 'Ann', mrn: 'M1' });
  const seen: Array<[unknown, unknown]> = [];
  const { flows } = lifecycle(
    Patient,
    {
      autocommit: true,
      hooks: {
        afterUpdate: (entity, prior) => {
          seen.push([entity.get('name'), prior.get('name')]);
          return true;
        },
      },
    },
    session
  );

  const updated = await flows.update({ id: 1, name: 'Ann Baker' });

  assert.equal(updated?.get('name'), 'Ann Baker');
  assert.deepEqual(seen, [['Ann Baker', 'Ann']]);
  assert.equal(session.stored(Patient, 1)?.name, 'Ann Baker');
});

test('update of a missing record raises NotFound without writing', async () => {
  const { session, flows } = lifecycle(Patient, { autocommit: true });

  await assert.rejects(flows.update({ id: 42, name: 'Nobody' }), NotFound);
  assert.deepEqual(session.events, ['get:Patient:42', 'rollback']);
});

test('update needs a primary key', async () => {
  const { session, flows } = lifecycle(Patient);
  await assert.rejects(flows.update({ name: 'Ann' }), ValidationError);
  assert.deepEqual(session.events, []);
});

test('a declining beforeUpdate leaves the stored row alone', async () => {
  const session = new FakeStatementSession().seed(Patient, { id: 1, name: 'Ann' });
  const { flows } = lifecycle(
    Patient,
    { autocommit: true, hooks: { beforeUpdate: () => false } },
    session
  );

  assert.equal(await flows.update({ id: 1, name: 'Changed' }), null);
  assert.equal(session.stored(Patient, 1)?.name, 'Ann');
  assert.deepEqual(session.events, ['get:Patient:1', 'rollback']);
});

test('save creates without a primary key and updates with one', async () => {
  const session = new FakeStatementSession().seed(Patient, { id: 1, name: 'Ann' });
  const { flows } = lifecycle(Patient, {}, session);

  const created = await flows.save({ name: 'Ben' });
  const updated = await flows.save({ id: 1, name: 'Ann Baker' });

  assert.equal(created?.primaryKeyValue, 100);
  assert.equal(updated?.primaryKeyValue, 1);
  assert.equal(session.stored(Patient, 1)?.name, 'Ann Baker');
});

test('upsert updates the record found through a unique column', async () => {
  const session = new FakeStatementSession()
    .seed(Patient, { id: 1, name: 'Ann', mrn: 'M1' })
    .respond('FROM patients', [{ id: 1, name: 'Ann', mrn: 'M1' }]);
  const { flows } = lifecycle(Patient, {}, session);

  const result = await flows.upsert({ mrn: 'M1', name: 'Ann Carter' });

  assert.equal(result?.primaryKeyValue, 1);
  assert.equal(session.stored(Patient, 1)?.name, 'Ann Carter');
  assert.deepEqual(session.statements[0]?.params, ['M1']);
  assert.match(session.statements[0]?.sql ?? '', /WHERE patients\.mrn = \$1 LIMIT 1$/);
});

test('upsert creates when no unique column matches', async () => {
  const { session, flows } = lifecycle(Patient);
  const result = await flows.upsert({ mrn: 'M2', name: 'Ben' });

  assert.equal(result?.primaryKeyValue, 100);
  assert.deepEqual(session.stored(Patient, 100), { mrn: 'M2', name: 'Ben', id: 100 });
});

test('getOrCreate returns an existing match without writing', async () => {
  const session = new FakeStatementSession().respond('FROM patients', [{ id: 3, name: 'Cy' }]);
  const { flows } = lifecycle(Patient, {}, session);

  const found = await flows.getOrCreate({ name: 'Cy' });

  assert.equal(found?.primaryKeyValue, 3);
  assert.deepEqual(session.events, []);
});

test('soft delete records who and why, and repeating it writes nothing', async () => {
  const session = new FakeStatementSession().seed(Patient, { id: 1, name: 'Ann', deleted_at: null });
  const { flows } = lifecycle(Patient, { autocommit: true }, session);
  const entity = Entity.fromRow(Patient, { id: 1, name: 'Ann', deleted_at: null });

  await flows.softDelete(entity, { by: 'records-admin', reason: 'duplicate' });

  assert.equal(entity.isDeleted, true);
  assert.equal(entity.get('deleted_by'), 'records-admin');
  assert.equal(entity.get('deletion_reason'), 'duplicate');

  const before = session.events.length;
  const again = await flows.softDelete(entity);
  assert.equal(again, entity);
  assert.deepEqual(session.events.slice(before), ['flush', 'commit', 'refresh:Patient']);
});

test('restore clears the soft-delete columns', async () => {
  const session = new FakeStatementSession();
  const { flows } = lifecycle(Patient, {}, session);
  const entity = Entity.fromRow(Patient, {
    id: 1,
    name: 'Ann',
    deleted_at: new Date('2024-05-01T00:00:00Z'),
    deleted_by: 'records-admin',
    deletion_reason: 'duplicate',
  });

  await flows.restore(entity);

  assert.equal(entity.isDeleted, false);
  assert.equal(entity.get('deleted_by'), null);
  assert.equal(entity.get('deletion_reason'), null);
});

test('soft deletion needs a deleted_at column', async () => {
  const { flows } = lifecycle(Study);
  await assert.rejects(flows.softDelete(Entity.fromRow(Study, { id: 1 })), ConfigurationError);
});

test('delete removes records of schemas without soft deletion', async () => {
  const session = new FakeStatementSession()
    .seed(Study, { id: 3, description: 'Head' })
    .respond('FROM studies', [{ id: 3, description: 'Head' }]);
  const { flows } = lifecycle(Study, { autocommit: true }, session);

  assert.equal(await flows.delete({ value: 3 }), true);
  assert.equal(session.stored(Study, 3), undefined);
  assert.deepEqual(session.events, ['delete:Study', 'flush', 'flush', 'commit']);
});

test('delete soft-deletes when the schema supports it unless permanent', async () => {
  const session = new FakeStatementSession().seed(Patient, { id: 1, name: 'Ann' });
  const { flows } = lifecycle(Patient, {}, session);
  const soft = Entity.fromRow(Patient, { id: 1, name: 'Ann', deleted_at: null });

  assert.equal(await flows.delete(soft), true);
  assert.equal(soft.isDeleted, true);
  assert.notEqual(session.stored(Patient, 1), undefined);

  assert.equal(await flows.delete(soft, { permanent: true }), true);
  assert.equal(session.stored(Patient, 1), undefined);
});

test('delete reports a missing target', async () => {
  const { flows } = lifecycle(Study);
  await assert.rejects(flows.delete({ value: 99 }), NotFound);
  await assert.rejects(flows.delete(new Entity(Study, { description: 'unsaved' })), NotFound);
});

test('a declined managed delete resolves false', async () => {
  const session = new FakeStatementSession().seed(Study, { id: 3 });
  const { flows } = lifecycle(
    Study,
    { autocommit: true, hooks: { beforeDelete: () => false } },
    session
  );

  assert.equal(await flows.delete(Entity.fromRow(Study, { id: 3 })), false);
  assert.notEqual(session.stored(Study, 3), undefined);
});

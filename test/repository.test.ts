import assert from 'node:assert/strict';
import test from 'node:test';

import { Entity } from '../src/lib/entity.js';
import { EntityCollection } from '../src/lib/entity-collection.js';
import { Repository } from '../src/lib/repository.js';
import { FakeStatementSession } from './helpers/fake-session.js';
import { createRegistry, Patient, Series } from './helpers/schemas.js';

const PATIENT_COLUMNS =
  'patients.id, patients.name, patients.mrn, patients.birth_date, ' +
  'patients.deleted_at, patients.deleted_by, patients.deletion_reason';

const repository = (session = new FakeStatementSession()) => ({
  session,
  patients: new Repository(Patient, createRegistry(), session, { autocommit: true }),
});

test('find looks a record up by primary key', async () => {
  const { session, patients } = repository(
    new FakeStatementSession().respond('FROM patients', [{ id: 1, name: 'Ann' }])
  );

  const found = await patients.find(1);

  assert.equal(found?.get('name'), 'Ann');
  assert.deepEqual(session.statements[0], {
    sql: `SELECT ${PATIENT_COLUMNS} FROM patients WHERE patients.id = $1 LIMIT 1`,
    params: [1],
  });
  assert.equal(await patients.find(null), null);
  assert.equal(session.statements.length, 1);
});

test('findBy filters on any column', async () => {
  const { session, patients } = repository();
  assert.equal(await patients.findBy('mrn', 'M9'), null);
  assert.deepEqual(session.statements[0]?.params, ['M9']);
});

test('all applies orders, offset and limit and returns a collection', async () => {
  const { session, patients } = repository(
    new FakeStatementSession().respond('FROM patients', [
      { id: 3, name: 'Cy' },
      { id: 1, name: 'Ann' },
    ])
  );

  const result = await patients.all({ orders: '-name, id', offset: 4, limit: 2 });

  assert.ok(result instanceof EntityCollection);
  assert.deepEqual(result.values(), [3, 1]);
  assert.equal(
    session.statements[0]?.sql,
    `SELECT ${PATIENT_COLUMNS} FROM patients ORDER BY patients.name DESC, patients.id ASC LIMIT 2 OFFSET 4`
  );
});

test('paginate returns the page and the total under the same filters', async () => {
  const { session, patients } = repository(
    new FakeStatementSession()
      .respond('COUNT(DISTINCT', [{ count: 7 }])
      .respond('FROM patients', [{ id: 1, name: 'Ann' }])
  );

  const page = await patients.paginate({ filters: { name__istartswith: 'a' }, limit: 1 });

  assert.equal(page.total, 7);
  assert.equal(page.items.length, 1);
  assert.deepEqual(session.statements[1], {
    sql: 'SELECT COUNT(DISTINCT patients.id) AS count FROM patients WHERE patients.name ILIKE $1',
    params: ['a%'],
  });
});

test('exists can ignore the record being edited', async () => {
  const { session, patients } = repository();

  assert.equal(await patients.exists('M1', 'mrn', 1), false);
  assert.deepEqual(session.statements[0], {
    sql: 'SELECT 1 AS present FROM patients WHERE patients.mrn = $1 AND patients.id != $2 LIMIT 1',
    params: ['M1', 1],
  });
  assert.equal(await patients.exists(null), false);
  assert.equal(session.statements.length, 1);
});

test('allSerialized projects and serializes the same fields', async () => {
  const { session, patients } = repository(
    new FakeStatementSession().respond('FROM patients', [{ id: 1, name: 'Ann' }])
  );

  assert.deepEqual(await patients.allSerialized({ fields: ['name as patientName'] }), [
    { patientName: 'Ann' },
  ]);
  assert.equal(session.statements[0]?.sql, 'SELECT patients.id, patients.name FROM patients');
});

test('writes go through the lifecycle with the repository options', async () => {
  const { session, patients } = repository();

  const created = await patients.create({ name: 'Dee', mrn: 'M4' });

  assert.equal(created?.primaryKeyValue, 100);
  assert.deepEqual(session.events.slice(-2), ['commit', 'refresh:Patient']);
});

test('entity collections offer column helpers', () => {
  const series = new EntityCollection([
    Entity.fromRow(Series, { id: 1, modality: 'CT', instance_count: 120 }),
    Entity.fromRow(Series, { id: 2, modality: 'MR', instance_count: null }),
    Entity.fromRow(Series, { id: 3, modality: 'CT', instance_count: 40 }),
  ]);

  assert.equal(series.length, 3);
  assert.equal(series.sumAttr('instance_count'), 160);
  assert.deepEqual(series.values(), [1, 2, 3]);
  assert.deepEqual(series.values('modality'), ['CT', 'MR', 'CT']);
  assert.deepEqual(
    series.byAttr('modality', 'CT').map(entity => entity.primaryKeyValue),
    [1, 3]
  );
  assert.equal(series.count(2), 1);
  assert.equal(series.where(entity => entity.get('modality') === 'MR').length, 1);
  assert.equal(series.at(-1)?.primaryKeyValue, 3);
  assert.equal(series.first()?.primaryKeyValue, 1);
  assert.deepEqual([...series].length, 3);
  assert.deepEqual(series.toJSON()[1], { id: 2, modality: 'MR', instance_count: null });
});

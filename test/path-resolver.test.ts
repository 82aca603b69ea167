import assert from 'node:assert/strict';
import test from 'node:test';

import { UnknownAttribute } from '../src/lib/errors.js';
import {
  resolvePath,
  resolveRelationPath,
  splitAlias,
  stripModelPrefix,
} from '../src/lib/path-resolver.js';
import { createRegistry, Patient, Series, Study } from './helpers/schemas.js';

const registry = createRegistry();

test('splitAlias separates a case-insensitive alias suffix', () => {
  assert.deepEqual(splitAlias('name AS Label'), { path: 'name', alias: 'Label' });
  assert.deepEqual(splitAlias('patient.name as owner'), { path: 'patient.name', alias: 'owner' });
  assert.deepEqual(splitAlias(' description '), { path: 'description', alias: null });
});

test('stripModelPrefix removes the schema name qualifier only', () => {
  assert.equal(stripModelPrefix(Study, 'Study.description'), 'description');
  assert.equal(stripModelPrefix(Study, 'patient.name'), 'patient.name');
  assert.equal(stripModelPrefix(Study, 'StudyX.description'), 'StudyX.description');
});

test('resolves a root column', () => {
  const resolved = resolvePath(registry, Study, 'description');
  assert.equal(resolved.column?.name, 'description');
  assert.equal(resolved.schema, Study);
  assert.deepEqual(resolved.steps, []);
  assert.equal(resolved.crossesMany, false);
});

test('walks relations and records one step per hop', () => {
  const resolved = resolvePath(registry, Series, 'Series.study.patient.name as patientName');

  assert.equal(resolved.path, 'study.patient.name');
  assert.equal(resolved.alias, 'patientName');
  assert.deepEqual(
    resolved.steps.map(step => [step.path, step.source.name, step.target.name]),
    [
      ['study', 'Series', 'Study'],
      ['study.patient', 'Study', 'Patient'],
    ]
  );
  assert.equal(resolved.schema, Patient);
  assert.equal(resolved.column?.name, 'name');
  assert.equal(resolved.crossesMany, false);
});

test('flags paths that cross a to-many relation', () => {
  assert.equal(resolvePath(registry, Patient, 'studies.series.modality').crossesMany, true);
});

test('reports the schema and segment that failed', () => {
  assert.throws(
    () => resolvePath(registry, Study, 'patient.nickname'),
    (error: unknown) =>
      error instanceof UnknownAttribute &&
      error.schemaName === 'Patient' &&
      error.attribute === 'nickname' &&
      error.message === "Patient has no attribute 'nickname' while resolving 'patient.nickname'"
  );
});

test('relation terminals need to be allowed explicitly', () => {
  assert.throws(() => resolvePath(registry, Study, 'series'), UnknownAttribute);

  const resolved = resolvePath(registry, Study, 'series', { allowRelationTerminal: true });
  assert.equal(resolved.column, null);
  assert.equal(resolved.relation?.target, Series);
});

test('resolveRelationPath rejects column terminals', () => {
  assert.equal(resolveRelationPath(registry, Patient, 'studies.series').relation.path, 'studies.series');
  assert.throws(() => resolveRelationPath(registry, Study, 'description'), UnknownAttribute);
});

test('a column cannot be traversed like a relation', () => {
  assert.throws(() => resolvePath(registry, Study, 'description.length'), UnknownAttribute);
});

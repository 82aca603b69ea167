import assert from 'node:assert/strict';
import test from 'node:test';

import { InvalidOperand, UnsupportedOperator } from '../src/lib/errors.js';
import type { RenderContext } from '../src/lib/predicate.js';
import { comparison, isPredicate, or, raw, renderPredicates } from '../src/lib/predicate.js';
import type { CompileContext, FilterSpec } from '../src/lib/predicate-compiler.js';
import { compileFilters, splitFilterKey } from '../src/lib/predicate-compiler.js';
import type { RelationStep } from '../src/lib/path-resolver.js';
import { createRegistry, Study } from './helpers/schemas.js';

const compile = (spec: FilterSpec) => {
  const joins: Array<{ path: string; outer: boolean }> = [];
  const context: CompileContext = {
    registry: createRegistry(),
    schema: Study,
    rootAlias: 'studies',
    registerJoin: (steps: RelationStep[], outer: boolean) => {
      const last = steps[steps.length - 1];
      joins.push({ path: last?.path ?? '', outer });
      return (last?.path ?? '').replace(/\./g, '_');
    },
  };
  const render: RenderContext = { params: [] };
  const sql = renderPredicates(compileFilters(context, spec), render);
  return { sql, params: render.params, joins };
};

test('splitFilterKey splits on the first double underscore', () => {
  assert.deepEqual(splitFilterKey('description'), { field: 'description', operator: 'eq' });
  assert.deepEqual(splitFilterKey('patient.name__istartswith'), {
    field: 'patient.name',
    operator: 'istartswith',
  });
  assert.deepEqual(splitFilterKey('id__in__x'), { field: 'id', operator: 'in__x' });
});

test('compiles comparison operators', () => {
  const { sql, params } = compile({ id__gt: 1, id__lte: 9, patient_id__ne: 4, description: 'Head' });
  assert.equal(
    sql,
    'studies.id > $1 AND studies.id <= $2 AND studies.patient_id != $3 AND studies.description = $4'
  );
  assert.deepEqual(params, [1, 9, 4, 'Head']);
});

test('null equality becomes IS / IS NOT NULL', () => {
  assert.equal(
    compile({ description: null, patient_id__ne: null }).sql,
    'studies.description IS NULL AND studies.patient_id IS NOT NULL'
  );
});

test('isnull and notnull honour a false operand', () => {
  assert.equal(
    compile({ description__isnull: true, study_date__isnull: false }).sql,
    'studies.description IS NULL AND studies.study_date IS NOT NULL'
  );
  assert.equal(
    compile({ description__notnull: true, study_date__notnull: false }).sql,
    'studies.description IS NOT NULL AND studies.study_date IS NULL'
  );
});

test('pattern operators wrap the operand', () => {
  const { sql, params } = compile({
    description__contains: 'ea',
    description__istartswith: 'he',
    description__endswith: 'ad',
    description__like: 'H_ad',
  });
  assert.equal(
    sql,
    'studies.description LIKE $1 AND studies.description ILIKE $2 AND ' +
      'studies.description LIKE $3 AND studies.description LIKE $4'
  );
  assert.deepEqual(params, ['%ea%', 'he%', '%ad', 'H_ad']);
});

test('in accepts arrays and sets', () => {
  assert.deepEqual(compile({ id__in: new Set([3, 4]) }).params, [[3, 4]]);
  assert.throws(() => compile({ id__in: '3,4' }), InvalidOperand);
});

test('relation paths register outer joins and use the joined alias', () => {
  const { sql, joins } = compile({ 'patient.name': 'Ann', 'series.modality__in': ['CT'] });
  assert.equal(sql, 'patient.name = $1 AND series.modality = ANY($2)');
  assert.deepEqual(joins, [
    { path: 'patient', outer: true },
    { path: 'series', outer: true },
  ]);
});

test('skips undefined operands', () => {
  assert.equal(compile({ description: undefined, id: 2 }).sql, 'studies.id = $1');
});

test('groups nest mappings and pre-built predicates', () => {
  const { sql, params } = compile({
    __and: [
      { __or: [{ id: 1 }, { id: 2 }] },
      or(comparison('studies', 'description', 'IS'), raw('length(studies.description) < ?', 5)),
    ],
  });
  assert.equal(
    sql,
    '((studies.id = $1 OR studies.id = $2) AND ' +
      '(studies.description IS NULL OR length(studies.description) < $3))'
  );
  assert.deepEqual(params, [1, 2, 5]);
});

test('a mapping with a type key is not mistaken for a predicate', () => {
  assert.equal(isPredicate({ type: 'basic', table: 't', column: 'c', operator: '=' }), false);
  assert.equal(isPredicate(comparison('t', 'c', '=', 1)), true);
});

test('unknown operators and malformed groups are rejected', () => {
  assert.throws(() => compile({ id__approx: 1 }), UnsupportedOperator);
  assert.throws(() => compile({ __or: [42] }), InvalidOperand);
  assert.throws(() => raw('a = ? AND b = ?', 1), TypeError);
});

import { defineSchema, SchemaRegistry } from '../../src/lib/schema.js';
import types from '../../src/lib/type.js';

/**
 * Small clinical-records model used across the unit tests:
 * Patient 1-n Study 1-n Series, Study n-m Tag through study_tags.
 */
export const Patient = defineSchema({
  name: 'Patient',
  tableName: 'patients',
  labelColumn: 'name',
  columns: {
    id: types.integer().primaryKey(),
    name: types.string().max(128),
    mrn: types.string().unique(),
    birth_date: types.date(),
    deleted_at: types.datetime(),
    deleted_by: types.string(),
    deletion_reason: types.string(),
  },
  relations: {
    studies: { target: 'Study', cardinality: 'many' },
  },
});

export const Study = defineSchema({
  name: 'Study',
  tableName: 'studies',
  columns: {
    id: types.integer().primaryKey(),
    patient_id: types.integer(),
    description: types.string(),
    study_date: types.date(),
  },
  relations: {
    patient: { target: 'Patient', cardinality: 'one' },
    series: { target: 'Series', cardinality: 'many' },
    tags: {
      target: 'Tag',
      cardinality: 'many',
      through: { table: 'study_tags', sourceColumn: 'study_id', targetColumn: 'tag_id' },
    },
  },
});

export const Series = defineSchema({
  name: 'Series',
  tableName: 'series',
  columns: {
    id: types.integer().primaryKey(),
    study_id: types.integer(),
    modality: types.enum(['CT', 'MR', 'US', 'XR'] as const),
    instance_count: types.integer().default(0),
    metadata: types.json(),
  },
  relations: {
    study: { target: 'Study', cardinality: 'one' },
  },
});

export const Tag = defineSchema({
  name: 'Tag',
  tableName: 'tags',
  labelColumn: 'label',
  columns: {
    id: types.integer().primaryKey(),
    label: types.string().required(),
  },
});

export const createRegistry = (): SchemaRegistry => new SchemaRegistry([Patient, Study, Series, Tag]);

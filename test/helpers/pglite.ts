import { PGlite } from '@electric-sql/pglite';

import type { SqlClient } from '../../src/lib/pg-session.js';
import type { JsonObject } from '../../src/lib/schema.js';

export const SCHEMA_SQL = `
  CREATE TABLE patients (
    id SERIAL PRIMARY KEY,
    name TEXT,
    mrn TEXT UNIQUE,
    birth_date DATE,
    deleted_at TIMESTAMPTZ,
    deleted_by TEXT,
    deletion_reason TEXT
  );
  CREATE TABLE studies (
    id SERIAL PRIMARY KEY,
    patient_id INTEGER REFERENCES patients(id),
    description TEXT,
    study_date DATE
  );
  CREATE TABLE series (
    id SERIAL PRIMARY KEY,
    study_id INTEGER REFERENCES studies(id),
    modality TEXT,
    instance_count INTEGER NOT NULL DEFAULT 0,
    metadata JSONB
  );
  CREATE TABLE tags (
    id SERIAL PRIMARY KEY,
    label TEXT NOT NULL
  );
  CREATE TABLE study_tags (
    study_id INTEGER REFERENCES studies(id),
    tag_id INTEGER REFERENCES tags(id)
  );
`;

/**
 * SqlClient over an in-process PGlite database.
 */
export const createPgliteClient = (db: PGlite): SqlClient => ({
  async query(text, params) {
    const result = await db.query<JsonObject>(text, params);
    return { rows: result.rows, rowCount: result.affectedRows ?? null };
  },
});

export const createDatabase = async (): Promise<PGlite> => {
  const db = new PGlite();
  await db.exec(SCHEMA_SQL);
  return db;
};

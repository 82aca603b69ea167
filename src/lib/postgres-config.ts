import type { PoolConfig } from 'pg';

/**
 * Connection settings for the PostgreSQL pool.
 */
export interface PostgresConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  /** Maximum pooled clients */
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

export const DEFAULT_POSTGRES_CONFIG: PostgresConfig = {
  host: 'localhost',
  port: 5432,
  database: 'postgres',
  user: 'postgres',
  password: '',
  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
};

type Environment = Record<string, string | undefined>;

const parsePort = (value: string | undefined): number | undefined => {
  if (!value) {
    return undefined;
  }
  const port = Number.parseInt(value, 10);
  return Number.isFinite(port) ? port : undefined;
};

/**
 * Read connection settings from `DATABASE_URL` or the libpq `PG*` variables.
 * Variables that are not set are left out so defaults apply.
 */
export function resolvePostgresConfig(env: Environment = process.env): Partial<PostgresConfig> {
  if (env.DATABASE_URL) {
    return { connectionString: env.DATABASE_URL };
  }

  const config: Partial<PostgresConfig> = {};
  if (env.PGHOST) {
    config.host = env.PGHOST;
  }
  const port = parsePort(env.PGPORT);
  if (port !== undefined) {
    config.port = port;
  }
  if (env.PGDATABASE) {
    config.database = env.PGDATABASE;
  }
  if (env.PGUSER) {
    config.user = env.PGUSER;
  }
  if (env.PGPASSWORD !== undefined) {
    config.password = env.PGPASSWORD;
  }
  return config;
}

/**
 * Merge overrides onto the defaults and produce `pg` pool options.
 */
export function toPoolConfig(overrides: Partial<PostgresConfig> = {}): PoolConfig {
  const config: PostgresConfig = { ...DEFAULT_POSTGRES_CONFIG, ...overrides };
  const pool: PoolConfig = {
    max: config.max,
    idleTimeoutMillis: config.idleTimeoutMillis,
    connectionTimeoutMillis: config.connectionTimeoutMillis,
  };
  if (config.connectionString) {
    return { ...pool, connectionString: config.connectionString };
  }
  return {
    ...pool,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
  };
}

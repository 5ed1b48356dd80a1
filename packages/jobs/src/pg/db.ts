import { Pool } from 'pg';

export function createPool(env: NodeJS.ProcessEnv = process.env): Pool {
  return new Pool({
    host: env.PGHOST ?? 'localhost',
    port: Number(env.PGPORT ?? 5432),
    user: env.PGUSER ?? 'app',
    password: env.PGPASSWORD ?? 'app',
    database: env.PGDATABASE ?? 'app',
    max: Number(env.PGPOOL_MAX ?? 5),
  });
}

import dotenv from "dotenv";
import { Pool, types } from "pg";

dotenv.config();

const DATE_OID = 1082;

// Keep DATE columns as `YYYY-MM-DD` strings instead of local-midnight Date objects.
types.setTypeParser(DATE_OID, (value: string) => value);

export interface PoolOptions {
  statementTimeoutMs?: number;
  max?: number;
}

export function createPool({ statementTimeoutMs, max = 10 }: PoolOptions = {}): Pool {
  const connectionString = process.env.DATABASE_URL;
  const pool = connectionString
    ? new Pool({ connectionString, statement_timeout: statementTimeoutMs, max })
    : new Pool({
        host: process.env.PGHOST,
        port: process.env.PGPORT ? Number(process.env.PGPORT) : undefined,
        user: process.env.PGUSER,
        password: process.env.PGPASSWORD,
        database: process.env.PGDATABASE,
        ssl: process.env.PGSSLMODE === "require" ? { rejectUnauthorized: false } : undefined,
        statement_timeout: statementTimeoutMs,
        max
      });

  pool.on("error", (error: Error) => {
    console.error("Unexpected PostgreSQL error", error);
  });

  return pool;
}

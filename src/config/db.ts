import { Pool } from "pg";
import type { DatabaseConfig } from "./env";

export function createPool(config: DatabaseConfig): Pool {
  const ssl = config.sslRequired ? { rejectUnauthorized: false } : undefined;
  const pool = config.connectionString
    ? new Pool({ connectionString: config.connectionString, ssl })
    : new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        ssl
      });

  pool.on("error", (error: Error) => {
    console.error("Unexpected PostgreSQL error", error);
  });

  return pool;
}

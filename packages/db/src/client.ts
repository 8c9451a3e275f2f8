import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/postgres-js";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
}

export type DbClient = PostgresJsDatabase<typeof schema>;

export interface Database {
  db: DbClient;
  close(): Promise<void>;
}

const DEFAULT_API_POOL = { max: 20 };
const DEFAULT_WORKER_POOL = { max: 10 };

function connect(options: DbClientOptions, max: number, idleTimeout: number): Database {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? max,
    idle_timeout: idleTimeout,
    connect_timeout: 10,
  });

  return {
    db: drizzle(connection, { schema }),
    close: () => connection.end({ timeout: 5 }),
  };
}

export function createDbClient(options: DbClientOptions): Database {
  return connect(options, DEFAULT_API_POOL.max, 20);
}

export function createWorkerDbClient(options: DbClientOptions): Database {
  return connect(options, DEFAULT_WORKER_POOL.max, 30);
}

/**
 * Round-trip to the server. Rejects when the database is unreachable.
 */
export async function pingDatabase(db: DbClient): Promise<void> {
  await db.execute(sql`select 1`);
}

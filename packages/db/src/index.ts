import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema.js";

export * from "./schema.js";

export interface DbOptions {
  /** Connection URL; when omitted postgres.js reads PGHOST, PGUSER, ... */
  databaseUrl?: string;
  /** Pool size (default: 1, the reporter uses one connection sequentially) */
  max?: number;
  /** Connection timeout in seconds (default: 10) */
  connectTimeoutS?: number;
}

export type Database = PostgresJsDatabase<typeof schema>;

export interface DbHandle {
  db: Database;
  /** Close every connection in the pool */
  end(): Promise<void>;
}

export function createDb(options: DbOptions = {}): DbHandle {
  const settings = {
    max: options.max ?? 1,
    idle_timeout: 30,
    connect_timeout: options.connectTimeoutS ?? 10,
    prepare: false,
    onnotice: () => {},
  };

  const sql = options.databaseUrl
    ? postgres(options.databaseUrl, settings)
    : postgres(settings);

  return {
    db: drizzle(sql, { schema }),
    end: () => sql.end({ timeout: 5 }),
  };
}

import { drizzle, type PostgresJsQueryResultHKT } from "drizzle-orm/postgres-js";
import type { PgDatabase } from "drizzle-orm/pg-core";
import postgres from "postgres";
import { config } from "../config.js";
import * as schema from "./schema/index.js";

export const client = postgres(config.database.url, {
  max: config.database.maxConnections,
  idle_timeout: 20,
  connect_timeout: 10,
});

export const db = drizzle(client, { schema });

/** The pool or an open transaction; helpers that run in both take this. */
export type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

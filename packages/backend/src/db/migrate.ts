import "../env.js";
import { fileURLToPath } from "node:url";
import postgres from "postgres";
import { config } from "../config.js";
import { logger } from "../logger.js";

const migrationFile = fileURLToPath(
  new URL("../../drizzle/0000_init.sql", import.meta.url)
);

async function runMigrations() {
  const sql = postgres(config.database.url, { max: 1 });
  try {
    logger.info({ file: migrationFile }, "applying schema");
    await sql.file(migrationFile);
    logger.info("schema up to date");
  } finally {
    await sql.end();
  }
}

runMigrations().catch((err: unknown) => {
  logger.error({ err }, "migration failed");
  process.exit(1);
});

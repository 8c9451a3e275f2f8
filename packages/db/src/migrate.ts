import { fileURLToPath } from "node:url";
import { migrate } from "drizzle-orm/postgres-js/migrator";
import type { Logger } from "@relaymail/logger";
import type { DbClient } from "./client.js";

/** Output of `npm run db:generate` (drizzle-kit) for this package's schema. */
export const MIGRATIONS_FOLDER = fileURLToPath(new URL("../drizzle/", import.meta.url));

/**
 * Apply pending drizzle-kit migrations. Drizzle records what ran in its own
 * `__drizzle_migrations` table and takes an advisory lock while it runs.
 */
export async function runMigrations(
  db: DbClient,
  logger: Logger,
  migrationsFolder: string = MIGRATIONS_FOLDER,
): Promise<void> {
  logger.info({ migrationsFolder }, "Applying database migrations");
  await migrate(db, { migrationsFolder });
  logger.info("Database migrations applied");
}

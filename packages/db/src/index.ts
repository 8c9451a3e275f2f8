export * from "./schema/index.js";
export {
  createDbClient,
  createWorkerDbClient,
  pingDatabase,
  type Database,
  type DbClient,
  type DbClientOptions,
} from "./client.js";
export { runMigrations, MIGRATIONS_FOLDER } from "./migrate.js";
export { pgErrorCode, PG_UNIQUE_VIOLATION, PG_FOREIGN_KEY_VIOLATION } from "./pg-errors.js";
export {
  DomainRepository,
  ApiKeyRepository,
  AuditRepository,
  SentEmailRepository,
  createRepositories,
  type Repositories,
} from "./repositories/index.js";

import Database from "better-sqlite3";
import { mkdirSync, readFileSync } from "fs";
import { dirname } from "path";
import { fileURLToPath } from "url";
import { config } from "../config";
import { logger } from "../utils/logger";

let _db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (_db) return _db;

  _db = openDb(config.DB_PATH);
  logger.info(`Database initialized at ${config.DB_PATH}`);
  return _db;
}

/**
 * Open a database and apply the schema. ":memory:" gives a throwaway DB.
 */
export function openDb(path: string): Database.Database {
  const inMemory = path === ":memory:";

  if (!inMemory) {
    // Ensure data directory exists
    mkdirSync(dirname(path), { recursive: true });
  }

  const database = new Database(path);

  if (!inMemory) {
    database.pragma("journal_mode = WAL");
  }
  database.pragma("foreign_keys = ON");

  runMigrations(database);
  return database;
}

function runMigrations(database: Database.Database) {
  const schemaPath = fileURLToPath(new URL("./schema.sql", import.meta.url));
  const schema = readFileSync(schemaPath, "utf8");

  // Remove SQL comments first
  const cleanedSchema = schema
    .split("\n")
    .filter((line) => !line.trim().startsWith("--"))
    .join("\n");

  database.exec(cleanedSchema);
  logger.debug("Database migrations complete");
}

// Close database connection
export function closeDb() {
  if (_db) {
    _db.close();
    _db = null;
  }
}

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import path from "path";

interface Migration {
  id: string;
  statements: string[];
}

const migrations: Migration[] = [
  {
    id: "001_initial",
    statements: [
      `CREATE TABLE IF NOT EXISTS app_settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      )`,
    ],
  },
];

let db: Database.Database | null = null;

type StatementMap = {
  selectSetting: Database.Statement<[string], { value: string }>;
  upsertSetting: Database.Statement<[string, string]>;
};

let statements: StatementMap | null = null;

function openDatabase(file: string): Database.Database {
  if (file !== ":memory:") {
    const dir = path.dirname(file);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
  return new Database(file);
}

function applyMigrations(database: Database.Database): void {
  database.pragma("journal_mode = WAL");
  database.exec(
    `CREATE TABLE IF NOT EXISTS migrations (
      id TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );`,
  );

  const migrationRows = database.prepare<[], { id: string }>("SELECT id FROM migrations").all();
  const existing = new Set(migrationRows.map((row) => row.id));

  const insertMigration = database.prepare<[string]>("INSERT INTO migrations (id) VALUES (?)");

  for (const migration of migrations) {
    if (existing.has(migration.id)) {
      continue;
    }
    database.transaction(() => {
      for (const sql of migration.statements) {
        database.exec(sql);
      }
      insertMigration.run(migration.id);
    })();
  }
}

function prepareStatements(database: Database.Database): StatementMap {
  return {
    selectSetting: database.prepare<[string], { value: string }>("SELECT value FROM app_settings WHERE key = ?"),
    upsertSetting: database.prepare<[string, string]>(
      `INSERT INTO app_settings (key, value, updated_at)
       VALUES (?, ?, datetime('now'))
       ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = datetime('now')`,
    ),
  };
}

export function setupDatabase(file: string): void {
  closeDatabase();
  db = openDatabase(file);
  applyMigrations(db);
  statements = prepareStatements(db);
}

export function closeDatabase(): void {
  statements = null;
  if (db) {
    db.close();
    db = null;
  }
}

function requireStatements(): StatementMap {
  if (!db || !statements) {
    throw new Error("Database not initialised");
  }
  return statements;
}

export function getAppSetting(key: string): string | null {
  return requireStatements().selectSetting.get(key)?.value ?? null;
}

export function setAppSetting(key: string, value: string): void {
  requireStatements().upsertSetting.run(key, value);
}

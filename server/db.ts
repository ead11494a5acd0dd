import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { log } from "./logger";

export type AppDatabase = BetterSQLite3Database;

export interface DatabaseHandle {
    db: AppDatabase;
    sqlite: Database.Database;
    close(): void;
}

/**
 * Unicode-aware lower-casing for containment matching. SQLite's own lower()
 * only folds ASCII.
 */
export const CASEFOLD_FUNCTION = "casefold";

export function setupPrecedentSchema(sqlite: Database.Database) {
    sqlite.exec(`
        CREATE TABLE IF NOT EXISTS precedents (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            title TEXT NOT NULL UNIQUE,
            case_number TEXT NOT NULL,
            year INTEGER NOT NULL,
            court TEXT NOT NULL,
            description TEXT NOT NULL,
            keywords TEXT,
            section TEXT,
            article TEXT,
            created_at TEXT NOT NULL,
            updated_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS precedents_year_idx ON precedents(year);
        CREATE INDEX IF NOT EXISTS precedents_court_idx ON precedents(court);
    `);
}

export interface OpenDatabaseOptions {
    logQueries?: boolean;
}

export function openDatabase(databasePath: string, options: OpenDatabaseOptions = {}): DatabaseHandle {
    const inMemory = databasePath === ":memory:";
    if (!inMemory) {
        fs.mkdirSync(path.dirname(databasePath), { recursive: true });
    }

    const sqlite = new Database(databasePath);

    if (!inMemory) {
        sqlite.pragma("journal_mode = WAL");
        sqlite.pragma("synchronous = NORMAL");
    }
    sqlite.pragma("foreign_keys = ON");

    sqlite.function(CASEFOLD_FUNCTION, { deterministic: true }, (value: unknown) =>
        typeof value === "string" ? value.toLowerCase() : value,
    );

    setupPrecedentSchema(sqlite);

    if (!inMemory) {
        log(`Database connected: ${databasePath}`, "db");
    }

    return {
        db: drizzle(sqlite, { logger: options.logQueries ?? false }),
        sqlite,
        close: () => sqlite.close(),
    };
}

import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import * as schema from './schema.js';
import { dirname } from 'path';
import { fileURLToPath } from 'url';
import { mkdirSync, readFileSync } from 'fs';
import { loadConfig } from '../config.js';
import { DatabaseError } from '../errors.js';

export type DB = BetterSQLite3Database<typeof schema>;

export interface ArchiveDatabase {
    sqlite: Database.Database;
    db: DB;
}

const REQUIRED_TABLES = ['images', 'paintings', 'painting_images', 'ratings'];
const SCHEMA_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

let instance: ArchiveDatabase | undefined;

function tablesPresent(sqlite: Database.Database): boolean {
    const rows = sqlite
        .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table'")
        .all();
    const existing = new Set(rows.map((r) => r.name));
    return REQUIRED_TABLES.every((t) => existing.has(t));
}

function ensureSchema(sqlite: Database.Database, schemaPath: string) {
    if (tablesPresent(sqlite)) return;

    console.log(`[DB] No existing schema found; applying ${schemaPath}`);
    try {
        sqlite.exec(readFileSync(schemaPath, 'utf8'));
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        throw new DatabaseError(`Error applying schema: ${message}`);
    }
}

/**
 * Opens (or creates) an archive database with foreign keys enforced and the
 * schema in place.
 */
export function openDatabase(dbPath: string, schemaPath: string = SCHEMA_PATH): ArchiveDatabase {
    if (dbPath !== ':memory:') {
        mkdirSync(dirname(dbPath), { recursive: true });
    }

    const sqlite = new Database(dbPath);
    sqlite.pragma('foreign_keys = ON');
    if (dbPath !== ':memory:') {
        sqlite.pragma('journal_mode = WAL');
    }
    ensureSchema(sqlite, schemaPath);

    return { sqlite, db: drizzle(sqlite, { schema }) };
}

export function getDb(): DB {
    if (instance) return instance.db;

    const { dbPath } = loadConfig();
    console.log(`[DB] Using database at: ${dbPath}`);
    instance = openDatabase(dbPath);
    return instance.db;
}

/** Closes the shared connection; the next `getDb()` opens a fresh one. */
export function closeDb() {
    if (!instance) return;
    instance.sqlite.close();
    instance = undefined;
}

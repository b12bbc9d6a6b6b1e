import Database from 'better-sqlite3';

export type SqliteDatabase = Database.Database;

/** Open the SQLite file at `path` (or `:memory:`) and ensure the `devices` table exists. */
export function openDatabase(path: string): SqliteDatabase {
    const db = new Database(path);
    if (path !== ':memory:') {
        db.pragma('journal_mode = WAL');
    }
    db.exec(`
        CREATE TABLE IF NOT EXISTS devices (
            device_id TEXT PRIMARY KEY,
            username TEXT NOT NULL,
            created_at TEXT NOT NULL DEFAULT (datetime('now')),
            updated_at TEXT
        );
    `);
    return db;
}

export * from './deviceStore';

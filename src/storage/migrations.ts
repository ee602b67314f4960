import Database from 'better-sqlite3';

/** Idempotent schema setup. */
export function migrate(db: Database.Database): void {
    db.exec(`
        CREATE TABLE IF NOT EXISTS character_sheets(
            session_id TEXT PRIMARY KEY,
            sheet TEXT NOT NULL,
            created_at TEXT NOT NULL,
            updated_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_character_sheets_updated ON character_sheets(updated_at);
    `);
}

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { isAbsolute, join } from 'path';
import { createLogger, getErrorMessage } from '../utils/logger.js';
import { initDB } from './db.js';
import { migrate } from './migrations.js';

const log = createLogger('Database');

const APP_DIR_NAME = 'wizard-builder';
const DB_FILE_NAME = 'wizard.db';

let dbInstance: Database.Database | null = null;

/**
 * Platform app-data directory, created on first use.
 * - Windows: %APPDATA%/wizard-builder
 * - macOS: ~/Library/Application Support/wizard-builder
 * - Linux: $XDG_DATA_HOME/wizard-builder or ~/.local/share/wizard-builder
 */
function getAppDataDir(): string {
    let base: string;
    if (process.platform === 'win32') {
        base = process.env.APPDATA || join(homedir(), 'AppData', 'Roaming');
    } else if (process.platform === 'darwin') {
        base = join(homedir(), 'Library', 'Application Support');
    } else {
        base = process.env.XDG_DATA_HOME || join(homedir(), '.local', 'share');
    }

    const dir = join(base, APP_DIR_NAME);
    if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
        log.info(`Created app data directory: ${dir}`);
    }
    return dir;
}

/**
 * Priority: explicit path > WIZARD_DB_PATH > --db-path > app-data default.
 */
function resolveDbPath(path?: string): string {
    const argv = process.argv;
    const flagIndex = argv.indexOf('--db-path');
    const fromFlag = flagIndex !== -1 ? argv[flagIndex + 1] : undefined;

    const dbPath = path || process.env.WIZARD_DB_PATH || fromFlag;
    if (!dbPath) {
        return join(getAppDataDir(), DB_FILE_NAME);
    }
    if (dbPath === ':memory:' || isAbsolute(dbPath)) {
        return dbPath;
    }
    return join(process.cwd(), dbPath);
}

export function getDbPath(): string {
    return resolveDbPath();
}

/** Open and migrate a standalone database; tests use this with ':memory:'. */
export function openDatabase(path: string): Database.Database {
    const db = initDB(path);
    migrate(db);
    return db;
}

/** Process-wide connection, opened on first use. */
export function getDb(path?: string): Database.Database {
    if (!dbInstance) {
        const resolvedPath = resolveDbPath(path);
        log.info(`Initializing database at: ${resolvedPath}`);
        dbInstance = openDatabase(resolvedPath);
    }
    return dbInstance;
}

/** Checkpoint the WAL into the main file, then close. */
export function closeDb(): void {
    if (!dbInstance) return;
    try {
        dbInstance.pragma('wal_checkpoint(TRUNCATE)');
    } catch (error) {
        log.warn(`WAL checkpoint failed: ${getErrorMessage(error)}`);
    }
    dbInstance.close();
    dbInstance = null;
    log.info('Database closed');
}

export * from './db.js';
export * from './migrations.js';

import Database from 'better-sqlite3';
import { existsSync, unlinkSync } from 'fs';
import { createLogger, getErrorMessage } from '../utils/logger.js';

const log = createLogger('Database');

export interface DatabaseIntegrityResult {
    ok: boolean;
    errors: string[];
}

interface IntegrityRow {
    integrity_check: string;
}

function isIntegrityRow(value: unknown): value is IntegrityRow {
    return typeof value === 'object' && value !== null &&
        'integrity_check' in value && typeof value.integrity_check === 'string';
}

export function checkDatabaseIntegrity(db: Database.Database): DatabaseIntegrityResult {
    try {
        const rows: unknown = db.pragma('integrity_check');
        const errors = (Array.isArray(rows) ? rows : [])
            .filter(isIntegrityRow)
            .map(row => row.integrity_check)
            .filter(message => message !== 'ok');
        return { ok: errors.length === 0, errors };
    } catch (error) {
        return { ok: false, errors: [getErrorMessage(error)] };
    }
}

function isFileBacked(path: string): boolean {
    return path !== ':memory:' && path !== '';
}

// Removes a corrupted database and its WAL/SHM companions so a fresh file can be created.
function discardCorruptedDatabase(path: string, reason: string): void {
    log.error(`Database corruption detected at ${path}: ${reason}`);
    const files = [path, `${path}-wal`, `${path}-shm`];
    try {
        for (const file of files) {
            if (existsSync(file)) {
                unlinkSync(file);
                log.warn(`Removed ${file}`);
            }
        }
    } catch (error) {
        throw new Error(
            `Database is corrupted and cleanup failed (${getErrorMessage(error)}). Please delete: ${files.join(', ')}`,
            { cause: error }
        );
    }
}

function open(path: string): Database.Database {
    const db = new Database(path);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    return db;
}

/**
 * Open a database with WAL journaling, checking integrity first. A corrupted
 * file is discarded and recreated; sheets are rebuildable session state.
 */
export function initDB(path: string): Database.Database {
    log.debug(`Opening database: ${path}`);

    let db: Database.Database;
    try {
        db = open(path);
    } catch (error) {
        const message = getErrorMessage(error);
        if (!isFileBacked(path) || !(message.includes('SQLITE_CORRUPT') || message.includes('malformed'))) {
            throw error;
        }
        discardCorruptedDatabase(path, message);
        db = open(path);
    }

    const integrity = checkDatabaseIntegrity(db);
    if (!integrity.ok) {
        db.close();
        if (!isFileBacked(path)) {
            throw new Error(`In-memory database failed its integrity check: ${integrity.errors.join(', ')}`);
        }
        discardCorruptedDatabase(path, integrity.errors.join(', '));
        db = open(path);
        log.warn('Fresh database created after corruption recovery');
    }

    return db;
}

import Database from 'better-sqlite3';
import { z } from 'zod';
import { CharacterSheetSchema, createEmptySheet, type CharacterSheet } from '../../schema/character-sheet.js';
import { BaseRepository, jsonField, now, type BaseEntity } from '../base.repo.js';

/**
 * Session-keyed storage for sheets. Loading an unknown session yields an
 * empty sheet without writing anything.
 */
export interface SheetRepository {
    load(sessionId: string): CharacterSheet;
    save(sessionId: string, sheet: CharacterSheet): void;
    delete(sessionId: string): boolean;
}

export interface SheetRecord extends BaseEntity {
    sheet: CharacterSheet;
}

const SheetRecordSchema = z.object({
    id: z.string(),
    sheet: CharacterSheetSchema,
    createdAt: z.string(),
    updatedAt: z.string()
});

interface SheetRow {
    session_id: string;
    sheet: string;
    created_at: string;
    updated_at: string;
}

export class CharacterSheetRepository extends BaseRepository<SheetRecord, SheetRow> implements SheetRepository {
    constructor(db: Database.Database) {
        super(db, 'character_sheets', SheetRecordSchema, 'session_id');
    }

    protected rowToEntity(row: SheetRow): SheetRecord {
        return this.validateEntity({
            id: row.session_id,
            sheet: jsonField.deserialize(row.sheet, CharacterSheetSchema),
            createdAt: row.created_at,
            updatedAt: row.updated_at
        });
    }

    load(sessionId: string): CharacterSheet {
        return this.findById(sessionId)?.sheet ?? createEmptySheet();
    }

    /** Replaces the whole document; created_at survives updates. */
    save(sessionId: string, sheet: CharacterSheet): void {
        const timestamp = now();
        this.db.prepare(`
            INSERT INTO character_sheets (session_id, sheet, created_at, updated_at)
            VALUES (@sessionId, @sheet, @timestamp, @timestamp)
            ON CONFLICT(session_id) DO UPDATE SET sheet = excluded.sheet, updated_at = excluded.updated_at
        `).run({
            sessionId,
            sheet: jsonField.serialize(CharacterSheetSchema.parse(sheet)),
            timestamp
        });
    }
}

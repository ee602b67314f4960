/**
 * Base Repository - shared plumbing for SQLite-backed repositories
 *
 * Subclasses map their row shape to a zod-validated entity; the base class
 * supplies keyed reads, deletes, counts and the JSON/timestamp helpers.
 *
 * Usage:
 *   class SheetRepo extends BaseRepository<SheetRecord, SheetRow> {
 *       constructor(db: Database.Database) {
 *           super(db, 'character_sheets', SheetRecordSchema, 'session_id');
 *       }
 *
 *       protected rowToEntity(row: SheetRow): SheetRecord {
 *           return this.validateEntity({ id: row.session_id, ... });
 *       }
 *   }
 */

import Database from 'better-sqlite3';
import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// BASE ENTITY TYPE
// ═══════════════════════════════════════════════════════════════════════════

export interface BaseEntity {
    id: string;
    createdAt: string;
    updatedAt: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// JSON FIELD HELPERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * JSON columns are written with `serialize` and read back through a schema,
 * so a bad document fails loudly instead of leaking an untyped value.
 */
export const jsonField = {
    serialize(value: unknown): string {
        return JSON.stringify(value);
    },

    deserialize<T>(json: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
        const parsed: unknown = JSON.parse(json);
        return schema.parse(parsed);
    }
};

// ═══════════════════════════════════════════════════════════════════════════
// TIMESTAMP HELPERS
// ═══════════════════════════════════════════════════════════════════════════

export function now(): string {
    return new Date().toISOString();
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE REPOSITORY
// ═══════════════════════════════════════════════════════════════════════════

export abstract class BaseRepository<TEntity extends BaseEntity, TRow extends object> {
    constructor(
        protected readonly db: Database.Database,
        protected readonly tableName: string,
        protected readonly schema: z.ZodType<TEntity, z.ZodTypeDef, unknown>,
        protected readonly keyColumn: string = 'id'
    ) {}

    /** Map a raw row to a validated entity. */
    protected abstract rowToEntity(row: TRow): TEntity;

    findById(id: string): TEntity | null {
        const row = this.db
            .prepare<[string], TRow>(`SELECT * FROM ${this.tableName} WHERE ${this.keyColumn} = ?`)
            .get(id);
        return row ? this.rowToEntity(row) : null;
    }

    delete(id: string): boolean {
        const result = this.db
            .prepare(`DELETE FROM ${this.tableName} WHERE ${this.keyColumn} = ?`)
            .run(id);
        return result.changes > 0;
    }

    exists(id: string): boolean {
        return this.db
            .prepare<[string], { found: number }>(`SELECT 1 AS found FROM ${this.tableName} WHERE ${this.keyColumn} = ?`)
            .get(id) !== undefined;
    }

    count(): number {
        const row = this.db
            .prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${this.tableName}`)
            .get();
        return row?.total ?? 0;
    }

    protected validateEntity(data: unknown): TEntity {
        return this.schema.parse(data);
    }
}

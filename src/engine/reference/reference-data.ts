/**
 * Read-only reference collections (spells, races, backgrounds).
 *
 * Loaded once at startup from `data/*.json` and handed to the lookups;
 * nothing re-reads the files afterwards. Any missing file or bad record is
 * a ReferenceDataError, which callers treat as fatal.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { BackgroundSchema, type Background } from '../../schema/background.js';
import { RaceSchema, type Race } from '../../schema/race.js';
import { SpellSchema, type Spell } from '../../schema/spell.js';
import { resolveName } from '../../utils/fuzzy-enum.js';
import { createLogger, createTimer } from '../../utils/logger.js';

const log = createLogger('ReferenceData');

export class ReferenceDataError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ReferenceDataError';
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// NAMED INDEX
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Records keyed by canonical name, with fuzzy resolution over the names.
 */
export class NamedIndex<T extends { name: string }> {
    readonly names: readonly string[];
    private readonly byName: Map<string, T>;

    constructor(readonly kind: string, readonly records: readonly T[]) {
        this.byName = new Map(records.map(record => [record.name, record]));
        if (this.byName.size !== records.length) {
            throw new ReferenceDataError(`Duplicate ${kind} names in reference data`);
        }
        this.names = records.map(record => record.name);
    }

    get(name: string): T | undefined {
        return this.byName.get(name);
    }

    /**
     * Best fuzzy match for free text, or null when nothing clears the cutoff.
     * A match that is not in the index means the names and records disagree.
     */
    resolve(query: string): T | null {
        const name = resolveName(query, this.names);
        if (name === null) return null;

        const record = this.byName.get(name);
        if (!record) {
            throw new ReferenceDataError(`Resolved ${this.kind} "${name}" is missing from the index`);
        }
        if (name !== query) {
            log.debug(`Resolved ${this.kind} "${query}" to "${name}"`);
        }
        return record;
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// FILE FORMATS
// ═══════════════════════════════════════════════════════════════════════════

const SpellFileSchema = z.array(SpellSchema);
const RaceFileSchema = z.array(RaceSchema);

function splitList(value: string): string[] {
    return value.split(',').map(part => part.trim()).filter(part => part.length > 0);
}

// backgrounds.json is keyed by name with human-labelled, comma-separated fields.
const BackgroundFileSchema = z.record(z.string(), z.object({
    'Ability Scores': z.string(),
    'Origin Feat': z.string(),
    'Skill Proficiencies': z.string(),
    'Tool Proficiency': z.string(),
    'Equipment': z.string()
})).transform(entries => Object.entries(entries).map(([name, entry]): Background => BackgroundSchema.parse({
    name,
    abilityScores: splitList(entry['Ability Scores']),
    originFeat: entry['Origin Feat'].trim(),
    skillProficiencies: splitList(entry['Skill Proficiencies']),
    toolProficiency: entry['Tool Proficiency'].trim(),
    equipment: splitList(entry['Equipment'])
})));

// ═══════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════

export interface ReferenceRecords {
    spells: readonly Spell[];
    races: readonly Race[];
    backgrounds: readonly Background[];
}

/**
 * Locate the bundled data directory: WIZARD_DATA_DIR if set, otherwise the
 * nearest `data/` holding spells.json above this module (works from src/ and dist/).
 */
export function resolveDataDir(): string {
    const override = process.env.WIZARD_DATA_DIR;
    if (override) {
        return resolve(override);
    }

    let dir = dirname(fileURLToPath(import.meta.url));
    for (;;) {
        const candidate = join(dir, 'data');
        if (existsSync(join(candidate, 'spells.json'))) {
            return candidate;
        }
        const parent = dirname(dir);
        if (parent === dir) {
            throw new ReferenceDataError('Could not locate the reference data directory; set WIZARD_DATA_DIR');
        }
        dir = parent;
    }
}

function readDataFile<T>(dataDir: string, file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const path = join(dataDir, file);

    let raw: string;
    try {
        raw = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new ReferenceDataError(`Cannot read reference data file ${path}`, { cause: error });
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new ReferenceDataError(`Reference data file ${path} is not valid JSON`, { cause: error });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? `${issue.path.join('.')}: ${issue.message}` : parsed.error.message;
        throw new ReferenceDataError(`Invalid record in ${file} (${where})`, { cause: parsed.error });
    }
    return parsed.data;
}

export class ReferenceData {
    readonly spells: NamedIndex<Spell>;
    readonly races: NamedIndex<Race>;
    readonly backgrounds: NamedIndex<Background>;

    private constructor(records: ReferenceRecords) {
        this.spells = new NamedIndex('spell', records.spells);
        this.races = new NamedIndex('race', records.races);
        this.backgrounds = new NamedIndex('background', records.backgrounds);
    }

    static load(dataDir: string = resolveDataDir()): ReferenceData {
        const timer = createTimer(log);
        const data = new ReferenceData({
            spells: readDataFile(dataDir, 'spells.json', SpellFileSchema),
            races: readDataFile(dataDir, 'races.json', RaceFileSchema),
            backgrounds: readDataFile(dataDir, 'backgrounds.json', BackgroundFileSchema)
        });
        timer.done(`Loaded ${data.spells.records.length} spells, ${data.races.records.length} races, ` +
            `${data.backgrounds.records.length} backgrounds from ${dataDir}`);
        return data;
    }

    /** Build from in-memory records, validated the same way as the files. */
    static fromRecords(records: {
        spells: readonly z.input<typeof SpellSchema>[];
        races: readonly z.input<typeof RaceSchema>[];
        backgrounds: readonly Background[];
    }): ReferenceData {
        const parse = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, kind: string): T => {
            const parsed = schema.safeParse(value);
            if (!parsed.success) {
                throw new ReferenceDataError(`Invalid ${kind} fixture`, { cause: parsed.error });
            }
            return parsed.data;
        };
        return new ReferenceData({
            spells: parse(SpellFileSchema, records.spells, 'spell'),
            races: parse(RaceFileSchema, records.races, 'race'),
            backgrounds: parse(z.array(BackgroundSchema), records.backgrounds, 'background')
        });
    }
}

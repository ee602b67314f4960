import { ABILITIES, ABILITY_LABELS, type AbilityScores } from '../../schema/ability.js';
import type { CharacterSheet } from '../../schema/character-sheet.js';
import { failure, success, type ToolResult } from '../../utils/tool-result.js';
import { totalAbilityScore, totalAbilityScores } from './abilities.js';
import { CANTRIPS_AT_LEVEL_1, SPELLBOOK_SPELLS_AT_LEVEL_1 } from './wizard-rules.js';

export interface ValidationIssue {
    field: string;
    message: string;
}

export interface SheetSummary {
    name: string;
    race: string | null;
    class: string;
    background: string | null;
    hp: number | null;
    ac: number | null;
    abilities: AbilityScores;
    cantrips: string[];
    spellbook: string[];
    preparedSpells: string[];
}

export interface ValidationReport {
    valid: true;
    summary: SheetSummary;
}

export interface ValidationFailure {
    valid: false;
    errors: ValidationIssue[];
}

export type ValidationResult = ToolResult<ValidationReport, ValidationFailure>;

/**
 * Collect every problem in one pass, so the caller gets the whole list.
 */
export function collectIssues(sheet: CharacterSheet): ValidationIssue[] {
    const errors: ValidationIssue[] = [];

    if (sheet.race === null) errors.push({ field: 'race', message: 'Race not set' });
    if (sheet.characterClass === null) errors.push({ field: 'characterClass', message: 'Class not set' });
    if (sheet.background === null) errors.push({ field: 'background', message: 'Background not set' });

    for (const ability of ABILITIES) {
        const total = totalAbilityScore(sheet, ability);
        if (total < 1 || total > 30) {
            errors.push({
                field: `abilityScores.${ability}`,
                message: `${ABILITY_LABELS[ability]} score ${total} is out of range (1-30)`
            });
        }
    }

    if (sheet.cantripsKnown.length !== CANTRIPS_AT_LEVEL_1) {
        errors.push({
            field: 'cantripsKnown',
            message: `Expected ${CANTRIPS_AT_LEVEL_1} cantrips, found ${sheet.cantripsKnown.length}`
        });
    }
    if (sheet.spellbook.length !== SPELLBOOK_SPELLS_AT_LEVEL_1) {
        errors.push({
            field: 'spellbook',
            message: `Expected ${SPELLBOOK_SPELLS_AT_LEVEL_1} spells in spellbook, found ${sheet.spellbook.length}`
        });
    }
    if (sheet.maxPreparedSpells !== null && sheet.preparedSpells.length > sheet.maxPreparedSpells) {
        errors.push({
            field: 'preparedSpells',
            message: `Too many prepared spells (${sheet.preparedSpells.length}/${sheet.maxPreparedSpells})`
        });
    }

    if (sheet.armorClass === null) errors.push({ field: 'armorClass', message: 'AC not computed' });
    if (sheet.maxHp === null) errors.push({ field: 'maxHp', message: 'HP not computed' });

    return errors;
}

export function validateSheet(sheet: CharacterSheet): ValidationResult {
    const errors = collectIssues(sheet);
    if (errors.length > 0) {
        return failure<ValidationFailure>(`Validation failed with ${errors.length} error(s)`, { valid: false, errors });
    }

    return success<ValidationReport>({
        valid: true,
        summary: {
            name: sheet.name ?? 'Unnamed Wizard',
            race: sheet.race,
            class: `${sheet.characterClass} ${sheet.level}`,
            background: sheet.background,
            hp: sheet.maxHp,
            ac: sheet.armorClass,
            abilities: totalAbilityScores(sheet),
            cantrips: [...sheet.cantripsKnown],
            spellbook: [...sheet.spellbook],
            preparedSpells: [...sheet.preparedSpells]
        }
    });
}

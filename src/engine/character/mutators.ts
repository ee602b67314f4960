/**
 * Character sheet mutators
 *
 * Each mutator takes the current sheet and typed arguments and returns
 * either a new sheet with a confirmation message or a failure. Every check
 * runs before anything is copied, so a failure never changes the sheet.
 */

import { ABILITIES, ABILITY_LABELS, parseAbility, type AbilityBonuses, type AbilityScores } from '../../schema/ability.js';
import { WIZARD_CLASS, type CharacterSheet } from '../../schema/character-sheet.js';
import type { Size } from '../../schema/race.js';
import { CANTRIP_LEVEL, type Spell } from '../../schema/spell.js';
import { failure, success, type ToolResult } from '../../utils/tool-result.js';
import { totalModifier } from './abilities.js';
import { computeDerivedStats, wizardMaxHp } from './derived-stats.js';
import {
    CANTRIPS_AT_LEVEL_1,
    LEVEL_1_SPELL_SLOTS,
    SPELLBOOK_SPELLS_AT_LEVEL_1,
    SPELLBOOK_SPELL_LEVEL,
    SPELLCASTING_ABILITY,
    WIZARD_HIT_DIE,
    WIZARD_SAVING_THROWS,
    WIZARD_SKILLS,
    WIZARD_SKILL_PICKS,
    WIZARD_WEAPONS,
    isWizardSkill
} from './wizard-rules.js';

export type SheetMutation = ToolResult<CharacterSheet>;

export interface RaceChoice {
    race: string;
    size: Size;
    speed: number;
    darkvision: number | null;
    traits: string[];
}

export interface BackgroundChoice {
    background: string;
    skillProficiencies: string[];
    toolProficiency: string;
    originFeat: string;
    /** Keyed by ability, e.g. { Intelligence: 2, wisdom: 1 } */
    abilityBonuses: Record<string, number>;
    backgroundFeature?: string | null;
}

const MIN_SCORE = 1;
const MAX_SCORE = 30;

// Appends only values not already present, keeping first-seen order.
function mergeUnique(existing: readonly string[], added: readonly string[]): string[] {
    const merged = [...existing];
    for (const value of added) {
        if (!merged.includes(value)) merged.push(value);
    }
    return merged;
}

function findIgnoringCase(list: readonly string[], name: string): string | undefined {
    const needle = name.trim().toLowerCase();
    return list.find(entry => entry.toLowerCase() === needle);
}

function signed(value: number): string {
    return value >= 0 ? `+${value}` : `${value}`;
}

// ═══════════════════════════════════════════════════════════════════════════
// IDENTITY AND RACE
// ═══════════════════════════════════════════════════════════════════════════

export function setName(sheet: CharacterSheet, name: string): SheetMutation {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
        return failure('Character name cannot be empty');
    }
    return success({ ...sheet, name: trimmed }, `Character name set to '${trimmed}'`);
}

export function setRace(sheet: CharacterSheet, choice: RaceChoice): SheetMutation {
    const race = choice.race.trim();
    if (race.length === 0) {
        return failure('Race name cannot be empty');
    }
    if (!Number.isInteger(choice.speed) || choice.speed < 0) {
        return failure(`Speed must be a non-negative whole number of feet, got ${choice.speed}`);
    }
    return success({
        ...sheet,
        race,
        size: choice.size,
        speed: choice.speed,
        darkvision: choice.darkvision,
        racialTraits: [...choice.traits]
    }, `Race set to '${race}' (${choice.size}, ${choice.speed}ft speed)`);
}

// ═══════════════════════════════════════════════════════════════════════════
// ABILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function setAbilityScores(sheet: CharacterSheet, scores: AbilityScores): SheetMutation {
    for (const ability of ABILITIES) {
        const score = scores[ability];
        if (!Number.isInteger(score) || score < MIN_SCORE || score > MAX_SCORE) {
            return failure(`${ABILITY_LABELS[ability]} score ${score} is out of range (${MIN_SCORE}-${MAX_SCORE})`);
        }
    }
    return success(
        { ...sheet, abilityScores: { ...scores } },
        `Ability scores set: STR ${scores.strength}, DEX ${scores.dexterity}, CON ${scores.constitution}, ` +
        `INT ${scores.intelligence}, WIS ${scores.wisdom}, CHA ${scores.charisma}`
    );
}

// ═══════════════════════════════════════════════════════════════════════════
// CLASS AND BACKGROUND
// ═══════════════════════════════════════════════════════════════════════════

/** Skill legality is checked per skill, then the count, then duplicates. */
export function setClassWizard(sheet: CharacterSheet, skills: readonly string[]): SheetMutation {
    for (const skill of skills) {
        if (!isWizardSkill(skill)) {
            return failure(`'${skill}' is not a valid wizard skill. Choose from: ${WIZARD_SKILLS.join(', ')}`);
        }
    }
    if (skills.length !== WIZARD_SKILL_PICKS) {
        return failure(`Wizard must choose exactly ${WIZARD_SKILL_PICKS} skill proficiencies`);
    }
    const duplicate = skills.find((skill, i) => skills.indexOf(skill) !== i);
    if (duplicate !== undefined) {
        return failure(`Skill '${duplicate}' was chosen more than once; pick ${WIZARD_SKILL_PICKS} different skills`);
    }

    const updated: CharacterSheet = {
        ...sheet,
        characterClass: WIZARD_CLASS,
        level: 1,
        hitDie: WIZARD_HIT_DIE,
        savingThrowProficiencies: [...WIZARD_SAVING_THROWS],
        weaponProficiencies: [...WIZARD_WEAPONS],
        armorProficiencies: [],
        skillProficiencies: mergeUnique(sheet.skillProficiencies, skills)
    };
    updated.maxHp = wizardMaxHp(updated);

    return success(updated, `Class set to Wizard. HP: ${updated.maxHp}, Skills: ${skills.join(', ')}`);
}

export function setBackground(sheet: CharacterSheet, choice: BackgroundChoice): SheetMutation {
    const background = choice.background.trim();
    if (background.length === 0) {
        return failure('Background name cannot be empty');
    }

    const bonuses: AbilityBonuses = {};
    for (const [key, bonus] of Object.entries(choice.abilityBonuses)) {
        const ability = parseAbility(key);
        if (ability === null) {
            return failure(`'${key}' is not an ability. Choose from: ${ABILITIES.map(a => ABILITY_LABELS[a]).join(', ')}`);
        }
        if (!Number.isInteger(bonus)) {
            return failure(`Bonus for ${ABILITY_LABELS[ability]} must be a whole number, got ${bonus}`);
        }
        bonuses[ability] = (bonuses[ability] ?? 0) + bonus;
    }

    const tool = choice.toolProficiency.trim();
    return success({
        ...sheet,
        background,
        originFeat: choice.originFeat,
        backgroundFeature: choice.backgroundFeature ?? sheet.backgroundFeature,
        backgroundAbilityBonuses: bonuses,
        skillProficiencies: mergeUnique(sheet.skillProficiencies, choice.skillProficiencies),
        toolProficiencies: tool.length > 0 ? mergeUnique(sheet.toolProficiencies, [tool]) : sheet.toolProficiencies
    }, `Background set to '${background}' with feat '${choice.originFeat}'`);
}

// ═══════════════════════════════════════════════════════════════════════════
// SPELLCASTING
// ═══════════════════════════════════════════════════════════════════════════

/** Recomputes from current totals, so calling it again is harmless. */
export function configureSpellcasting(sheet: CharacterSheet): SheetMutation {
    if (sheet.characterClass !== WIZARD_CLASS) {
        return failure('Character must be a Wizard to configure spellcasting');
    }

    const intelligence = totalModifier(sheet, 'intelligence');
    const updated: CharacterSheet = {
        ...sheet,
        spellcastingAbility: SPELLCASTING_ABILITY,
        spellSlots: { ...LEVEL_1_SPELL_SLOTS },
        spellSaveDc: 8 + sheet.proficiencyBonus + intelligence,
        spellAttackBonus: sheet.proficiencyBonus + intelligence,
        maxPreparedSpells: Math.max(1, intelligence + sheet.level)
    };

    return success(updated,
        `Spellcasting configured: DC ${updated.spellSaveDc}, Attack ${signed(updated.spellAttackBonus ?? 0)}, ` +
        `Max prepared: ${updated.maxPreparedSpells}`);
}

function checkWizardSpell(spell: Spell): string | null {
    return spell.classes.includes('wizard') ? null : `'${spell.name}' is not a wizard spell`;
}

export function addCantrip(sheet: CharacterSheet, spell: Spell): SheetMutation {
    if (spell.level !== CANTRIP_LEVEL) {
        return failure(`'${spell.name}' is not a cantrip (level ${spell.level})`);
    }
    const notWizard = checkWizardSpell(spell);
    if (notWizard) return failure(notWizard);
    if (sheet.cantripsKnown.length >= CANTRIPS_AT_LEVEL_1) {
        return failure(`Cannot add more than ${CANTRIPS_AT_LEVEL_1} cantrips at level 1`);
    }
    if (sheet.cantripsKnown.includes(spell.name)) {
        return failure(`'${spell.name}' is already known`);
    }

    const cantripsKnown = [...sheet.cantripsKnown, spell.name];
    return success({ ...sheet, cantripsKnown },
        `Added cantrip '${spell.name}' (${cantripsKnown.length}/${CANTRIPS_AT_LEVEL_1})`);
}

export function addSpellbookSpell(sheet: CharacterSheet, spell: Spell): SheetMutation {
    if (spell.level !== SPELLBOOK_SPELL_LEVEL) {
        return failure(`'${spell.name}' is level ${spell.level}, must be level ${SPELLBOOK_SPELL_LEVEL}`);
    }
    const notWizard = checkWizardSpell(spell);
    if (notWizard) return failure(notWizard);
    if (sheet.spellbook.length >= SPELLBOOK_SPELLS_AT_LEVEL_1) {
        return failure(`Cannot add more than ${SPELLBOOK_SPELLS_AT_LEVEL_1} spells to spellbook at level 1`);
    }
    if (sheet.spellbook.includes(spell.name)) {
        return failure(`'${spell.name}' is already in spellbook`);
    }

    const spellbook = [...sheet.spellbook, spell.name];
    return success({ ...sheet, spellbook },
        `Added '${spell.name}' to spellbook (${spellbook.length}/${SPELLBOOK_SPELLS_AT_LEVEL_1})`);
}

/** The name must already be in the spellbook, spelled exactly. */
export function prepareSpell(sheet: CharacterSheet, spellName: string): SheetMutation {
    if (!sheet.spellbook.includes(spellName)) {
        return failure(`'${spellName}' is not in your spellbook`);
    }
    if (sheet.maxPreparedSpells === null) {
        return failure('Spellcasting has not been configured yet');
    }
    if (sheet.preparedSpells.length >= sheet.maxPreparedSpells) {
        return failure(`Cannot prepare more than ${sheet.maxPreparedSpells} spells`);
    }
    if (sheet.preparedSpells.includes(spellName)) {
        return failure(`'${spellName}' is already prepared`);
    }

    const preparedSpells = [...sheet.preparedSpells, spellName];
    return success({ ...sheet, preparedSpells },
        `Prepared '${spellName}' (${preparedSpells.length}/${sheet.maxPreparedSpells})`);
}

// Revisions within a phase. Names match without regard to case.

export function removeCantrip(sheet: CharacterSheet, spellName: string): SheetMutation {
    const known = findIgnoringCase(sheet.cantripsKnown, spellName);
    if (known === undefined) {
        return failure(`'${spellName}' is not a known cantrip`);
    }
    const cantripsKnown = sheet.cantripsKnown.filter(name => name !== known);
    return success({ ...sheet, cantripsKnown },
        `Removed cantrip '${known}' (${cantripsKnown.length}/${CANTRIPS_AT_LEVEL_1})`);
}

/** Also unprepares the spell. */
export function removeSpellbookSpell(sheet: CharacterSheet, spellName: string): SheetMutation {
    const entry = findIgnoringCase(sheet.spellbook, spellName);
    if (entry === undefined) {
        return failure(`'${spellName}' is not in your spellbook`);
    }
    const spellbook = sheet.spellbook.filter(name => name !== entry);
    const preparedSpells = sheet.preparedSpells.filter(name => name !== entry);
    const unprepared = preparedSpells.length < sheet.preparedSpells.length ? ' and unprepared it' : '';
    return success({ ...sheet, spellbook, preparedSpells },
        `Removed '${entry}' from spellbook${unprepared} (${spellbook.length}/${SPELLBOOK_SPELLS_AT_LEVEL_1})`);
}

export function unprepareSpell(sheet: CharacterSheet, spellName: string): SheetMutation {
    const entry = findIgnoringCase(sheet.preparedSpells, spellName);
    if (entry === undefined) {
        return failure(`'${spellName}' is not prepared`);
    }
    const preparedSpells = sheet.preparedSpells.filter(name => name !== entry);
    return success({ ...sheet, preparedSpells }, `Unprepared '${entry}'`);
}

// ═══════════════════════════════════════════════════════════════════════════
// DERIVED STATS
// ═══════════════════════════════════════════════════════════════════════════

export function applyDerivedStats(sheet: CharacterSheet): SheetMutation {
    const stats = computeDerivedStats(sheet);
    return success({
        ...sheet,
        armorClass: stats.armorClass,
        initiative: stats.initiative,
        passivePerception: stats.passivePerception,
        maxHp: stats.maxHp
    }, `Derived stats computed: AC ${stats.armorClass}, Initiative ${signed(stats.initiative)}, ` +
        `Passive Perception ${stats.passivePerception}`);
}

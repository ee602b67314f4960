import { WIZARD_CLASS, type CharacterSheet } from '../../schema/character-sheet.js';
import { totalModifier } from './abilities.js';
import {
    BASE_ARMOR_CLASS,
    BASE_PASSIVE_PERCEPTION,
    WIZARD_HIT_DIE_MAX
} from './wizard-rules.js';

export interface DerivedStats {
    armorClass: number;
    initiative: number;
    passivePerception: number;
    maxHp: number | null;
}

/** Hit die maximum plus the total CON modifier, never below 1. */
export function wizardMaxHp(sheet: CharacterSheet): number {
    return Math.max(1, WIZARD_HIT_DIE_MAX + totalModifier(sheet, 'constitution'));
}

export function computeDerivedStats(sheet: CharacterSheet): DerivedStats {
    const dexterity = totalModifier(sheet, 'dexterity');
    const perception = totalModifier(sheet, 'wisdom') +
        (sheet.skillProficiencies.includes('Perception') ? sheet.proficiencyBonus : 0);

    return {
        armorClass: BASE_ARMOR_CLASS + dexterity,
        initiative: dexterity,
        passivePerception: BASE_PASSIVE_PERCEPTION + perception,
        maxHp: sheet.characterClass === WIZARD_CLASS ? wizardMaxHp(sheet) : sheet.maxHp
    };
}

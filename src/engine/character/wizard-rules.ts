/**
 * Fixed level-1 Wizard rules.
 */

export const WIZARD_SKILLS = [
    'Arcana',
    'History',
    'Insight',
    'Investigation',
    'Medicine',
    'Religion'
] as const;

export const WIZARD_SKILL_PICKS = 2;

export const WIZARD_SAVING_THROWS = ['Intelligence', 'Wisdom'] as const;

export const WIZARD_WEAPONS = [
    'Daggers',
    'Darts',
    'Slings',
    'Quarterstaffs',
    'Light crossbows'
] as const;

export const WIZARD_HIT_DIE = 'd6';
export const WIZARD_HIT_DIE_MAX = 6;

export const PROFICIENCY_BONUS = 2;
export const SPELLCASTING_ABILITY = 'Intelligence';
export const LEVEL_1_SPELL_SLOTS: Readonly<Record<number, number>> = { 1: 2 };

export const CANTRIPS_AT_LEVEL_1 = 3;
export const SPELLBOOK_SPELLS_AT_LEVEL_1 = 6;

// Spells a new wizard copies into the spellbook are all this level.
export const SPELLBOOK_SPELL_LEVEL = 1;

export const BASE_ARMOR_CLASS = 10;
export const BASE_PASSIVE_PERCEPTION = 10;

export function isWizardSkill(skill: string): boolean {
    return WIZARD_SKILLS.some(wizardSkill => wizardSkill === skill);
}

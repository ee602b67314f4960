import { z } from 'zod';
import { AbilityBonusesSchema, AbilityScoresSchema } from './ability.js';
import { SizeSchema } from './race.js';
import { PROFICIENCY_BONUS } from '../engine/character/wizard-rules.js';

export const WIZARD_CLASS = 'Wizard';

// Spell level (as a number, even after a JSON round-trip) -> slot count
export const SpellSlotsSchema = z.record(
    z.coerce.number().int().min(1).max(9),
    z.number().int().min(0)
);

export type SpellSlots = z.infer<typeof SpellSlotsSchema>;

/**
 * The document a creation session builds up.
 *
 * Every field has a default, so `CharacterSheetSchema.parse({})` is the
 * empty sheet. Unset values are null rather than absent so they survive
 * storage unchanged.
 */
export const CharacterSheetSchema = z.object({
    completedSteps: z.array(z.string()).default([]),
    name: z.string().nullable().default(null),

    // Race
    race: z.string().nullable().default(null),
    size: SizeSchema.nullable().default(null),
    speed: z.number().int().min(0).default(30),
    darkvision: z.number().int().min(0).nullable().default(null),
    racialTraits: z.array(z.string()).default([]),

    // Abilities
    abilityScores: AbilityScoresSchema.default({}),
    backgroundAbilityBonuses: AbilityBonusesSchema.default({}),

    // Class
    characterClass: z.literal(WIZARD_CLASS).nullable().default(null),
    level: z.number().int().min(1).default(1),
    hitDie: z.string().nullable().default(null),
    maxHp: z.number().int().min(1).nullable().default(null),

    // Proficiencies
    savingThrowProficiencies: z.array(z.string()).default([]),
    skillProficiencies: z.array(z.string()).default([]),
    weaponProficiencies: z.array(z.string()).default([]),
    armorProficiencies: z.array(z.string()).default([]),
    toolProficiencies: z.array(z.string()).default([]),
    languages: z.array(z.string()).default(['Common']),

    // Background
    background: z.string().nullable().default(null),
    backgroundFeature: z.string().nullable().default(null),
    originFeat: z.string().nullable().default(null),

    // Spellcasting
    spellcastingAbility: z.literal('Intelligence').nullable().default(null),
    spellSaveDc: z.number().int().nullable().default(null),
    spellAttackBonus: z.number().int().nullable().default(null),
    spellSlots: SpellSlotsSchema.default({}),
    cantripsKnown: z.array(z.string()).default([]),
    spellbook: z.array(z.string()).default([]),
    preparedSpells: z.array(z.string()).default([]),
    maxPreparedSpells: z.number().int().min(1).nullable().default(null),

    // Derived
    proficiencyBonus: z.number().int().default(PROFICIENCY_BONUS),
    armorClass: z.number().int().nullable().default(null),
    initiative: z.number().int().nullable().default(null),
    passivePerception: z.number().int().nullable().default(null)
});

export type CharacterSheet = z.infer<typeof CharacterSheetSchema>;

export function createEmptySheet(): CharacterSheet {
    return CharacterSheetSchema.parse({});
}

import { z } from 'zod';

export const AbilitySchema = z.enum([
    'strength',
    'dexterity',
    'constitution',
    'intelligence',
    'wisdom',
    'charisma'
]);

export type Ability = z.infer<typeof AbilitySchema>;

export const ABILITIES = AbilitySchema.options;

export const ABILITY_LABELS: Record<Ability, string> = {
    strength: 'Strength',
    dexterity: 'Dexterity',
    constitution: 'Constitution',
    intelligence: 'Intelligence',
    wisdom: 'Wisdom',
    charisma: 'Charisma'
};

/** Accepts "Intelligence", "intelligence" or " INTELLIGENCE ". */
export function parseAbility(value: string): Ability | null {
    const parsed = AbilitySchema.safeParse(value.trim().toLowerCase());
    return parsed.success ? parsed.data : null;
}

export const DEFAULT_ABILITY_SCORE = 10;

export const AbilityScoresSchema = z.object({
    strength: z.number().int().default(DEFAULT_ABILITY_SCORE),
    dexterity: z.number().int().default(DEFAULT_ABILITY_SCORE),
    constitution: z.number().int().default(DEFAULT_ABILITY_SCORE),
    intelligence: z.number().int().default(DEFAULT_ABILITY_SCORE),
    wisdom: z.number().int().default(DEFAULT_ABILITY_SCORE),
    charisma: z.number().int().default(DEFAULT_ABILITY_SCORE)
});

export type AbilityScores = z.infer<typeof AbilityScoresSchema>;

/** Bonus map granted by a background; only listed abilities are raised. */
export const AbilityBonusesSchema = z.record(AbilitySchema, z.number().int());

export type AbilityBonuses = z.infer<typeof AbilityBonusesSchema>;

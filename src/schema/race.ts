import { z } from 'zod';
import { AbilitySchema } from './ability.js';

export const SizeSchema = z.enum(['small', 'medium']);

export type Size = z.infer<typeof SizeSchema>;

// Races may offer a free choice ("any") instead of a fixed ability.
export const RaceAbilitySchema = z.enum([...AbilitySchema.options, 'any']);

export type RaceAbility = z.infer<typeof RaceAbilitySchema>;

export const RaceAbilityBonusSchema = z.object({
    ability: RaceAbilitySchema,
    bonus: z.number().int(),
    count: z.number().int().min(1).optional()
        .describe('How many different abilities the bonus applies to, for "any"')
});

export type RaceAbilityBonus = z.infer<typeof RaceAbilityBonusSchema>;

export const RaceSchema = z.object({
    name: z.string().min(1),
    abilityScores: z.array(RaceAbilityBonusSchema),
    darkvision: z.number().int().min(0).nullable(),
    size: SizeSchema,
    source: z.string(),
    speed: z.number().int().min(0).default(30),
    traits: z.array(z.string()).default([])
});

export type Race = z.infer<typeof RaceSchema>;

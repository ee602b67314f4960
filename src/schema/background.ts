import { z } from 'zod';

export const BackgroundSchema = z.object({
    name: z.string().min(1),
    abilityScores: z.array(z.string()).describe('Abilities the background can raise, e.g. "Intelligence"'),
    originFeat: z.string(),
    skillProficiencies: z.array(z.string()),
    toolProficiency: z.string(),
    equipment: z.array(z.string())
});

export type Background = z.infer<typeof BackgroundSchema>;

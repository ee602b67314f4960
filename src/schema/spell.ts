import { z } from 'zod';

export const SpellSchoolSchema = z.enum([
    'abjuration',
    'conjuration',
    'divination',
    'enchantment',
    'evocation',
    'illusion',
    'necromancy',
    'transmutation'
]);

export type SpellSchool = z.infer<typeof SpellSchoolSchema>;

export const SpellClassSchema = z.enum([
    'bard',
    'cleric',
    'druid',
    'paladin',
    'ranger',
    'sorcerer',
    'warlock',
    'wizard'
]);

export type SpellClass = z.infer<typeof SpellClassSchema>;

export const SpellSchema = z.object({
    name: z.string().min(1),
    level: z.number().int().min(0).max(9),
    school: SpellSchoolSchema,
    classes: z.array(SpellClassSchema),
    actionType: z.string(),
    concentration: z.boolean(),
    ritual: z.boolean(),
    range: z.string(),
    components: z.array(z.string()),
    material: z.string().optional(),
    duration: z.string(),
    description: z.string(),
    cantripUpgrade: z.string().optional()
});

export type Spell = z.infer<typeof SpellSchema>;

export const CANTRIP_LEVEL = 0;

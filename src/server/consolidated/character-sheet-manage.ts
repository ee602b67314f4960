/**
 * Consolidated Character Sheet Tool
 *
 * Every step of building a level-1 wizard, run against the session's sheet:
 * - get / next_step / validate / reset
 * - set_name, set_race, set_ability_scores, set_class, set_background
 * - configure_spellcasting, compute_derived_stats
 * - add_cantrip, add_spellbook_spell, prepare_spell (and their removals)
 *
 * set_race and set_background fill in whatever the caller leaves out from
 * the reference entry the name resolves to. Passing size (race) or
 * originFeat (background) marks a custom entry, which only borrows from a
 * listed entry of exactly the same name.
 */

import { z } from 'zod';
import { SizeSchema } from '../../schema/race.js';
import type { RaceChoice, BackgroundChoice } from '../../engine/character/mutators.js';
import {
    buildActionDescription,
    createActionRouter,
    defineAction,
    type ActionDefinition
} from '../../utils/action-router.js';
import { failure, success, type ToolResult } from '../../utils/tool-result.js';
import type { ToolServices } from '../services.js';
import type { ConsolidatedTool, SessionContext } from '../types.js';
import { RichFormatter } from '../utils/formatter.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const ACTIONS = [
    'get', 'next_step', 'set_name', 'set_race', 'set_ability_scores', 'set_class',
    'set_background', 'configure_spellcasting', 'add_cantrip', 'add_spellbook_spell',
    'prepare_spell', 'remove_cantrip', 'remove_spellbook_spell', 'unprepare_spell',
    'compute_derived_stats', 'validate', 'reset'
] as const;
type SheetAction = typeof ACTIONS[number];

// ═══════════════════════════════════════════════════════════════════════════
// ACTION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

// Range checks are left to the mutator so its message reaches the caller.
const ScoresSchema = z.object({
    strength: z.number().int(),
    dexterity: z.number().int(),
    constitution: z.number().int(),
    intelligence: z.number().int(),
    wisdom: z.number().int(),
    charisma: z.number().int()
});

const SpellArgSchema = z.object({ spell: z.string().min(1).describe('Spell name (fuzzy matched when adding)') });

const GetSchema = z.object({ action: z.literal('get') });
const NextStepSchema = z.object({ action: z.literal('next_step') });
const SetNameSchema = z.object({ action: z.literal('set_name'), name: z.string() });

const SetRaceSchema = z.object({
    action: z.literal('set_race'),
    race: z.string(),
    size: SizeSchema.optional(),
    speed: z.number().optional(),
    darkvision: z.number().int().min(0).nullable().optional(),
    traits: z.array(z.string()).optional()
});

const SetAbilityScoresSchema = z.object({ action: z.literal('set_ability_scores'), scores: ScoresSchema });
const SetClassSchema = z.object({ action: z.literal('set_class'), skills: z.array(z.string()) });

const SetBackgroundSchema = z.object({
    action: z.literal('set_background'),
    background: z.string(),
    abilityBonuses: z.record(z.number()).describe('e.g. { "Intelligence": 2, "Wisdom": 1 }'),
    skillProficiencies: z.array(z.string()).optional(),
    toolProficiency: z.string().optional(),
    originFeat: z.string().optional(),
    backgroundFeature: z.string().nullable().optional()
});

const ConfigureSpellcastingSchema = z.object({ action: z.literal('configure_spellcasting') });
const AddCantripSchema = SpellArgSchema.extend({ action: z.literal('add_cantrip') });
const AddSpellbookSpellSchema = SpellArgSchema.extend({ action: z.literal('add_spellbook_spell') });
const PrepareSpellSchema = SpellArgSchema.extend({ action: z.literal('prepare_spell') });
const RemoveCantripSchema = SpellArgSchema.extend({ action: z.literal('remove_cantrip') });
const RemoveSpellbookSpellSchema = SpellArgSchema.extend({ action: z.literal('remove_spellbook_spell') });
const UnprepareSpellSchema = SpellArgSchema.extend({ action: z.literal('unprepare_spell') });
const ComputeDerivedStatsSchema = z.object({ action: z.literal('compute_derived_stats') });
const ValidateSchema = z.object({ action: z.literal('validate') });
const ResetSchema = z.object({ action: z.literal('reset') });

// ═══════════════════════════════════════════════════════════════════════════
// CHOICE BUILDERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * The listed entry a set_* call builds on. Once the caller supplies the
 * field only a custom entry needs, a close-but-different listed name
 * ("Half-Elf" against "Elf") no longer counts.
 */
function listedEntry<T extends { name: string }>(
    found: ToolResult<T>,
    requested: string,
    custom: boolean
): T | null {
    if (found.status === 'failure') return null;
    if (custom && found.result.name.toLowerCase() !== requested.trim().toLowerCase()) return null;
    return found.result;
}

function raceChoice(services: ToolServices, args: z.infer<typeof SetRaceSchema>): ToolResult<RaceChoice> {
    const reference = listedEntry(services.races.findByName(args.race), args.race, args.size !== undefined);
    const size = args.size ?? reference?.size;
    if (size === undefined) {
        return failure(`No race matches ${args.race}. Pass size (small or medium) to set a race that is not listed`);
    }
    return success({
        race: reference?.name ?? args.race,
        size,
        speed: args.speed ?? reference?.speed ?? 30,
        darkvision: args.darkvision !== undefined ? args.darkvision : reference?.darkvision ?? null,
        traits: args.traits ?? reference?.traits ?? []
    });
}

function backgroundChoice(
    services: ToolServices,
    args: z.infer<typeof SetBackgroundSchema>
): ToolResult<BackgroundChoice> {
    const reference = listedEntry(
        services.backgrounds.findByName(args.background),
        args.background,
        args.originFeat !== undefined
    );
    const originFeat = args.originFeat ?? reference?.originFeat;
    if (originFeat === undefined) {
        return failure(`No background matches ${args.background}. Pass originFeat to set a background that is not listed`);
    }
    return success({
        background: reference?.name ?? args.background,
        skillProficiencies: args.skillProficiencies ?? reference?.skillProficiencies ?? [],
        toolProficiency: args.toolProficiency ?? reference?.toolProficiency ?? '',
        originFeat,
        abilityBonuses: args.abilityBonuses,
        backgroundFeature: args.backgroundFeature
    });
}

// ═══════════════════════════════════════════════════════════════════════════
// TOOL
// ═══════════════════════════════════════════════════════════════════════════

export function createCharacterSheetTool(services: ToolServices): ConsolidatedTool {
    const { sheets } = services;

    const definitions: Record<SheetAction, ActionDefinition<SessionContext>> = {
        get: defineAction({
            schema: GetSchema,
            handler: (_args, ctx: SessionContext) => sheets.getSheet(ctx.sessionId),
            render: sheet => RichFormatter.characterSheet(sheet),
            aliases: ['show', 'view', 'sheet'],
            description: 'Show the current character sheet'
        }),
        next_step: defineAction({
            schema: NextStepSchema,
            handler: (_args, ctx: SessionContext) => sheets.nextStep(ctx.sessionId),
            render: step => RichFormatter.header('Next Step', '🧭') + RichFormatter.keyValue({
                'Step': step.stepName,
                'Id': step.nextStep,
                'Reason': step.reason
            }),
            aliases: ['next', 'progress', 'status'],
            description: 'Which creation phase comes next'
        }),
        set_name: defineAction({
            schema: SetNameSchema,
            handler: (args, ctx: SessionContext) => sheets.setName(ctx.sessionId, args.name),
            aliases: ['name', 'rename'],
            description: 'Set the character name'
        }),
        set_race: defineAction({
            schema: SetRaceSchema,
            handler: (args, ctx: SessionContext): ToolResult<string> => {
                const choice = raceChoice(services, args);
                return choice.status === 'failure' ? choice : sheets.setRace(ctx.sessionId, choice.result);
            },
            aliases: ['race', 'choose_race'],
            description: 'Set the race; size, speed, darkvision and traits default to the listed race'
        }),
        set_ability_scores: defineAction({
            schema: SetAbilityScoresSchema,
            handler: (args, ctx: SessionContext) => sheets.setAbilityScores(ctx.sessionId, args.scores),
            aliases: ['abilities', 'scores', 'set_scores'],
            description: 'Set the six base ability scores (1-30)'
        }),
        set_class: defineAction({
            schema: SetClassSchema,
            handler: (args, ctx: SessionContext) => sheets.setClassWizard(ctx.sessionId, args.skills),
            aliases: ['class', 'set_wizard'],
            description: 'Make the character a Wizard with two class skills'
        }),
        set_background: defineAction({
            schema: SetBackgroundSchema,
            handler: (args, ctx: SessionContext): ToolResult<string> => {
                const choice = backgroundChoice(services, args);
                return choice.status === 'failure' ? choice : sheets.setBackground(ctx.sessionId, choice.result);
            },
            aliases: ['background', 'choose_background'],
            description: 'Set the background and its ability bonuses'
        }),
        configure_spellcasting: defineAction({
            schema: ConfigureSpellcastingSchema,
            handler: (_args, ctx: SessionContext) => sheets.configureSpellcasting(ctx.sessionId),
            aliases: ['spellcasting', 'configure'],
            description: 'Derive spell save DC, attack bonus and prepared-spell limit'
        }),
        add_cantrip: defineAction({
            schema: AddCantripSchema,
            handler: (args, ctx: SessionContext) => sheets.addCantrip(ctx.sessionId, args.spell),
            aliases: ['cantrip', 'learn_cantrip'],
            description: 'Learn a wizard cantrip (3 at level 1)'
        }),
        add_spellbook_spell: defineAction({
            schema: AddSpellbookSpellSchema,
            handler: (args, ctx: SessionContext) => sheets.addSpellbookSpell(ctx.sessionId, args.spell),
            aliases: ['add_spell', 'spellbook', 'scribe'],
            description: 'Copy a level-1 wizard spell into the spellbook (6 at level 1)'
        }),
        prepare_spell: defineAction({
            schema: PrepareSpellSchema,
            handler: (args, ctx: SessionContext) => sheets.prepareSpell(ctx.sessionId, args.spell),
            aliases: ['prepare'],
            description: 'Prepare a spell from the spellbook'
        }),
        remove_cantrip: defineAction({
            schema: RemoveCantripSchema,
            handler: (args, ctx: SessionContext) => sheets.removeCantrip(ctx.sessionId, args.spell),
            aliases: ['forget_cantrip'],
            description: 'Forget a known cantrip'
        }),
        remove_spellbook_spell: defineAction({
            schema: RemoveSpellbookSpellSchema,
            handler: (args, ctx: SessionContext) => sheets.removeSpellbookSpell(ctx.sessionId, args.spell),
            aliases: ['remove_spell'],
            description: 'Remove a spell from the spellbook (and unprepare it)'
        }),
        unprepare_spell: defineAction({
            schema: UnprepareSpellSchema,
            handler: (args, ctx: SessionContext) => sheets.unprepareSpell(ctx.sessionId, args.spell),
            aliases: ['unprepare'],
            description: 'Stop preparing a spell'
        }),
        compute_derived_stats: defineAction({
            schema: ComputeDerivedStatsSchema,
            handler: (_args, ctx: SessionContext) => sheets.computeDerivedStats(ctx.sessionId),
            render: (stats, _args, message) => RichFormatter.success(message ?? 'Derived stats computed') +
                RichFormatter.keyValue({
                    'AC': stats.armorClass,
                    'Initiative': RichFormatter.signed(stats.initiative),
                    'Passive Perception': stats.passivePerception,
                    'Max HP': stats.maxHp
                }),
            aliases: ['derive', 'derived_stats', 'stats'],
            description: 'Compute AC, initiative, passive perception and HP'
        }),
        validate: defineAction({
            schema: ValidateSchema,
            handler: (_args, ctx: SessionContext) => sheets.validate(ctx.sessionId),
            render: report => RichFormatter.success('Character sheet is valid') + RichFormatter.keyValue({
                'Name': report.summary.name,
                'Race': report.summary.race,
                'Class': report.summary.class,
                'Background': report.summary.background,
                'HP': report.summary.hp,
                'AC': report.summary.ac,
                'Cantrips': report.summary.cantrips.join(', '),
                'Spellbook': report.summary.spellbook.join(', '),
                'Prepared': report.summary.preparedSpells.join(', ')
            }),
            renderFailure: outcome => RichFormatter.error(outcome.message) +
                RichFormatter.list((outcome.result?.errors ?? []).map(issue => `\`${issue.field}\` ${issue.message}`)),
            aliases: ['check', 'verify'],
            description: 'Check the finished sheet and summarise it'
        }),
        reset: defineAction({
            schema: ResetSchema,
            handler: (_args, ctx: SessionContext) => sheets.reset(ctx.sessionId),
            aliases: ['clear', 'start_over'],
            description: 'Discard the session\'s sheet'
        })
    };

    const route = createActionRouter({ tag: 'CHARACTER_SHEET', actions: ACTIONS, definitions });

    return {
        name: 'character_sheet_manage',
        description: `Build a level-1 Wizard one phase at a time.

🧭 WORKFLOW:
1. next_step - ask which phase comes next
2. set_name, set_race, set_ability_scores, set_class, set_background
3. configure_spellcasting, add_spellbook_spell (x6), add_cantrip (x3), prepare_spell
4. compute_derived_stats, then validate

Rule violations come back as failures and leave the sheet unchanged.

${buildActionDescription(ACTIONS, definitions)}`,
        inputShape: {
            action: z.string().describe(`Action: ${ACTIONS.join(', ')}`),
            name: z.string().optional(),
            race: z.string().optional(),
            size: z.string().optional(),
            speed: z.number().optional(),
            darkvision: z.number().nullable().optional(),
            traits: z.array(z.string()).optional(),
            scores: ScoresSchema.partial().optional().describe('Base scores: strength, dexterity, constitution, intelligence, wisdom, charisma'),
            skills: z.array(z.string()).optional().describe('Exactly two wizard skills'),
            background: z.string().optional(),
            abilityBonuses: z.record(z.number()).optional(),
            skillProficiencies: z.array(z.string()).optional(),
            toolProficiency: z.string().optional(),
            originFeat: z.string().optional(),
            backgroundFeature: z.string().nullable().optional(),
            spell: z.string().optional()
        },
        handler: route
    };
}

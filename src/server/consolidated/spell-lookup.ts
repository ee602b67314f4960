/**
 * Consolidated Spell Lookup Tool
 *
 * Read-only queries over the spell reference data. Names are fuzzy
 * matched; school and class filters are checked against the known values.
 */

import { z } from 'zod';
import {
    buildActionDescription,
    createActionRouter,
    defineAction,
    type ActionDefinition
} from '../../utils/action-router.js';
import type { ToolServices } from '../services.js';
import type { ConsolidatedTool, SessionContext } from '../types.js';
import { RichFormatter } from '../utils/formatter.js';

const ACTIONS = [
    'find', 'list', 'list_schools', 'list_classes', 'compare', 'wizard_cantrips', 'wizard_level1_spells'
] as const;
type SpellAction = typeof ACTIONS[number];

const FindSchema = z.object({ action: z.literal('find'), name: z.string().min(1) });

const ListSchema = z.object({
    action: z.literal('list'),
    class: z.string().optional(),
    school: z.string().optional(),
    level: z.number().int().min(0).max(9).optional(),
    maxLevel: z.number().int().min(0).max(9).optional(),
    isRitual: z.boolean().optional(),
    isConcentration: z.boolean().optional()
});

const ListSchoolsSchema = z.object({ action: z.literal('list_schools') });
const ListClassesSchema = z.object({ action: z.literal('list_classes') });
const CompareSchema = z.object({ action: z.literal('compare'), nameA: z.string().min(1), nameB: z.string().min(1) });
const WizardCantripsSchema = z.object({ action: z.literal('wizard_cantrips') });
const WizardLevel1SpellsSchema = z.object({ action: z.literal('wizard_level1_spells') });

export function createSpellLookupTool(services: ToolServices): ConsolidatedTool {
    const { spells } = services;

    const definitions: Record<SpellAction, ActionDefinition<SessionContext>> = {
        find: defineAction({
            schema: FindSchema,
            handler: args => spells.findByName(args.name),
            render: spell => RichFormatter.spell(spell),
            aliases: ['get', 'search', 'lookup'],
            description: 'Find one spell by (approximate) name'
        }),
        list: defineAction({
            schema: ListSchema,
            handler: ({ action: _action, ...filters }) => spells.list(filters),
            render: matches => RichFormatter.header(`${matches.length} spell(s)`, '📖') + RichFormatter.spellTable(matches),
            aliases: ['filter', 'all'],
            description: 'List spells, filtered by class, school, level, ritual or concentration'
        }),
        list_schools: defineAction({
            schema: ListSchoolsSchema,
            handler: () => spells.listSchools(),
            render: schools => RichFormatter.section('Schools') + RichFormatter.list(schools),
            aliases: ['schools'],
            description: 'Schools of magic present in the data'
        }),
        list_classes: defineAction({
            schema: ListClassesSchema,
            handler: () => spells.listClasses(),
            render: classes => RichFormatter.section('Classes') + RichFormatter.list(classes),
            aliases: ['classes'],
            description: 'Spellcasting classes present in the data'
        }),
        compare: defineAction({
            schema: CompareSchema,
            handler: args => spells.compare(args.nameA, args.nameB),
            render: ({ spellA, spellB }) => RichFormatter.spell(spellA) + RichFormatter.spell(spellB),
            aliases: ['diff', 'versus', 'vs'],
            description: 'Show two spells side by side'
        }),
        wizard_cantrips: defineAction({
            schema: WizardCantripsSchema,
            handler: () => spells.listWizardCantrips(),
            render: names => RichFormatter.section(`Wizard cantrips (${names.length})`) + RichFormatter.list(names),
            aliases: ['cantrips'],
            description: 'Cantrips a wizard can learn'
        }),
        wizard_level1_spells: defineAction({
            schema: WizardLevel1SpellsSchema,
            handler: () => spells.listWizardLevel1Spells(),
            render: names => RichFormatter.section(`Wizard level 1 spells (${names.length})`) + RichFormatter.list(names),
            aliases: ['level1', 'spellbook_options'],
            description: 'Level-1 spells a wizard can copy into the spellbook'
        })
    };

    return {
        name: 'spell_lookup',
        description: `Look up spells.

Use wizard_cantrips and wizard_level1_spells to see what a new wizard may pick.

${buildActionDescription(ACTIONS, definitions)}`,
        inputShape: {
            action: z.string().describe(`Action: ${ACTIONS.join(', ')}`),
            name: z.string().optional(),
            nameA: z.string().optional(),
            nameB: z.string().optional(),
            class: z.string().optional(),
            school: z.string().optional(),
            level: z.number().int().optional(),
            maxLevel: z.number().int().optional(),
            isRitual: z.boolean().optional(),
            isConcentration: z.boolean().optional()
        },
        handler: createActionRouter({ tag: 'SPELL_LOOKUP', actions: ACTIONS, definitions })
    };
}

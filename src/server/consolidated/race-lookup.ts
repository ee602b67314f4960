/**
 * Consolidated Race Lookup Tool
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

const ACTIONS = ['find', 'list', 'ability_bonuses', 'list_by_ability', 'list_sizes'] as const;
type RaceAction = typeof ACTIONS[number];

const FindSchema = z.object({ action: z.literal('find'), name: z.string().min(1) });

const ListSchema = z.object({
    action: z.literal('list'),
    size: z.string().optional(),
    hasDarkvision: z.boolean().optional(),
    ability: z.string().optional()
});

const AbilityBonusesSchema = z.object({ action: z.literal('ability_bonuses'), name: z.string().min(1) });
const ListByAbilitySchema = z.object({ action: z.literal('list_by_ability'), ability: z.string().min(1) });
const ListSizesSchema = z.object({ action: z.literal('list_sizes') });

export function createRaceLookupTool(services: ToolServices): ConsolidatedTool {
    const { races } = services;

    const definitions: Record<RaceAction, ActionDefinition<SessionContext>> = {
        find: defineAction({
            schema: FindSchema,
            handler: args => races.findByName(args.name),
            render: race => RichFormatter.race(race),
            aliases: ['get', 'search', 'lookup'],
            description: 'Find one race by (approximate) name'
        }),
        list: defineAction({
            schema: ListSchema,
            handler: ({ action: _action, ...filters }) => races.list(filters),
            render: matches => RichFormatter.header(`${matches.length} race(s)`, '🧝') + RichFormatter.raceTable(matches),
            aliases: ['filter', 'all'],
            description: 'List races, filtered by size, darkvision or ability bonus'
        }),
        ability_bonuses: defineAction({
            schema: AbilityBonusesSchema,
            handler: args => races.getAbilityBonuses(args.name),
            render: bonuses => RichFormatter.section(bonuses.race) +
                RichFormatter.keyValue({ 'Ability Bonuses': RichFormatter.raceBonuses(bonuses) || '-' }),
            aliases: ['bonuses'],
            description: 'Ability score bonuses of one race'
        }),
        list_by_ability: defineAction({
            schema: ListByAbilitySchema,
            handler: args => races.listByAbility(args.ability),
            render: (matches, args) => RichFormatter.header(`Races raising ${args.ability}`, '🧝') +
                RichFormatter.raceTable(matches),
            aliases: ['by_ability'],
            description: 'Races whose bonuses include an ability'
        }),
        list_sizes: defineAction({
            schema: ListSizesSchema,
            handler: () => races.listSizes(),
            render: sizes => RichFormatter.section('Sizes') + RichFormatter.list(sizes),
            aliases: ['sizes'],
            description: 'Sizes a race can have'
        })
    };

    return {
        name: 'race_lookup',
        description: `Look up playable races and their ability bonuses.

${buildActionDescription(ACTIONS, definitions)}`,
        inputShape: {
            action: z.string().describe(`Action: ${ACTIONS.join(', ')}`),
            name: z.string().optional(),
            size: z.string().optional(),
            hasDarkvision: z.boolean().optional(),
            ability: z.string().optional()
        },
        handler: createActionRouter({ tag: 'RACE_LOOKUP', actions: ACTIONS, definitions })
    };
}

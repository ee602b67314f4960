/**
 * Consolidated Background Lookup Tool
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

const ACTIONS = ['find', 'list', 'list_by_feat', 'list_skills', 'list_feats'] as const;
type BackgroundAction = typeof ACTIONS[number];

const FindSchema = z.object({ action: z.literal('find'), name: z.string().min(1) });

const ListSchema = z.object({
    action: z.literal('list'),
    ability: z.string().optional(),
    skill: z.string().optional()
});

const ListByFeatSchema = z.object({ action: z.literal('list_by_feat'), feat: z.string().min(1) });
const ListSkillsSchema = z.object({ action: z.literal('list_skills') });
const ListFeatsSchema = z.object({ action: z.literal('list_feats') });

export function createBackgroundLookupTool(services: ToolServices): ConsolidatedTool {
    const { backgrounds } = services;

    const definitions: Record<BackgroundAction, ActionDefinition<SessionContext>> = {
        find: defineAction({
            schema: FindSchema,
            handler: args => backgrounds.findByName(args.name),
            render: background => RichFormatter.background(background),
            aliases: ['get', 'search', 'lookup'],
            description: 'Find one background by (approximate) name'
        }),
        list: defineAction({
            schema: ListSchema,
            handler: ({ action: _action, ...filters }) => backgrounds.list(filters),
            render: matches => RichFormatter.header(`${matches.length} background(s)`, '📜') +
                RichFormatter.backgroundTable(matches),
            aliases: ['filter', 'all'],
            description: 'List backgrounds, filtered by ability or skill'
        }),
        list_by_feat: defineAction({
            schema: ListByFeatSchema,
            handler: args => backgrounds.listByFeat(args.feat),
            render: (matches, args) => RichFormatter.header(`Backgrounds with ${args.feat}`, '📜') +
                RichFormatter.backgroundTable(matches),
            aliases: ['by_feat', 'feat'],
            description: 'Backgrounds whose origin feat contains the text'
        }),
        list_skills: defineAction({
            schema: ListSkillsSchema,
            handler: () => backgrounds.listAllSkills(),
            render: skills => RichFormatter.section('Skills') + RichFormatter.list(skills),
            aliases: ['skills'],
            description: 'Every skill a background grants'
        }),
        list_feats: defineAction({
            schema: ListFeatsSchema,
            handler: () => backgrounds.listAllFeats(),
            render: feats => RichFormatter.section('Origin Feats') + RichFormatter.list(feats),
            aliases: ['feats'],
            description: 'Every origin feat a background grants'
        })
    };

    return {
        name: 'background_lookup',
        description: `Look up backgrounds, their origin feats and skills.

${buildActionDescription(ACTIONS, definitions)}`,
        inputShape: {
            action: z.string().describe(`Action: ${ACTIONS.join(', ')}`),
            name: z.string().optional(),
            ability: z.string().optional(),
            skill: z.string().optional(),
            feat: z.string().optional()
        },
        handler: createActionRouter({ tag: 'BACKGROUND_LOOKUP', actions: ACTIONS, definitions })
    };
}

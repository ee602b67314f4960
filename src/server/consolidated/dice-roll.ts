/**
 * Consolidated Dice Tool
 *
 * Ad-hoc rolls and the 4d6-drop-lowest method for ability scores.
 */

import { z } from 'zod';
import {
    buildActionDescription,
    createActionRouter,
    defineAction,
    type ActionDefinition
} from '../../utils/action-router.js';
import { success } from '../../utils/tool-result.js';
import type { ToolServices } from '../services.js';
import type { ConsolidatedTool, SessionContext } from '../types.js';
import { RichFormatter } from '../utils/formatter.js';

const ACTIONS = ['roll', 'ability_scores'] as const;
type DiceAction = typeof ACTIONS[number];

const RollSchema = z.object({ action: z.literal('roll'), notation: z.string().min(1) });
const AbilityScoresSchema = z.object({ action: z.literal('ability_scores') });

export function createDiceRollTool(services: ToolServices): ConsolidatedTool {
    const { dice } = services;

    const definitions: Record<DiceAction, ActionDefinition<SessionContext>> = {
        roll: defineAction({
            schema: RollSchema,
            handler: args => dice.roll(args.notation),
            render: roll => RichFormatter.header(`Roll ${roll.notation}`, '🎲') + RichFormatter.keyValue({
                'Rolls': roll.rolls.join(', '),
                'Modifier': roll.modifier === 0 ? null : RichFormatter.signed(roll.modifier),
                'Total': roll.total
            }),
            aliases: ['dice', 'r'],
            description: 'Roll dice in standard notation (2d6+3, d20, 3d8-2)'
        }),
        ability_scores: defineAction({
            schema: AbilityScoresSchema,
            handler: () => success(dice.rollAbilityScores()),
            render: scores => RichFormatter.header('Ability Score Rolls', '🎲') + RichFormatter.table(
                ['#', 'Rolls', 'Dropped', 'Total'],
                scores.map((score, i) => [i + 1, score.rolls.join(', '), score.dropped, score.total])
            ),
            aliases: ['stats', 'roll_stats', '4d6'],
            description: 'Roll six ability scores, 4d6 dropping the lowest'
        })
    };

    return {
        name: 'dice_roll',
        description: `Roll dice.

Use ability_scores when the player wants rolled rather than assigned scores,
then pass the totals to character_sheet_manage set_ability_scores.

${buildActionDescription(ACTIONS, definitions)}`,
        inputShape: {
            action: z.string().describe(`Action: ${ACTIONS.join(', ')}`),
            notation: z.string().optional()
        },
        handler: createActionRouter({ tag: 'DICE_ROLL', actions: ACTIONS, definitions })
    };
}

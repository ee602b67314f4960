/**
 * Tests for the consolidated dice_roll tool
 */

import { createDiceRollTool } from '../../../src/server/consolidated/dice-roll.js';
import { createTestServices, parseResult } from '../../fixtures/tools.js';

describe('dice_roll consolidated tool', () => {
    const tool = createDiceRollTool(createTestServices());
    const ctx = { sessionId: 'test-session' };
    const run = (args: Record<string, unknown>) => tool.handler(args, ctx);

    it('should have correct tool name', () => {
        expect(tool.name).toBe('dice_roll');
    });

    it('should roll and render the dice', async () => {
        const response = await run({ action: 'roll', notation: '2d6+3' });

        expect(response.content[0].text).toContain('- **Rolls:** 4, 4\n- **Modifier:** +3\n- **Total:** 11\n');
        expect(parseResult(response)).toEqual({
            status: 'success',
            result: { notation: '2d6+3', count: 2, sides: 6, modifier: 3, rolls: [4, 4], total: 11 }
        });
    });

    it('should return a failure for bad notation', async () => {
        expect(parseResult(await run({ action: 'roll', notation: 'xyz' }))).toEqual({
            status: 'failure',
            message: "Invalid dice notation 'xyz'. Use format like '2d6+3', 'd20', or '3d8-2'."
        });
    });

    it('should require notation', async () => {
        expect(parseResult(await run({ action: 'roll' }))).toMatchObject({ error: 'validation_error', action: 'roll' });
    });

    it('should roll six ability scores', async () => {
        const response = await run({ action: 'ability_scores' });

        expect(response.content[0].text).toContain('| 1 | 4, 4, 4, 4 | 4 | 12 |');
        expect(parseResult(response)).toEqual({
            status: 'success',
            result: Array.from({ length: 6 }, () => ({ rolls: [4, 4, 4, 4], dropped: 4, total: 12 }))
        });
    });
});

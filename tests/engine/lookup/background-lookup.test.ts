import { ReferenceData } from '../../../src/engine/reference/reference-data.js';
import { BackgroundLookup } from '../../../src/engine/lookup/background-lookup.js';
import type { ToolResult } from '../../../src/utils/tool-result.js';

function names(outcome: ToolResult<Array<{ name: string }>>): string[] {
    if (outcome.status === 'failure') throw new Error(outcome.message);
    return outcome.result.map(record => record.name);
}

describe('BackgroundLookup', () => {
    const backgrounds = new BackgroundLookup(ReferenceData.load());

    it('should find backgrounds by approximate name', () => {
        const outcome = backgrounds.findByName('acolyt');
        expect(outcome.status === 'success' && outcome.result.originFeat).toBe('Magic Initiate (Cleric)');
    });

    describe('list', () => {
        it('should filter by ability label', () => {
            expect(names(backgrounds.list({ ability: 'intelligence' }))).toEqual([
                'Acolyte', 'Artisan', 'Criminal', 'Guard', 'Merchant', 'Noble', 'Sage', 'Scribe'
            ]);
        });

        it('should match skills case-insensitively', () => {
            expect(names(backgrounds.list({ skill: 'perception' }))).toEqual(['Guard', 'Sailor', 'Scribe']);
        });

        it('should AND the filters', () => {
            expect(names(backgrounds.list({ ability: 'Intelligence', skill: 'History' }))).toEqual(['Noble', 'Sage']);
        });

        it('should reject an unknown ability', () => {
            expect(backgrounds.list({ ability: 'luck' })).toEqual({
                status: 'failure',
                message: "Invalid ability 'luck'. Must be one of: strength, dexterity, constitution, intelligence, wisdom, charisma"
            });
        });
    });

    describe('listByFeat', () => {
        it('should match a substring of the feat', () => {
            expect(names(backgrounds.listByFeat('magic initiate'))).toEqual(['Acolyte', 'Guide', 'Sage']);
            expect(names(backgrounds.listByFeat('Alert'))).toEqual(['Criminal', 'Guard']);
        });

        it('should fail when no feat matches', () => {
            expect(backgrounds.listByFeat('Flying')).toEqual({
                status: 'failure',
                message: "No backgrounds found with feat matching 'Flying'"
            });
        });
    });

    it('should list skills and feats sorted', () => {
        const skills = backgrounds.listAllSkills();
        if (skills.status === 'failure') throw new Error(skills.message);
        expect(skills.result).toHaveLength(18);
        expect(skills.result.slice(0, 3)).toEqual(['Acrobatics', 'Animal Handling', 'Arcana']);

        expect(backgrounds.listAllFeats()).toEqual({
            status: 'success',
            result: [
                'Alert', 'Crafter', 'Healer', 'Lucky', 'Magic Initiate (Cleric)', 'Magic Initiate (Druid)',
                'Magic Initiate (Wizard)', 'Musician', 'Savage Attacker', 'Skilled', 'Tavern Brawler', 'Tough'
            ]
        });
    });
});

import { CharacterSheetSchema, SpellSlotsSchema, createEmptySheet } from '../../src/schema/character-sheet.js';

describe('CharacterSheetSchema', () => {
    it('should build the empty sheet from defaults', () => {
        const sheet = createEmptySheet();

        expect(sheet.name).toBeNull();
        expect(sheet.race).toBeNull();
        expect(sheet.speed).toBe(30);
        expect(sheet.level).toBe(1);
        expect(sheet.proficiencyBonus).toBe(2);
        expect(sheet.languages).toEqual(['Common']);
        expect(sheet.completedSteps).toEqual([]);
        expect(sheet.abilityScores).toEqual({
            strength: 10, dexterity: 10, constitution: 10, intelligence: 10, wisdom: 10, charisma: 10
        });
        expect(sheet.spellSlots).toEqual({});
    });

    it('should not share default arrays between sheets', () => {
        const first = createEmptySheet();
        first.spellbook.push('Shield');
        expect(createEmptySheet().spellbook).toEqual([]);
    });

    it('should fill missing ability scores', () => {
        const sheet = CharacterSheetSchema.parse({ abilityScores: { intelligence: 16 } });
        expect(sheet.abilityScores.intelligence).toBe(16);
        expect(sheet.abilityScores.strength).toBe(10);
    });

    it('should only accept the Wizard class', () => {
        expect(CharacterSheetSchema.safeParse({ characterClass: 'Fighter' }).success).toBe(false);
        expect(CharacterSheetSchema.parse({ characterClass: 'Wizard' }).characterClass).toBe('Wizard');
    });
});

describe('SpellSlotsSchema', () => {
    it('should turn string keys from JSON into spell levels', () => {
        const slots = SpellSlotsSchema.parse(JSON.parse('{"1":2}'));
        expect(slots).toEqual({ 1: 2 });
        expect(Object.keys(slots)).toEqual(['1']);
    });

    it('should reject levels outside 1-9', () => {
        expect(SpellSlotsSchema.safeParse({ 0: 1 }).success).toBe(false);
        expect(SpellSlotsSchema.safeParse({ 10: 1 }).success).toBe(false);
    });
});

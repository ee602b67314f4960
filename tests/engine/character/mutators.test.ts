import { createEmptySheet, type CharacterSheet } from '../../../src/schema/character-sheet.js';
import type { Spell } from '../../../src/schema/spell.js';
import {
    addCantrip,
    addSpellbookSpell,
    applyDerivedStats,
    configureSpellcasting,
    prepareSpell,
    removeCantrip,
    removeSpellbookSpell,
    setAbilityScores,
    setBackground,
    setClassWizard,
    setName,
    setRace,
    unprepareSpell,
    type SheetMutation
} from '../../../src/engine/character/mutators.js';
import { fixtureReferenceData } from '../../fixtures/reference.js';

const reference = fixtureReferenceData();

function spell(name: string): Spell {
    const found = reference.spells.get(name);
    if (!found) throw new Error(`fixture has no spell ${name}`);
    return found;
}

function applied(outcome: SheetMutation): CharacterSheet {
    if (outcome.status === 'failure') throw new Error(outcome.message);
    return outcome.result;
}

const SCORES = { strength: 8, dexterity: 14, constitution: 13, intelligence: 15, wisdom: 12, charisma: 10 };

function wizardSheet(): CharacterSheet {
    const scored = applied(setAbilityScores(createEmptySheet(), SCORES));
    return applied(setClassWizard(scored, ['Arcana', 'History']));
}

describe('sheet mutators', () => {
    describe('setName', () => {
        it('should trim and set the name', () => {
            const outcome = setName(createEmptySheet(), '  Elara ');
            expect(outcome.status === 'success' && outcome.message).toBe("Character name set to 'Elara'");
            expect(applied(outcome).name).toBe('Elara');
        });

        it('should reject a blank name', () => {
            expect(setName(createEmptySheet(), '   ')).toEqual({ status: 'failure', message: 'Character name cannot be empty' });
        });
    });

    describe('setRace', () => {
        const elf = { race: 'Elf', size: 'medium' as const, speed: 30, darkvision: 60, traits: ['Trance'] };

        it('should copy the race fields', () => {
            const outcome = setRace(createEmptySheet(), elf);
            const sheet = applied(outcome);

            expect(outcome.status === 'success' && outcome.message).toBe("Race set to 'Elf' (medium, 30ft speed)");
            expect(sheet).toMatchObject({ race: 'Elf', size: 'medium', speed: 30, darkvision: 60, racialTraits: ['Trance'] });
        });

        it('should reject a negative speed', () => {
            expect(setRace(createEmptySheet(), { ...elf, speed: -5 })).toEqual({
                status: 'failure',
                message: 'Speed must be a non-negative whole number of feet, got -5'
            });
        });
    });

    describe('setAbilityScores', () => {
        it('should replace the base scores', () => {
            const outcome = setAbilityScores(createEmptySheet(), SCORES);
            expect(outcome.status === 'success' && outcome.message)
                .toBe('Ability scores set: STR 8, DEX 14, CON 13, INT 15, WIS 12, CHA 10');
            expect(applied(outcome).abilityScores).toEqual(SCORES);
        });

        it('should reject the first score out of range', () => {
            expect(setAbilityScores(createEmptySheet(), { ...SCORES, strength: 31, wisdom: 0 })).toEqual({
                status: 'failure',
                message: 'Strength score 31 is out of range (1-30)'
            });
        });
    });

    describe('setClassWizard', () => {
        it('should apply the wizard class features', () => {
            const outcome = setClassWizard(applied(setAbilityScores(createEmptySheet(), SCORES)), ['Arcana', 'History']);
            const sheet = applied(outcome);

            expect(outcome.status === 'success' && outcome.message).toBe('Class set to Wizard. HP: 7, Skills: Arcana, History');
            expect(sheet).toMatchObject({
                characterClass: 'Wizard',
                hitDie: 'd6',
                maxHp: 7,
                savingThrowProficiencies: ['Intelligence', 'Wisdom'],
                weaponProficiencies: ['Daggers', 'Darts', 'Slings', 'Quarterstaffs', 'Light crossbows'],
                armorProficiencies: []
            });
        });

        it('should merge skills without duplicates', () => {
            const sheet = { ...createEmptySheet(), skillProficiencies: ['History', 'Stealth'] };
            expect(applied(setClassWizard(sheet, ['Arcana', 'History'])).skillProficiencies)
                .toEqual(['History', 'Stealth', 'Arcana']);
        });

        it('should check skill legality before the count', () => {
            expect(setClassWizard(createEmptySheet(), ['Stealth'])).toEqual({
                status: 'failure',
                message: "'Stealth' is not a valid wizard skill. Choose from: Arcana, History, Insight, Investigation, Medicine, Religion"
            });
        });

        it('should require exactly two skills', () => {
            const expected = { status: 'failure', message: 'Wizard must choose exactly 2 skill proficiencies' };
            expect(setClassWizard(createEmptySheet(), ['Arcana'])).toEqual(expected);
            expect(setClassWizard(createEmptySheet(), ['Arcana', 'History', 'Insight'])).toEqual(expected);
            expect(setClassWizard(createEmptySheet(), ['Arcana', 'Arcana', 'Arcana'])).toEqual(expected);
        });

        it('should name a skill chosen twice', () => {
            expect(setClassWizard(createEmptySheet(), ['Arcana', 'Arcana'])).toEqual({
                status: 'failure',
                message: "Skill 'Arcana' was chosen more than once; pick 2 different skills"
            });
        });

        it('should keep HP at least 1', () => {
            const frail = applied(setAbilityScores(createEmptySheet(), { ...SCORES, constitution: 1 }));
            expect(applied(setClassWizard(frail, ['Arcana', 'Insight'])).maxHp).toBe(1);
        });
    });

    describe('setBackground', () => {
        const sage = {
            background: 'Sage',
            skillProficiencies: ['Arcana', 'History'],
            toolProficiency: "Calligrapher's Supplies",
            originFeat: 'Magic Initiate (Wizard)',
            abilityBonuses: { Intelligence: 2, wisdom: 1 }
        };

        it('should normalise bonus keys and merge proficiencies', () => {
            const outcome = setBackground(wizardSheet(), sage);
            const sheet = applied(outcome);

            expect(outcome.status === 'success' && outcome.message).toBe("Background set to 'Sage' with feat 'Magic Initiate (Wizard)'");
            expect(sheet.backgroundAbilityBonuses).toEqual({ intelligence: 2, wisdom: 1 });
            expect(sheet.skillProficiencies).toEqual(['Arcana', 'History']);
            expect(sheet.toolProficiencies).toEqual(["Calligrapher's Supplies"]);
            expect(sheet.originFeat).toBe('Magic Initiate (Wizard)');
        });

        it('should sum bonuses that name the same ability', () => {
            const sheet = applied(setBackground(createEmptySheet(), { ...sage, abilityBonuses: { Intelligence: 1, intelligence: 1 } }));
            expect(sheet.backgroundAbilityBonuses).toEqual({ intelligence: 2 });
        });

        it('should skip an empty tool', () => {
            expect(applied(setBackground(createEmptySheet(), { ...sage, toolProficiency: ' ' })).toolProficiencies).toEqual([]);
        });

        it('should reject an unknown ability key', () => {
            expect(setBackground(createEmptySheet(), { ...sage, abilityBonuses: { Luck: 1 } })).toEqual({
                status: 'failure',
                message: "'Luck' is not an ability. Choose from: Strength, Dexterity, Constitution, Intelligence, Wisdom, Charisma"
            });
        });
    });

    describe('configureSpellcasting', () => {
        it('should require the wizard class', () => {
            expect(configureSpellcasting(createEmptySheet())).toEqual({
                status: 'failure',
                message: 'Character must be a Wizard to configure spellcasting'
            });
        });

        it('should derive DC, attack and prepared limit from total INT', () => {
            const withBonus = { ...wizardSheet(), backgroundAbilityBonuses: { intelligence: 2 } };
            const outcome = configureSpellcasting(withBonus);
            const sheet = applied(outcome);

            expect(outcome.status === 'success' && outcome.message).toBe('Spellcasting configured: DC 13, Attack +5, Max prepared: 4');
            expect(sheet).toMatchObject({
                spellcastingAbility: 'Intelligence',
                spellSlots: { 1: 2 },
                spellSaveDc: 13,
                spellAttackBonus: 5,
                maxPreparedSpells: 4
            });
        });

        it('should prepare at least one spell', () => {
            const dim = { ...wizardSheet(), abilityScores: { ...SCORES, intelligence: 6 } };
            expect(applied(configureSpellcasting(dim)).maxPreparedSpells).toBe(1);
        });
    });

    describe('addCantrip', () => {
        it('should append cantrips with a running count', () => {
            const outcome = addCantrip(createEmptySheet(), spell('Fire Bolt'));
            expect(outcome.status === 'success' && outcome.message).toBe("Added cantrip 'Fire Bolt' (1/3)");
            expect(applied(outcome).cantripsKnown).toEqual(['Fire Bolt']);
        });

        it('should check level, class, cap and duplicates in that order', () => {
            const full = { ...createEmptySheet(), cantripsKnown: ['Fire Bolt', 'Light', 'Mage Hand'] };

            expect(addCantrip(full, spell('Magic Missile')))
                .toEqual({ status: 'failure', message: "'Magic Missile' is not a cantrip (level 1)" });
            expect(addCantrip(full, spell('Sacred Flame'))).toEqual({ status: 'failure', message: "'Sacred Flame' is not a wizard spell" });
            expect(addCantrip(full, spell('Fire Bolt'))).toEqual({ status: 'failure', message: 'Cannot add more than 3 cantrips at level 1' });
            expect(addCantrip({ ...full, cantripsKnown: ['Fire Bolt'] }, spell('Fire Bolt')))
                .toEqual({ status: 'failure', message: "'Fire Bolt' is already known" });
        });
    });

    describe('addSpellbookSpell', () => {
        it('should append level-1 wizard spells', () => {
            const outcome = addSpellbookSpell(createEmptySheet(), spell('Shield'));
            expect(outcome.status === 'success' && outcome.message).toBe("Added 'Shield' to spellbook (1/6)");
        });

        it('should reject other levels, other classes, a full book and duplicates', () => {
            const full = {
                ...createEmptySheet(),
                spellbook: ['Magic Missile', 'Shield', 'Sleep', 'Detect Magic', 'Mage Armor', 'Find Familiar']
            };
            expect(addSpellbookSpell(full, spell('Fireball')))
                .toEqual({ status: 'failure', message: "'Fireball' is level 3, must be level 1" });
            expect(addSpellbookSpell(full, spell('Cure Wounds')))
                .toEqual({ status: 'failure', message: "'Cure Wounds' is not a wizard spell" });
            expect(addSpellbookSpell(full, spell('Burning Hands')))
                .toEqual({ status: 'failure', message: 'Cannot add more than 6 spells to spellbook at level 1' });
            expect(addSpellbookSpell({ ...full, spellbook: ['Shield'] }, spell('Shield')))
                .toEqual({ status: 'failure', message: "'Shield' is already in spellbook" });
        });
    });

    describe('prepareSpell', () => {
        const configured = { ...createEmptySheet(), spellbook: ['Shield', 'Sleep'], maxPreparedSpells: 1 };

        it('should prepare spells from the spellbook', () => {
            const outcome = prepareSpell(configured, 'Shield');
            expect(outcome.status === 'success' && outcome.message).toBe("Prepared 'Shield' (1/1)");
        });

        it('should check membership, configuration, cap and duplicates in that order', () => {
            expect(prepareSpell(configured, 'Grease')).toEqual({ status: 'failure', message: "'Grease' is not in your spellbook" });
            expect(prepareSpell({ ...configured, maxPreparedSpells: null }, 'Shield'))
                .toEqual({ status: 'failure', message: 'Spellcasting has not been configured yet' });
            expect(prepareSpell({ ...configured, preparedSpells: ['Shield'] }, 'Sleep'))
                .toEqual({ status: 'failure', message: 'Cannot prepare more than 1 spells' });
            expect(prepareSpell({ ...configured, preparedSpells: ['Shield'], maxPreparedSpells: 2 }, 'Shield'))
                .toEqual({ status: 'failure', message: "'Shield' is already prepared" });
        });
    });

    describe('removals', () => {
        const sheet = {
            ...createEmptySheet(),
            cantripsKnown: ['Fire Bolt', 'Light'],
            spellbook: ['Shield', 'Sleep'],
            preparedSpells: ['Shield']
        };

        it('should remove cantrips ignoring case', () => {
            const outcome = removeCantrip(sheet, 'fire bolt');
            expect(outcome.status === 'success' && outcome.message).toBe("Removed cantrip 'Fire Bolt' (1/3)");
            expect(applied(outcome).cantripsKnown).toEqual(['Light']);
        });

        it('should unprepare a spell removed from the spellbook', () => {
            const outcome = removeSpellbookSpell(sheet, 'shield');
            expect(outcome.status === 'success' && outcome.message).toBe("Removed 'Shield' from spellbook and unprepared it (1/6)");
            expect(applied(outcome)).toMatchObject({ spellbook: ['Sleep'], preparedSpells: [] });
        });

        it('should unprepare without touching the spellbook', () => {
            const outcome = unprepareSpell(sheet, 'Shield');
            expect(outcome.status === 'success' && outcome.message).toBe("Unprepared 'Shield'");
            expect(applied(outcome)).toMatchObject({ spellbook: ['Shield', 'Sleep'], preparedSpells: [] });
        });

        it('should fail for names that are not present', () => {
            expect(removeCantrip(sheet, 'Mage Hand')).toEqual({ status: 'failure', message: "'Mage Hand' is not a known cantrip" });
            expect(removeSpellbookSpell(sheet, 'Grease')).toEqual({ status: 'failure', message: "'Grease' is not in your spellbook" });
            expect(unprepareSpell(sheet, 'Sleep')).toEqual({ status: 'failure', message: "'Sleep' is not prepared" });
        });
    });

    describe('applyDerivedStats', () => {
        it('should compute AC, initiative, passive perception and HP', () => {
            const outcome = applyDerivedStats(wizardSheet());
            expect(outcome.status === 'success' && outcome.message)
                .toBe('Derived stats computed: AC 12, Initiative +2, Passive Perception 11');
            expect(applied(outcome)).toMatchObject({ armorClass: 12, initiative: 2, passivePerception: 11, maxHp: 7 });
        });

        it('should be idempotent', () => {
            const once = applied(applyDerivedStats(wizardSheet()));
            expect(applied(applyDerivedStats(once))).toEqual(once);
        });
    });
});

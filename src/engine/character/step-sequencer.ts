/**
 * Step sequencer
 *
 * Derives the next creation phase from the sheet's current fields alone;
 * `completedSteps` is never consulted. The first unmet condition wins.
 *
 * A sheet whose six base scores are all exactly 10 reads as "scores not
 * set", even when the player chose them deliberately.
 */

import { ABILITIES, DEFAULT_ABILITY_SCORE } from '../../schema/ability.js';
import type { CharacterSheet } from '../../schema/character-sheet.js';
import type { NextStep, StepId } from '../../schema/step.js';
import { CANTRIPS_AT_LEVEL_1, SPELLBOOK_SPELLS_AT_LEVEL_1 } from './wizard-rules.js';

interface StepRule {
    step: Exclude<StepId, 'complete'>;
    stepName: string;
    reason: string;
    pending(sheet: CharacterSheet): boolean;
}

const STEP_RULES: readonly StepRule[] = [
    {
        step: 'race_agent',
        stepName: 'Name & Race Selection',
        reason: 'Character needs a name and race',
        pending: sheet => sheet.name === null || sheet.race === null
    },
    {
        step: 'ability_score_agent',
        stepName: 'Ability Scores',
        reason: "Ability scores haven't been set yet",
        pending: sheet => ABILITIES.every(ability => sheet.abilityScores[ability] === DEFAULT_ABILITY_SCORE)
    },
    {
        step: 'class_agent',
        stepName: 'Class Setup',
        reason: 'Need to set up the Wizard class and choose skills',
        pending: sheet => sheet.characterClass === null
    },
    {
        step: 'background_agent',
        stepName: 'Background Selection',
        reason: 'Need to choose a background',
        pending: sheet => sheet.background === null
    },
    {
        step: 'spellcasting_agent',
        stepName: 'Spellcasting Setup',
        reason: 'Need to configure spellcasting stats',
        pending: sheet => sheet.spellcastingAbility === null
    },
    {
        step: 'spellbook_agent',
        stepName: 'Spellbook Selection',
        reason: `Need to choose ${SPELLBOOK_SPELLS_AT_LEVEL_1} level-1 spells for the spellbook`,
        pending: sheet => sheet.spellbook.length < SPELLBOOK_SPELLS_AT_LEVEL_1
    },
    {
        step: 'cantrip_agent',
        stepName: 'Cantrip Selection',
        reason: `Need to choose ${CANTRIPS_AT_LEVEL_1} cantrips`,
        pending: sheet => sheet.cantripsKnown.length < CANTRIPS_AT_LEVEL_1
    },
    {
        step: 'prepared_spells_agent',
        stepName: 'Prepared Spells',
        reason: 'Need to choose which spells to prepare',
        pending: sheet => sheet.preparedSpells.length === 0
    },
    {
        step: 'derived_stats_agent',
        stepName: 'Final Stats Calculation',
        reason: 'Need to calculate derived stats (AC, initiative, etc.)',
        pending: sheet => sheet.armorClass === null
    }
];

const FINAL_STEP: NextStep = {
    nextStep: 'validation_agent',
    stepName: 'Final Validation & Summary',
    reason: 'All steps complete, ready for final validation'
};

export const COMPLETE_STEP: NextStep = {
    nextStep: 'complete',
    stepName: 'Complete',
    reason: 'Character sheet is complete and valid'
};

export function nextStep(sheet: CharacterSheet): NextStep {
    const rule = STEP_RULES.find(candidate => candidate.pending(sheet));
    if (!rule) return FINAL_STEP;
    return { nextStep: rule.step, stepName: rule.stepName, reason: rule.reason };
}

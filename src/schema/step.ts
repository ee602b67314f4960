import { z } from 'zod';

/** Creation phases in the order the sequencer walks them, then the terminal value. */
export const StepIdSchema = z.enum([
    'race_agent',
    'ability_score_agent',
    'class_agent',
    'background_agent',
    'spellcasting_agent',
    'spellbook_agent',
    'cantrip_agent',
    'prepared_spells_agent',
    'derived_stats_agent',
    'validation_agent',
    'complete'
]);

export type StepId = z.infer<typeof StepIdSchema>;

export interface NextStep {
    nextStep: StepId;
    stepName: string;
    reason: string;
}

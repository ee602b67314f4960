/**
 * Character Sheet Service
 *
 * Runs every sheet operation as one load -> mutate -> save cycle against
 * the session's stored document. Failures are returned before the save,
 * so the stored sheet only ever moves from one legal state to the next.
 */

import type { AbilityScores } from '../schema/ability.js';
import type { CharacterSheet } from '../schema/character-sheet.js';
import type { NextStep } from '../schema/step.js';
import type { SpellLookup } from '../engine/lookup/spell-lookup.js';
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
    type BackgroundChoice,
    type RaceChoice,
    type SheetMutation
} from '../engine/character/mutators.js';
import { computeDerivedStats, type DerivedStats } from '../engine/character/derived-stats.js';
import { COMPLETE_STEP, nextStep } from '../engine/character/step-sequencer.js';
import { validateSheet, type ValidationResult } from '../engine/character/validator.js';
import type { SheetRepository } from '../storage/repos/character-sheet.repo.js';
import { createLogger } from '../utils/logger.js';
import { andThen, success, type ToolResult } from '../utils/tool-result.js';

const log = createLogger('CharacterSheet');

export class CharacterSheetService {
    constructor(
        private readonly sheets: SheetRepository,
        private readonly spells: SpellLookup
    ) {}

    getSheet(sessionId: string): ToolResult<CharacterSheet> {
        return success(this.sheets.load(sessionId));
    }

    /**
     * The sequencer's next phase, or `complete` once the sheet has reached
     * validation and passes it.
     */
    nextStep(sessionId: string): ToolResult<NextStep> {
        const sheet = this.sheets.load(sessionId);
        const step = nextStep(sheet);
        if (step.nextStep === 'validation_agent' && validateSheet(sheet).status === 'success') {
            return success(COMPLETE_STEP);
        }
        return success(step);
    }

    setName(sessionId: string, name: string): ToolResult<string> {
        return this.apply(sessionId, 'set_name', sheet => setName(sheet, name));
    }

    setRace(sessionId: string, choice: RaceChoice): ToolResult<string> {
        return this.apply(sessionId, 'set_race', sheet => setRace(sheet, choice));
    }

    setAbilityScores(sessionId: string, scores: AbilityScores): ToolResult<string> {
        return this.apply(sessionId, 'set_ability_scores', sheet => setAbilityScores(sheet, scores));
    }

    setClassWizard(sessionId: string, skills: readonly string[]): ToolResult<string> {
        return this.apply(sessionId, 'set_class', sheet => setClassWizard(sheet, skills));
    }

    setBackground(sessionId: string, choice: BackgroundChoice): ToolResult<string> {
        return this.apply(sessionId, 'set_background', sheet => setBackground(sheet, choice));
    }

    configureSpellcasting(sessionId: string): ToolResult<string> {
        return this.apply(sessionId, 'configure_spellcasting', configureSpellcasting);
    }

    /** Name resolution failures come back verbatim from the spell lookup. */
    addCantrip(sessionId: string, spellName: string): ToolResult<string> {
        return this.apply(sessionId, 'add_cantrip', sheet =>
            andThen(this.spells.findByName(spellName), spell => addCantrip(sheet, spell)));
    }

    addSpellbookSpell(sessionId: string, spellName: string): ToolResult<string> {
        return this.apply(sessionId, 'add_spellbook_spell', sheet =>
            andThen(this.spells.findByName(spellName), spell => addSpellbookSpell(sheet, spell)));
    }

    prepareSpell(sessionId: string, spellName: string): ToolResult<string> {
        return this.apply(sessionId, 'prepare_spell', sheet => prepareSpell(sheet, spellName));
    }

    removeCantrip(sessionId: string, spellName: string): ToolResult<string> {
        return this.apply(sessionId, 'remove_cantrip', sheet => removeCantrip(sheet, spellName));
    }

    removeSpellbookSpell(sessionId: string, spellName: string): ToolResult<string> {
        return this.apply(sessionId, 'remove_spellbook_spell', sheet => removeSpellbookSpell(sheet, spellName));
    }

    unprepareSpell(sessionId: string, spellName: string): ToolResult<string> {
        return this.apply(sessionId, 'unprepare_spell', sheet => unprepareSpell(sheet, spellName));
    }

    computeDerivedStats(sessionId: string): ToolResult<DerivedStats> {
        const outcome = this.apply(sessionId, 'compute_derived_stats', applyDerivedStats);
        if (outcome.status === 'failure') return outcome;
        return success(computeDerivedStats(this.sheets.load(sessionId)), outcome.result);
    }

    validate(sessionId: string): ValidationResult {
        return validateSheet(this.sheets.load(sessionId));
    }

    reset(sessionId: string): ToolResult<string> {
        const removed = this.sheets.delete(sessionId);
        log.info(`Reset sheet for session ${sessionId}`);
        return success(removed ? 'Character sheet reset' : 'Character sheet was already empty');
    }

    private apply(
        sessionId: string,
        operation: string,
        mutate: (sheet: CharacterSheet) => SheetMutation
    ): ToolResult<string> {
        const outcome = mutate(this.sheets.load(sessionId));
        if (outcome.status === 'failure') {
            log.debug(`${operation} rejected for session ${sessionId}: ${outcome.message}`);
            return outcome;
        }

        const confirmation = outcome.message ?? `${operation} applied`;
        const updated: CharacterSheet = {
            ...outcome.result,
            completedSteps: outcome.result.completedSteps.includes(operation)
                ? outcome.result.completedSteps
                : [...outcome.result.completedSteps, operation]
        };
        this.sheets.save(sessionId, updated);
        log.debug(`${operation} applied for session ${sessionId}`);
        return success(confirmation);
    }
}

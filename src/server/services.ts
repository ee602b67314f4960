import type Database from 'better-sqlite3';
import { DiceRoller } from '../engine/dice/dice-roller.js';
import { BackgroundLookup } from '../engine/lookup/background-lookup.js';
import { RaceLookup } from '../engine/lookup/race-lookup.js';
import { SpellLookup } from '../engine/lookup/spell-lookup.js';
import type { ReferenceData } from '../engine/reference/reference-data.js';
import { CharacterSheetService } from '../services/character-sheet.service.js';
import { CharacterSheetRepository } from '../storage/repos/character-sheet.repo.js';

export interface ToolServices {
    reference: ReferenceData;
    spells: SpellLookup;
    races: RaceLookup;
    backgrounds: BackgroundLookup;
    sheets: CharacterSheetService;
    dice: DiceRoller;
}

export function createToolServices(
    db: Database.Database,
    reference: ReferenceData,
    dice: DiceRoller = new DiceRoller()
): ToolServices {
    const spells = new SpellLookup(reference);
    return {
        reference,
        spells,
        races: new RaceLookup(reference),
        backgrounds: new BackgroundLookup(reference),
        sheets: new CharacterSheetService(new CharacterSheetRepository(db), spells),
        dice
    };
}

import type { ToolServices } from '../services.js';
import type { ConsolidatedTool } from '../types.js';
import { createBackgroundLookupTool } from './background-lookup.js';
import { createCharacterSheetTool } from './character-sheet-manage.js';
import { createDiceRollTool } from './dice-roll.js';
import { createRaceLookupTool } from './race-lookup.js';
import { createSpellLookupTool } from './spell-lookup.js';

export { createBackgroundLookupTool, createCharacterSheetTool, createDiceRollTool, createRaceLookupTool, createSpellLookupTool };

export function createConsolidatedTools(services: ToolServices): ConsolidatedTool[] {
    return [
        createCharacterSheetTool(services),
        createSpellLookupTool(services),
        createRaceLookupTool(services),
        createBackgroundLookupTool(services),
        createDiceRollTool(services)
    ];
}

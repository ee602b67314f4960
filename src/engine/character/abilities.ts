import { ABILITIES, type Ability, type AbilityScores } from '../../schema/ability.js';
import type { CharacterSheet } from '../../schema/character-sheet.js';

/** floor((score - 10) / 2), so 7 gives -2. */
export function abilityModifier(score: number): number {
    return Math.floor((score - 10) / 2);
}

/** Base score plus any background bonus. */
export function totalAbilityScore(sheet: CharacterSheet, ability: Ability): number {
    return sheet.abilityScores[ability] + (sheet.backgroundAbilityBonuses[ability] ?? 0);
}

export function totalAbilityScores(sheet: CharacterSheet): AbilityScores {
    const totals = { ...sheet.abilityScores };
    for (const ability of ABILITIES) {
        totals[ability] = totalAbilityScore(sheet, ability);
    }
    return totals;
}

export function totalModifier(sheet: CharacterSheet, ability: Ability): number {
    return abilityModifier(totalAbilityScore(sheet, ability));
}

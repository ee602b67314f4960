import seedrandom from 'seedrandom';
import { failure, success, type ToolResult } from '../../utils/tool-result.js';

/** Uniform source in [0, 1), such as a seedrandom PRNG. */
export type RandomSource = () => number;

export interface DiceRoll {
    notation: string;
    count: number;
    sides: number;
    modifier: number;
    rolls: number[];
    total: number;
}

export interface AbilityScoreRoll {
    rolls: number[];
    dropped: number;
    total: number;
}

const NOTATION = /^(\d*)d(\d+)([+-]\d+)?$/;
const MAX_DICE = 100;

/**
 * Dice for ability-score generation and ad-hoc rolls.
 * Seeded rollers repeat the same sequence; unseeded ones draw entropy.
 */
export class DiceRoller {
    private readonly rng: RandomSource;

    constructor(source?: string | RandomSource) {
        if (typeof source === 'function') {
            this.rng = source;
        } else {
            this.rng = source === undefined ? seedrandom() : seedrandom(source);
        }
    }

    private rollDie(sides: number): number {
        return Math.floor(this.rng() * sides) + 1;
    }

    /**
     * Standard notation: "2d6+3", "d20", "3d8-2" (case and surrounding
     * whitespace ignored).
     */
    roll(notation: string): ToolResult<DiceRoll> {
        const normalized = notation.trim().toLowerCase();
        const match = NOTATION.exec(normalized);
        if (!match) {
            return failure(`Invalid dice notation '${notation}'. Use format like '2d6+3', 'd20', or '3d8-2'.`);
        }

        const count = match[1] ? parseInt(match[1], 10) : 1;
        const sides = parseInt(match[2], 10);
        const modifier = match[3] ? parseInt(match[3], 10) : 0;

        if (count < 1 || sides < 1) {
            return failure('Number of dice and die sides must be at least 1.');
        }
        if (count > MAX_DICE) {
            return failure(`Cannot roll more than ${MAX_DICE} dice at once.`);
        }

        const rolls = Array.from({ length: count }, () => this.rollDie(sides));
        const total = rolls.reduce((sum, value) => sum + value, 0) + modifier;
        return success({ notation: normalized, count, sides, modifier, rolls, total });
    }

    /** 4d6, drop the lowest die. */
    rollAbilityScore(): AbilityScoreRoll {
        const rolls = Array.from({ length: 4 }, () => this.rollDie(6));
        const dropped = Math.min(...rolls);
        const total = rolls.reduce((sum, value) => sum + value, 0) - dropped;
        return { rolls, dropped, total };
    }

    rollAbilityScores(): AbilityScoreRoll[] {
        return Array.from({ length: 6 }, () => this.rollAbilityScore());
    }
}

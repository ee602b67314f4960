/**
 * Fuzzy matching utilities
 *
 * Two matchers share the Levenshtein core:
 *
 * - `matchAction` resolves a tool's `action` argument in three tiers
 *   (exact, alias, edit distance) and returns a guiding error with
 *   suggestions when nothing is close enough.
 * - `resolveName` maps free-text names ("firebll", "elv") onto canonical
 *   reference-data names with a weighted ratio on a 0-100 scale.
 */

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface MatchResult<T extends string> {
    matched: T;
    exact: boolean;
    similarity: number;
}

export interface GuidingError {
    error: 'invalid_action' | 'validation_error';
    input: string;
    suggestions: Array<{ value: string; similarity: number }>;
    message: string;
}

export type MatchOutcome<T extends string> = MatchResult<T> | GuidingError;

export function isGuidingError(result: unknown): result is GuidingError {
    return (
        typeof result === 'object' &&
        result !== null &&
        'error' in result &&
        typeof result.error === 'string' &&
        'suggestions' in result &&
        Array.isArray(result.suggestions)
    );
}

// ═══════════════════════════════════════════════════════════════════════════
// LEVENSHTEIN DISTANCE
// ═══════════════════════════════════════════════════════════════════════════

export function levenshtein(a: string, b: string): number {
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

    for (let i = 1; i <= a.length; i++) {
        const current = [i];
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(
                previous[j] + 1,        // deletion
                current[j - 1] + 1,     // insertion
                previous[j - 1] + cost  // substitution
            );
        }
        previous = current;
    }

    return previous[b.length];
}

/**
 * Case-insensitive similarity in [0, 1]
 */
export function similarity(a: string, b: string): number {
    const maxLength = Math.max(a.length, b.length);
    if (maxLength === 0) return 1;
    return 1 - levenshtein(a.toLowerCase(), b.toLowerCase()) / maxLength;
}

/**
 * Lowercase, trim, and fold hyphens/spaces to underscores ("Set Race" -> "set_race")
 */
export function normalizeInput(input: string): string {
    return input
        .toLowerCase()
        .trim()
        .replace(/[-\s]+/g, '_');
}

// ═══════════════════════════════════════════════════════════════════════════
// THREE-TIER ACTION MATCHING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Match an input against a tool's actions
 *
 * @param aliases - map of alias -> canonical action
 * @param threshold - minimum similarity accepted by the edit-distance tier
 *
 * @example
 * const actions = ['add_cantrip', 'prepare_spell', 'validate'] as const;
 *
 * matchAction('add cantrip', actions);                  // exact after normalizing
 * matchAction('prepare', actions, { prepare: 'prepare_spell' }); // alias, 0.95
 * matchAction('validat', actions);                      // edit distance, 0.88
 * matchAction('xyz', actions);                          // GuidingError
 */
export function matchAction<T extends string>(
    input: string,
    validActions: readonly T[],
    aliases?: Record<string, T>,
    threshold: number = 0.6
): MatchOutcome<T> {
    const normalized = normalizeInput(input);

    // Tier 1: exact
    const exactMatch = validActions.find(action => action.toLowerCase() === normalized);
    if (exactMatch) {
        return { matched: exactMatch, exact: true, similarity: 1.0 };
    }

    // Tier 2: alias
    const aliasMatch = aliases?.[normalized];
    if (aliasMatch && validActions.includes(aliasMatch)) {
        return { matched: aliasMatch, exact: false, similarity: 0.95 };
    }

    // Tier 3: edit distance
    const scored = validActions
        .map(action => ({ action, similarity: similarity(normalized, action) }))
        .sort((a, b) => b.similarity - a.similarity);
    const best = scored[0];

    if (best && best.similarity >= threshold) {
        return { matched: best.action, exact: false, similarity: best.similarity };
    }

    const suggestions = scored.slice(0, 3).map(s => ({
        value: s.action,
        similarity: Math.round(s.similarity * 100)
    }));

    return {
        error: 'invalid_action',
        input,
        suggestions,
        message: `Unknown action "${input}". Did you mean: ${
            suggestions.map(s => `"${s.value}" (${s.similarity}%)`).join(', ')
        }?`
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// WEIGHTED NAME RATIO
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_NAME_CUTOFF = 65;

const TOKEN_SCALE = 0.95;
const PARTIAL_SCALE = 0.9;
const PARTIAL_LENGTH_RATIO = 1.5;

function tokens(value: string): string[] {
    return value.split(/\s+/).filter(token => token.length > 0);
}

/** Plain edit-distance ratio on a 0-100 scale. */
export function ratio(a: string, b: string): number {
    return similarity(a, b) * 100;
}

/** Ratio of the two strings with their words sorted alphabetically. */
export function tokenSortRatio(a: string, b: string): number {
    return ratio(tokens(a).sort().join(' '), tokens(b).sort().join(' '));
}

/**
 * Compares the shared words against each side's leftovers, so
 * "bolt fire" and "fire bolt of doom" agree on "bolt fire".
 * One side's words being a subset of the other's scores 100.
 */
export function tokenSetRatio(a: string, b: string): number {
    const left = new Set(tokens(a));
    const right = new Set(tokens(b));

    const shared = [...left].filter(token => right.has(token)).sort();
    const onlyLeft = [...left].filter(token => !right.has(token)).sort();
    const onlyRight = [...right].filter(token => !left.has(token)).sort();

    if (shared.length > 0 && (onlyLeft.length === 0 || onlyRight.length === 0)) {
        return 100;
    }

    const core = shared.join(' ');
    const combinedLeft = [core, ...onlyLeft].filter(part => part.length > 0).join(' ');
    const combinedRight = [core, ...onlyRight].filter(part => part.length > 0).join(' ');

    const scores = [ratio(combinedLeft, combinedRight)];
    if (core.length > 0) {
        scores.push(ratio(core, combinedLeft), ratio(core, combinedRight));
    }
    return Math.max(...scores);
}

/** Best ratio of the shorter string against every same-length window of the longer. */
export function partialRatio(a: string, b: string): number {
    const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
    if (shorter.length === 0) return 0;

    let best = 0;
    for (let start = 0; start + shorter.length <= longer.length; start++) {
        best = Math.max(best, ratio(shorter, longer.slice(start, start + shorter.length)));
        if (best === 100) break;
    }
    return best;
}

/**
 * Case-insensitive weighted ratio (0-100, rounded).
 *
 * Strings of similar length take the best of the plain ratio and the
 * token ratios scaled by 0.95. When one string is at least 1.5x the
 * other, the best-window ratio joins in at 0.9 and the token ratios drop
 * to 0.95 * 0.9.
 */
export function weightedRatio(query: string, choice: string): number {
    const a = query.trim().toLowerCase();
    const b = choice.trim().toLowerCase();
    if (a.length === 0 || b.length === 0) return 0;

    const base = ratio(a, b);
    const lengthRatio = Math.max(a.length, b.length) / Math.min(a.length, b.length);

    if (lengthRatio < PARTIAL_LENGTH_RATIO) {
        return Math.round(Math.max(
            base,
            tokenSortRatio(a, b) * TOKEN_SCALE,
            tokenSetRatio(a, b) * TOKEN_SCALE
        ));
    }

    const tokenScale = TOKEN_SCALE * PARTIAL_SCALE;
    return Math.round(Math.max(
        base,
        partialRatio(a, b) * PARTIAL_SCALE,
        tokenSortRatio(a, b) * tokenScale,
        tokenSetRatio(a, b) * tokenScale
    ));
}

/**
 * Resolve free text to the best-scoring candidate, or null below the cutoff.
 * Ties keep candidate order.
 */
export function resolveName(
    query: string,
    candidates: readonly string[],
    cutoff: number = DEFAULT_NAME_CUTOFF
): string | null {
    let best: { candidate: string; score: number } | null = null;

    for (const candidate of candidates) {
        const score = weightedRatio(query, candidate);
        if (score >= cutoff && (best === null || score > best.score)) {
            best = { candidate, score };
            if (score === 100) break;
        }
    }

    return best?.candidate ?? null;
}

import type { FrequencyView } from './frequency-table.js';
import type { Category, Token } from '../types/index.js';

/**
 * Uniform prior over the known categories, 0 when there are none.
 */
function uniformPrior(view: FrequencyView): number {
    const n = view.categories().length;
    return n > 0 ? 1 / n : 0;
}

/**
 * Rate of `token` within `category`.
 *
 * The denominator is the number of training events for the category, not
 * the number of tokens recorded for it.
 */
export function tokenProb(view: FrequencyView, token: Token, category: Category): number {
    const events = view.trainingCount(category);
    if (events === 0) return 0;
    return view.countInCategory(token, category) / events;
}

/**
 * Smoothed token probability: blends the token's overall weight under a
 * uniform prior with its category-specific rate, trusting the latter more
 * the more often the token was seen.
 */
export function weightedProb(view: FrequencyView, token: Token, category: Category): number {
    const totalSeen = view.totalSeen(token);
    const assumedProb = uniformPrior(view);
    const weight = view.totalWeight(token);

    return (weight * 1 * assumedProb + totalSeen * tokenProb(view, token, category)) / (1 + totalSeen);
}

/**
 * Naive-independence document likelihood. No tokens gives 1.
 */
export function textProb(view: FrequencyView, tokens: readonly Token[], category: Category): number {
    let prob = 1.0;
    for (const token of tokens) {
        prob *= weightedProb(view, token, category);
    }
    return prob;
}

export function score(view: FrequencyView, tokens: readonly Token[], category: Category): number {
    return textProb(view, tokens, category) * uniformPrior(view);
}

/**
 * Score every known category, in category order.
 */
export function scoreAll(view: FrequencyView, tokens: readonly Token[]): Map<Category, number> {
    const scores = new Map<Category, number>();
    for (const category of view.categories()) {
        scores.set(category, score(view, tokens, category));
    }
    return scores;
}

/**
 * Category with the strictly greatest positive score.
 *
 * Iterates in the map's order and only replaces the leader on a strictly
 * greater score, so on an exact tie the first category (the smallest label
 * for `scoreAll` output) wins.
 */
export function pickBest(scores: ReadonlyMap<Category, number>): { category: Category; score: number } | null {
    let best: { category: Category; score: number } | null = null;
    for (const [category, value] of scores) {
        if (value > (best?.score ?? 0)) {
            best = { category, score: value };
        }
    }
    return best;
}

/**
 * True when at least one token was seen in training under some category.
 */
export function hasEvidence(view: FrequencyView, tokens: readonly Token[]): boolean {
    return tokens.some((token) => view.totalSeen(token) > 0);
}

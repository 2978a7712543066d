/**
 * Scoring Engine
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Shared weighted-sum scorer for both decision units.
 *
 *   score(s) = Σ_k  w_k · clamp01(factor_k(s))
 *
 * Weights come from the active profile (bias-adjusted, normalized) and fall
 * back to the role defaults when no profile is active.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { AgentRole, Strike, WeightSignals } from '../types';
import { AGENT_CONFIG, DEFAULT_WEIGHTS } from './config';
import { DefensePrediction, FactorScores, ProfileProvider, TargetSelection, Weights } from './types';

export function clamp01(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.max(0, Math.min(1, value));
}

/**
 * Weighted sum of clamped factors; factors with no weight contribute 0.
 */
export function weightedScore(factors: FactorScores, weights: Readonly<Weights>): number {
    let score = 0;
    for (const [name, value] of Object.entries(factors)) {
        score += (weights[name] ?? 0) * clamp01(value);
    }
    return score;
}

/**
 * Highest-scoring strike. Ties go to the first strike in map order
 * (ascending when built from a sorted universe).
 */
export function selectBest(scores: ReadonlyMap<Strike, number>): TargetSelection | undefined {
    let bestStrike: Strike | undefined;
    let bestScore = -Infinity;
    for (const [strike, score] of scores) {
        if (bestStrike === undefined || score > bestScore) {
            bestStrike = strike;
            bestScore = score;
        }
    }
    if (bestStrike === undefined) return undefined;
    return { strike: bestStrike, confidence: Math.min(bestScore, 1) };
}

/**
 * Top-n strikes by score with probabilities normalized to sum to 1.
 * When the top scores sum to zero, the n strikes nearest spot get 1/n each.
 */
export function topDistribution(
    scores: ReadonlyMap<Strike, number>,
    spot: number,
    n: number = AGENT_CONFIG.DEFENDED_STRIKES
): DefensePrediction[] {
    const ranked = [...scores.entries()].sort((a, b) => b[1] - a[1]).slice(0, n);
    const total = ranked.reduce((sum, [, score]) => sum + score, 0);

    if (total > 0) {
        return ranked.map(([strike, score]) => [strike, score / total] as const);
    }

    const nearest = [...scores.keys()]
        .sort((a, b) => Math.abs(a - spot) - Math.abs(b - spot))
        .slice(0, n);
    return nearest.map((strike) => [strike, 1 / n] as const);
}

/**
 * Multiply one strike's score in place; absent strikes are left alone.
 */
export function boostStrike(scores: Map<Strike, number>, strike: Strike | undefined, factor: number): void {
    if (strike === undefined) return;
    const current = scores.get(strike);
    if (current !== undefined) {
        scores.set(strike, current * factor);
    }
}

export class ScoringEngine {
    constructor(
        public readonly role: AgentRole,
        private readonly profiles?: ProfileProvider
    ) {}

    /**
     * Active-profile weights for the signals, or the role defaults
     */
    resolveWeights(signals: WeightSignals): Weights {
        const weights = this.profiles?.weightsFor(this.role, signals) ?? {};
        if (Object.keys(weights).length === 0) {
            return { ...DEFAULT_WEIGHTS[this.role] };
        }
        return weights;
    }

    /**
     * Score every strike, preserving universe order
     */
    scoreStrikes(
        strikes: readonly Strike[],
        factorsFor: (strike: Strike) => FactorScores,
        weights: Readonly<Weights>
    ): Map<Strike, number> {
        const scores = new Map<Strike, number>();
        for (const strike of strikes) {
            scores.set(strike, weightedScore(factorsFor(strike), weights));
        }
        return scores;
    }
}

/**
 * Agent Decision - Profile Weights
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Profile behavior weights are boosted by biases when trait thresholds are
 * crossed, then renormalized to sum to 1.
 *
 * RETAIL:
 *   recent success rate > 0.5  →  spot_distance   *= 1 + overconfidence
 *   largest crowd > 3          →  crowd_following *= 1 + herd_mentality
 *
 * MONKEY:
 *   recent loss rate > 0.3     →  spot_distance     *= 1 + loss_aversion
 *   largest clustering > 0.5   →  retail_clustering *= 1 + recency
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { AgentProfile, AgentRole, WeightSignals } from '../types';
import { AGENT_CONFIG } from './config';
import { BiasBoost, Weights } from './types';

/**
 * Apply boosts to a copy of the weights. Boosts naming an absent weight
 * are ignored.
 */
export function applyBiasBoosts(weights: Readonly<Weights>, boosts: readonly BiasBoost[]): Weights {
    const adjusted: Weights = { ...weights };
    for (const boost of boosts) {
        if (boost.weight in adjusted) {
            adjusted[boost.weight] *= 1 + boost.bias;
        }
    }
    return adjusted;
}

/**
 * Scale weights to sum to 1. A zero total is returned unchanged.
 */
export function normalizeWeights(weights: Readonly<Weights>): Weights {
    const total = Object.values(weights).reduce((sum, w) => sum + w, 0);
    if (total === 0) return { ...weights };

    const normalized: Weights = {};
    for (const [key, value] of Object.entries(weights)) {
        normalized[key] = value / total;
    }
    return normalized;
}

/**
 * Boosts triggered by the current signals for a role
 */
export function profileBiasBoosts(
    profile: AgentProfile,
    role: AgentRole,
    signals: WeightSignals
): BiasBoost[] {
    const bias = (name: string) => profile.biases[name] ?? 0;
    const boosts: BiasBoost[] = [];

    if (role === 'retail') {
        if ((signals.recentSuccessRate ?? 0) > AGENT_CONFIG.OVERCONFIDENCE_SUCCESS_RATE) {
            boosts.push({ weight: 'spot_distance', bias: bias('overconfidence') });
        }
        if ((signals.crowdSize ?? 0) > AGENT_CONFIG.HERD_CROWD_SIZE) {
            boosts.push({ weight: 'crowd_following', bias: bias('herd_mentality') });
        }
    } else {
        if ((signals.recentLossRate ?? 0) > AGENT_CONFIG.LOSS_AVERSION_LOSS_RATE) {
            boosts.push({ weight: 'spot_distance', bias: bias('loss_aversion') });
        }
        if ((signals.retailClustering ?? 0) > AGENT_CONFIG.RECENCY_CLUSTERING) {
            boosts.push({ weight: 'retail_clustering', bias: bias('recency') });
        }
    }

    return boosts;
}

/**
 * Profile weights after bias boosts and renormalization
 */
export function adjustProfileWeights(
    profile: AgentProfile,
    role: AgentRole,
    signals: WeightSignals
): Weights {
    const boosted = applyBiasBoosts(profile.behaviorWeights, profileBiasBoosts(profile, role, signals));
    return normalizeWeights(boosted);
}

/**
 * Numeric trait value; booleans and absent traits fall back.
 */
export function numericTrait(profile: AgentProfile, name: string, fallback: number = 0): number {
    const value = profile.traits[name];
    return typeof value === 'number' ? value : fallback;
}

/**
 * Truthy trait value; numbers count when non-zero.
 */
export function flagTrait(profile: AgentProfile, name: string): boolean {
    const value = profile.traits[name];
    return typeof value === 'number' ? value !== 0 : value === true;
}

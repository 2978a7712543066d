/**
 * Derived per-strike metrics the engine attaches to each tick snapshot.
 */

import { Strike, StrikeMap } from '../types';
import { AGENT_CONFIG } from './config';

/**
 * Crowd size per strike: floor((hits + retailJuice * 10) / 2)
 */
export function deriveCrowdSizes(
    strikes: readonly Strike[],
    treeHits: StrikeMap,
    retailJuice: StrikeMap
): Map<Strike, number> {
    const crowd = new Map<Strike, number>();
    for (const strike of strikes) {
        const hits = treeHits.get(strike) ?? 0;
        const juice = retailJuice.get(strike) ?? 0;
        crowd.set(strike, Math.floor((hits + juice * AGENT_CONFIG.CROWD_JUICE_FACTOR) / 2));
    }
    return crowd;
}

/**
 * Retail clustering per strike: blend of hit share and retail-juice share,
 * floored at 0.01. All strikes sit at the floor until something lands.
 */
export function deriveRetailClustering(
    strikes: readonly Strike[],
    treeHits: StrikeMap,
    retailJuice: StrikeMap
): Map<Strike, number> {
    const clustering = new Map<Strike, number>();
    const totalHits = sumOver(strikes, treeHits);
    const totalJuice = sumOver(strikes, retailJuice);

    for (const strike of strikes) {
        if (totalHits > 0 || totalJuice > 0) {
            const hitsRatio = (treeHits.get(strike) ?? 0) / (totalHits + 1);
            const juiceRatio = (retailJuice.get(strike) ?? 0) / (totalJuice + 1);
            clustering.set(strike, Math.max(AGENT_CONFIG.MIN_CLUSTERING, (hitsRatio + juiceRatio) / 2));
        } else {
            clustering.set(strike, AGENT_CONFIG.MIN_CLUSTERING);
        }
    }
    return clustering;
}

/**
 * Fraction of `match` values in the last `window` entries; 0 when empty.
 */
export function recentRate(history: readonly boolean[], match: boolean, window: number = AGENT_CONFIG.RATE_WINDOW): number {
    const recent = history.slice(-window);
    if (recent.length === 0) return 0;
    return recent.filter((value) => value === match).length / recent.length;
}

/**
 * Strike with the largest value; the lowest strike wins ties.
 */
export function argmaxStrike(strikes: readonly Strike[], values: StrikeMap): Strike | undefined {
    let best: Strike | undefined;
    let bestValue = -Infinity;
    for (const strike of strikes) {
        const value = values.get(strike) ?? 0;
        if (value > bestValue) {
            best = strike;
            bestValue = value;
        }
    }
    return best;
}

/**
 * Largest value in a strike map, 0 when empty
 */
export function maxValue(values: StrikeMap): number {
    let max = 0;
    let seen = false;
    for (const value of values.values()) {
        if (!seen || value > max) {
            max = value;
            seen = true;
        }
    }
    return max;
}

function sumOver(strikes: readonly Strike[], values: StrikeMap): number {
    return strikes.reduce((sum, strike) => sum + (values.get(strike) ?? 0), 0);
}

/**
 * Strike Universe
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * The fixed, sorted set of target strikes for one engine instance, plus the
 * helpers built on it: snapping, gamma normalization, and tree layout.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { FLIGHT, SYNTHETIC_GAMMA } from '../config/constants';
import { Strike } from '../types';
import { ConfigurationError } from '../utils/errors';

export interface Point {
    x: number;
    y: number;
}

/**
 * Sorted, de-duplicated copy of finite strikes
 */
export function normalizeStrikes(strikes: readonly number[]): Strike[] {
    return [...new Set(strikes.filter((s) => Number.isFinite(s)))].sort((a, b) => a - b);
}

export class StrikeUniverse {
    readonly strikes: readonly Strike[];
    private readonly members: ReadonlySet<Strike>;

    constructor(strikes: readonly number[]) {
        const normalized = normalizeStrikes(strikes);
        if (normalized.length === 0) {
            throw new ConfigurationError('strike universe is empty', { received: strikes.length });
        }
        this.strikes = normalized;
        this.members = new Set(normalized);
    }

    get size(): number {
        return this.strikes.length;
    }

    has(strike: number): boolean {
        return this.members.has(strike);
    }

    /**
     * Nearest member by absolute distance; the lower strike wins ties.
     */
    snap(strike: number): Strike {
        if (this.members.has(strike)) return strike;

        let best = this.strikes[0];
        let bestDistance = Math.abs(best - strike);
        for (const candidate of this.strikes) {
            const distance = Math.abs(candidate - strike);
            if (distance < bestDistance) {
                best = candidate;
                bestDistance = distance;
            }
        }
        return best;
    }
}

/**
 * Gamma per strike in [0, 1]. A provider profile is normalized by its
 * maximum; when absent or non-positive, gamma is 0.9^|s - spot|.
 */
export function buildGammaMap(
    universe: StrikeUniverse,
    spot: number,
    profile: ReadonlyMap<Strike, number>
): Map<Strike, number> {
    const gamma = new Map<Strike, number>();
    const maxGamma = Math.max(0, ...profile.values());

    for (const strike of universe.strikes) {
        if (maxGamma > 0) {
            gamma.set(strike, Math.max(0, profile.get(strike) ?? 0) / maxGamma);
        } else {
            const distance = Math.abs(strike - spot);
            gamma.set(strike, SYNTHETIC_GAMMA.PEAK * Math.pow(SYNTHETIC_GAMMA.DECAY_PER_POINT, distance));
        }
    }
    return gamma;
}

export function hasUsableGamma(profile: ReadonlyMap<Strike, number>): boolean {
    return Math.max(0, ...profile.values()) > 0;
}

/**
 * Tree x positions along the baseline: 50 + i * min(30, (W - 100) / (n + 1))
 */
export function layoutTrees(universe: StrikeUniverse, width: number, height: number): {
    x: Map<Strike, number>;
    y: number;
} {
    const spacing = Math.min(
        FLIGHT.TREE_MAX_SPACING,
        (width - FLIGHT.TREE_MARGIN) / (universe.size + 1)
    );
    const x = new Map<Strike, number>();
    universe.strikes.forEach((strike, i) => {
        x.set(strike, FLIGHT.TREE_START_X + i * spacing);
    });
    return { x, y: height - FLIGHT.TREE_BASELINE_OFFSET };
}

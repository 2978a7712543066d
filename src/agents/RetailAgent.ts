/**
 * Retail Agent
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Chooses which strike to aim at. Factors per strike:
 *
 *   spot_distance    1 / (1 + |s - spot| / 5)
 *   success_history  1 if s was among the last 5 targets
 *   mm_defense       1 - mmJuice[s]
 *   crowd_following  min(1, crowd[s] / 5)
 *
 * FOMO: with an active profile, a roll below traits.fomo_threshold multiplies
 * the most crowded strike's score by 1.5.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Strike, TickSnapshot, WeightSignals } from '../types';
import logger from '../utils/logger';
import { AgentDecisionUnit, AgentDecisionUnitDeps } from './AgentDecisionUnit';
import { AGENT_CONFIG } from './config';
import { argmaxStrike, maxValue } from './metrics';
import { boostStrike, selectBest } from './ScoringEngine';
import { FactorScores, TargetSelection } from './types';
import { numericTrait } from './weights';

export class RetailAgent extends AgentDecisionUnit {
    constructor(deps: AgentDecisionUnitDeps) {
        super('retail', deps);
    }

    get recentSuccessRate(): number {
        return this.successRate();
    }

    selectTarget(snapshot: TickSnapshot): TargetSelection {
        const { strikes, spotPrice } = snapshot;
        if (strikes.length === 0) {
            return { strike: Math.round(spotPrice), confidence: AGENT_CONFIG.FALLBACK_CONFIDENCE };
        }

        const signals: WeightSignals = {
            recentSuccessRate: this.successRate(),
            crowdSize: maxValue(snapshot.crowdSize),
        };
        const weights = this.scoring.resolveWeights(signals);
        const recentTargets = this.recentStrikes(AGENT_CONFIG.RECENT_TARGET_WINDOW);

        const scores = this.scoring.scoreStrikes(
            strikes,
            (strike) => this.factors(strike, snapshot, recentTargets),
            weights
        );

        const profile = this.activeProfile;
        if (profile && this.random.next() < numericTrait(profile, 'fomo_threshold')) {
            const crowded = argmaxStrike(strikes, snapshot.crowdSize);
            boostStrike(scores, crowded, AGENT_CONFIG.FOMO_BOOST);
            logger.debug(`[RETAIL] FOMO boost on strike ${crowded}`);
        }

        const selection = selectBest(scores) ?? {
            strike: Math.round(spotPrice),
            confidence: AGENT_CONFIG.FALLBACK_CONFIDENCE,
        };
        this.recordStrike(selection.strike);
        return selection;
    }

    private factors(strike: Strike, snapshot: TickSnapshot, recentTargets: readonly Strike[]): FactorScores {
        const distance = Math.abs(strike - snapshot.spotPrice);
        return {
            spot_distance: 1 / (1 + distance / AGENT_CONFIG.DISTANCE_SCALE),
            success_history: recentTargets.includes(strike) ? 1 : 0,
            mm_defense: 1 - (snapshot.mmJuice.get(strike) ?? 0),
            crowd_following: Math.min(1, (snapshot.crowdSize.get(strike) ?? 0) / AGENT_CONFIG.CROWD_SCALE),
        };
    }
}

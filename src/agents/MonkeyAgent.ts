/**
 * Monkey (Market Maker) Agent
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Predicts which strikes to defend. Factors per strike:
 *
 *   spot_distance      1 / (1 + |s - spot| / 5)
 *   hit_history        min(1, hits[s] / 10)
 *   juice_collection   min(1, retailJuice[s])
 *   retail_clustering  clustering[s]
 *
 * Secondary modifiers (active profile only):
 *   loss rate > traits.risk_aversion  →  last 3 defended strikes × 1.2
 *   traits.reflexivity_awareness      →  most clustered strike × 1.3
 *
 * Output: top 3 strikes with normalized probabilities.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Strike, TickSnapshot, WeightSignals } from '../types';
import { AgentDecisionUnit, AgentDecisionUnitDeps } from './AgentDecisionUnit';
import { AGENT_CONFIG } from './config';
import { argmaxStrike, maxValue } from './metrics';
import { boostStrike, topDistribution } from './ScoringEngine';
import { DefensePrediction, FactorScores } from './types';
import { flagTrait, numericTrait } from './weights';

export class MonkeyAgent extends AgentDecisionUnit {
    constructor(deps: AgentDecisionUnitDeps) {
        super('monkey', deps);
    }

    get recentLossRate(): number {
        return this.failureRate();
    }

    predictDefended(snapshot: TickSnapshot): DefensePrediction[] {
        const { strikes, spotPrice } = snapshot;
        if (strikes.length === 0) return [];

        const lossRate = this.failureRate();
        const signals: WeightSignals = {
            recentLossRate: lossRate,
            retailClustering: maxValue(snapshot.retailClustering),
        };
        const weights = this.scoring.resolveWeights(signals);

        const scores = this.scoring.scoreStrikes(
            strikes,
            (strike) => this.factors(strike, snapshot),
            weights
        );

        const profile = this.activeProfile;
        if (profile) {
            if (lossRate > numericTrait(profile, 'risk_aversion')) {
                const recent = new Set(this.recentStrikes(AGENT_CONFIG.RECENT_DEFENSE_WINDOW));
                for (const strike of recent) {
                    boostStrike(scores, strike, AGENT_CONFIG.REPEAT_DEFENSE_BOOST);
                }
            }
            if (flagTrait(profile, 'reflexivity_awareness')) {
                boostStrike(scores, argmaxStrike(strikes, snapshot.retailClustering), AGENT_CONFIG.REFLEXIVITY_BOOST);
            }
        }

        const predictions = topDistribution(scores, spotPrice);
        if (predictions.length > 0) {
            this.recordStrike(predictions[0][0]);
        }
        return predictions;
    }

    private factors(strike: Strike, snapshot: TickSnapshot): FactorScores {
        const distance = Math.abs(strike - snapshot.spotPrice);
        return {
            spot_distance: 1 / (1 + distance / AGENT_CONFIG.DISTANCE_SCALE),
            hit_history: Math.min(1, (snapshot.treeHits.get(strike) ?? 0) / AGENT_CONFIG.HIT_SCALE),
            juice_collection: Math.min(1, snapshot.retailJuice.get(strike) ?? 0),
            retail_clustering: snapshot.retailClustering.get(strike) ?? 0,
        };
    }
}

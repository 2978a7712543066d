/**
 * Agent Decision Module
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Retail (attacker) and monkey (market maker) decision units built on
 * a shared weighted-sum ScoringEngine, each with its own memory.
 *
 * INTEGRATION:
 *   const retail = new RetailAgent({ memory, random, profiles });
 *   const { strike, confidence } = retail.selectTarget(snapshot);
 *
 *   const monkey = new MonkeyAgent({ memory, random, profiles });
 *   const defended = monkey.predictDefended(snapshot);
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type {
    BiasBoost,
    DefensePrediction,
    FactorScores,
    ProfileProvider,
    TargetSelection,
    Weights,
} from './types';

export { AGENT_CONFIG, DEFAULT_WEIGHTS } from './config';
export {
    adjustProfileWeights,
    applyBiasBoosts,
    flagTrait,
    normalizeWeights,
    numericTrait,
    profileBiasBoosts,
} from './weights';
export { argmaxStrike, deriveCrowdSizes, deriveRetailClustering, maxValue, recentRate } from './metrics';
export {
    boostStrike,
    clamp01,
    ScoringEngine,
    selectBest,
    topDistribution,
    weightedScore,
} from './ScoringEngine';
export { AgentDecisionUnit } from './AgentDecisionUnit';
export type { AgentDecisionUnitDeps } from './AgentDecisionUnit';
export { RetailAgent } from './RetailAgent';
export { MonkeyAgent } from './MonkeyAgent';

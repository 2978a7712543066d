/**
 * Simulation Engine Module
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Tick-driven coconut simulation over a fixed strike universe.
 *
 * INTEGRATION:
 *   const engine = new GameEngine({ market, catalog, profiles, targets, random });
 *   while (!engine.isFinished()) engine.update();
 *   const state = engine.getGameState();
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export { GameEngine } from './GameEngine';
export type { GameEngineOptions, LaunchRecord, TargetSource, TickResult } from './GameEngine';
export { Coconut, CoconutStatus } from './Coconut';
export type { CoconutLaunch, CoconutSource, CoconutView } from './Coconut';
export {
    HitProbabilityModel,
    baseHitChance,
    computeHitProbability,
    splitJuice,
} from './hitProbability';
export type { HitProbabilityInputs, JuiceSplit, ShotContext, ShotResolution } from './hitProbability';
export {
    StrikeUniverse,
    buildGammaMap,
    hasUsableGamma,
    layoutTrees,
    normalizeStrikes,
} from './strikes';
export type { Point } from './strikes';
export {
    findEquipment,
    loadEquipmentCatalog,
    parseEquipmentCatalog,
    validateCatalog,
} from './equipment';
export type { EquipmentCatalog } from './equipment';

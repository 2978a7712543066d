// Type Definitions for Gamma Jungle

// ═══════════════════════════════════════════════════════════════════════════════
// MARKET
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A discrete target price level. Integer in practice.
 */
export type Strike = number;

export type OptionType = 'call' | 'put';

/**
 * Market snapshot supplied by an external provider.
 * Immutable for the duration of a tick.
 */
export interface MarketState {
    price: number;
    impliedVol: number;
    strikes: readonly Strike[];
    gammaProfile: ReadonlyMap<Strike, number>;
}

/**
 * Fast-path target suggestion from the market side
 */
export interface SlingshotTarget {
    strike: Strike;
    attractiveness: number;
    optionType: OptionType;
    dte: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EQUIPMENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Slingshot configuration. One is "current" at any time.
 */
export interface Equipment {
    name: string;
    power: number;
    accuracy: number;
    dte: number;
    optionType: OptionType;
    color: readonly [number, number, number];
    size: number;
    strikeBias: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// AGENTS
// ═══════════════════════════════════════════════════════════════════════════════

export type AgentRole = 'retail' | 'monkey';

export const AGENT_ROLES: readonly AgentRole[] = ['retail', 'monkey'];

/**
 * Behavioral profile for one agent role
 */
export interface AgentProfile {
    name: string;
    goal: string;
    traits: Readonly<Record<string, number | boolean>>;
    strategies: readonly string[];
    biases: Readonly<Record<string, number>>;
    behaviorWeights: Readonly<Record<string, number>>;
}

/**
 * Per-role signals the weight adjustment reacts to
 */
export interface WeightSignals {
    /** Retail: hit rate over the last 5 launches */
    recentSuccessRate?: number;
    /** Retail: largest crowd size across strikes */
    crowdSize?: number;
    /** Monkey: loss rate over the last 5 defenses */
    recentLossRate?: number;
    /** Monkey: largest clustering value across strikes */
    retailClustering?: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// GAME STATE
// ═══════════════════════════════════════════════════════════════════════════════

export type StrikeMap = ReadonlyMap<Strike, number>;

/**
 * Read-only game state handed to UI / persistence collaborators.
 * Maps are copies; mutating them never affects the engine.
 */
export interface GameStateSnapshot {
    spotPrice: number;
    strikes: readonly Strike[];
    treeHits: StrikeMap;
    retailJuice: StrikeMap;
    mmJuice: StrikeMap;
    frame: number;
    currentEquipmentName: string;
    optionType: OptionType;
}

/**
 * Snapshot handed to the agents each tick, with derived metrics computed
 * by the engine.
 */
export interface TickSnapshot extends GameStateSnapshot {
    crowdSize: StrikeMap;
    retailClustering: StrikeMap;
}

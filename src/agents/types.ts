/**
 * Agent Decision - Type Definitions
 */

import { AgentProfile, AgentRole, Strike, WeightSignals } from '../types';

/**
 * Named factor weights, e.g. { spot_distance: 0.3, ... }
 */
export type Weights = Record<string, number>;

/**
 * Named factor scores for one strike, each in [0, 1]
 */
export type FactorScores = Record<string, number>;

/**
 * Supplies behavioral profiles per agent role.
 * Implementations own profile storage and hot-swapping.
 */
export interface ProfileProvider {
    getActiveProfile(role: AgentRole): AgentProfile | undefined;

    /** Bias-adjusted, normalized weights; empty when no profile is active */
    weightsFor(role: AgentRole, signals: WeightSignals): Weights;

    listProfiles(role: AgentRole): string[];

    switchProfile(role: AgentRole, name: string): boolean;
}

/**
 * Multiplicative boost of one weight entry: w *= (1 + bias)
 */
export interface BiasBoost {
    weight: string;
    bias: number;
}

export interface TargetSelection {
    strike: Strike;
    /** 0-1 */
    confidence: number;
}

/**
 * Ranked defense prediction: [strike, probability]
 */
export type DefensePrediction = readonly [Strike, number];

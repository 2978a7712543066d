/**
 * Shared test fixtures
 */

import { EquipmentCatalog } from '../src/engine/equipment';
import { AgentProfile, Equipment, MarketState, Strike, TickSnapshot } from '../src/types';
import { RandomSource } from '../src/utils/random';

/**
 * Always returns the same value
 */
export function constantRandom(value: number): RandomSource {
    return { next: () => value };
}

/**
 * Returns `values` in order, then `fallback` forever
 */
export function sequenceRandom(values: readonly number[], fallback: number = 0): RandomSource {
    let i = 0;
    return {
        next: () => (i < values.length ? values[i++] : fallback),
    };
}

export function createEquipment(partial: Partial<Equipment> = {}): Equipment {
    return {
        name: 'Test Sling',
        power: 1,
        accuracy: 0.5,
        dte: 30,
        optionType: 'call',
        color: [255, 255, 255],
        size: 8,
        strikeBias: 0,
        ...partial,
    };
}

export function createCatalog(...slingshots: Equipment[]): EquipmentCatalog {
    const list = slingshots.length > 0 ? slingshots : [createEquipment()];
    return { slingshots: list, defaultSlingshot: list[0].name };
}

export function createMarket(partial: Partial<MarketState> = {}): MarketState {
    return {
        price: 628,
        impliedVol: 0,
        strikes: [625, 630, 635],
        gammaProfile: new Map([[625, 1], [630, 1], [635, 1]]),
        ...partial,
    };
}

function zeros(strikes: readonly Strike[], value: number = 0): Map<Strike, number> {
    return new Map(strikes.map((s) => [s, value]));
}

export function createSnapshot(partial: Partial<TickSnapshot> = {}): TickSnapshot {
    const strikes = partial.strikes ?? [625, 630, 635];
    return {
        spotPrice: 628,
        strikes,
        treeHits: zeros(strikes),
        retailJuice: zeros(strikes),
        mmJuice: zeros(strikes),
        frame: 0,
        currentEquipmentName: 'Test Sling',
        optionType: 'call',
        crowdSize: zeros(strikes),
        retailClustering: zeros(strikes, 0.01),
        ...partial,
    };
}

export function createProfile(partial: Partial<AgentProfile> = {}): AgentProfile {
    return {
        name: 'Test Profile',
        goal: 'test',
        traits: {},
        strategies: [],
        biases: {},
        behaviorWeights: {},
        ...partial,
    };
}

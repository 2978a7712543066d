/**
 * Game Engine Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * End-to-end ticks over a three-strike universe with a scripted random
 * source, plus every control operation.
 *
 * With every draw at 0 and a power-50 slingshot the launch speed is 0.01,
 * so a coconut reaches t = 0.5 on its launch tick and arrives on the next.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { GameEngine, GameEngineOptions } from '../src/engine';
import { SlingshotTargetSource } from '../src/market';
import { ProfileRegistry } from '../src/profiles';
import { ConfigurationError } from '../src/utils/errors';
import { constantRandom, createCatalog, createEquipment, createMarket, createProfile } from './fixtures';

const POWER_SLING = createEquipment({ name: 'Power Sling', power: 50, accuracy: 1, dte: 30 });
const PUT_SLING = createEquipment({ name: 'Put Sling', optionType: 'put' });

function createEngine(partial: Partial<GameEngineOptions> = {}): GameEngine {
    return new GameEngine({
        market: createMarket(),
        catalog: createCatalog(POWER_SLING, PUT_SLING),
        random: constantRandom(0),
        trials: 1,
        ...partial,
    });
}

describe('GameEngine', () => {
    describe('end to end', () => {
        test('one trial launches, flies and folds into exactly one strike', () => {
            const engine = createEngine();

            const first = engine.update();
            expect(first.launched).not.toBeNull();
            expect(first.launched?.strike).toBe(630);
            expect(first.launched?.targetSource).toBe('agent');
            expect(first.launched?.defended).toBe(true);
            expect(first.launched?.defenseSuccess).toBe(false);
            expect(first.launched?.hit).toBe(true);
            expect(first.resolved).toEqual([]);

            let state = engine.getGameState();
            expect(state.frame).toBe(1);
            expect(engine.getLiveCoconuts()).toHaveLength(1);
            expect(engine.getLiveCoconuts()[0].t).toBe(0.5);
            expect([...state.treeHits.values()]).toEqual([0, 0, 0]);

            const second = engine.update();
            expect(second.launched).toBeNull();
            expect(second.resolved).toHaveLength(1);

            state = engine.getGameState();
            expect(state.frame).toBe(1);
            expect([...state.treeHits.entries()]).toEqual([[625, 0], [630, 1], [635, 0]]);
            expect(state.retailJuice.get(630)).toBe(0.3);
            expect(state.mmJuice.get(630)).toBe(0.7);
            expect(engine.getLiveCoconuts()).toEqual([]);
            expect(engine.isFinished()).toBe(true);
        });

        test('both agents remember the shot', () => {
            const engine = createEngine();
            engine.update();

            expect(engine.summarizeMemory('retail')).toBe(
                'Agent retail Insights:\n\nUseful Patterns:\n- Hit call strike 630 at spot 628'
            );
            expect(engine.summarizeMemory('monkey')).toBe(
                'Agent monkey Insights:\n\nUseful Patterns:\n- Failed to defend call strike 630'
            );
        });

        test('ticks past the trial cap launch nothing', () => {
            const engine = createEngine();
            engine.update();
            engine.update();

            const third = engine.update();
            expect(third).toEqual({ launched: null, resolved: [] });
            expect(engine.getGameState().frame).toBe(1);
        });
    });

    describe('targeting', () => {
        test('market fast-path targets win and are snapped', () => {
            const targets: SlingshotTargetSource = {
                getSlingshotTargets: () => [{ strike: 627, attractiveness: 1, optionType: 'call', dte: 30 }],
            };
            const launched = createEngine({ targets }).update().launched;

            expect(launched?.targetSource).toBe('market');
            expect(launched?.requestedStrike).toBe(627);
            expect(launched?.strike).toBe(625);
        });

        test('retail AI off picks a random strike', () => {
            const engine = createEngine();
            expect(engine.toggleAi('retail')).toBe(false);

            const launched = engine.update().launched;
            expect(launched?.targetSource).toBe('random');
            expect(launched?.sourceAgent).toBe('random');
            expect(launched?.strike).toBe(625);
        });

        test('monkey AI off skips the defense roll', () => {
            const engine = createEngine();
            engine.toggleAi('monkey');

            const launched = engine.update().launched;
            expect(launched?.defended).toBe(false);
            expect(engine.summarizeMemory('monkey')).toBe('No memories collected yet.');
        });
    });

    describe('controls', () => {
        test('pause freezes the simulation', () => {
            const engine = createEngine();
            expect(engine.togglePause()).toBe(true);
            expect(engine.update()).toEqual({ launched: null, resolved: [] });
            expect(engine.getGameState().frame).toBe(0);

            engine.togglePause();
            engine.update();
            expect(engine.getGameState().frame).toBe(1);
        });

        test('reset zeroes aggregates and drops live coconuts', () => {
            const engine = createEngine({ trials: 2 });
            engine.update();
            engine.update();
            expect(engine.getGameState().treeHits.get(630)).toBe(1);

            engine.reset();
            const state = engine.getGameState();
            expect(state.frame).toBe(0);
            expect([...state.treeHits.values()]).toEqual([0, 0, 0]);
            expect([...state.mmJuice.values()]).toEqual([0, 0, 0]);
            expect(engine.getLiveCoconuts()).toEqual([]);
        });

        test('switchEquipment accepts known names only', () => {
            const engine = createEngine();
            expect(engine.switchEquipment('Nope')).toBe(false);
            expect(engine.getGameState().currentEquipmentName).toBe('Power Sling');

            expect(engine.switchEquipment('Put Sling')).toBe(true);
            expect(engine.getGameState().currentEquipmentName).toBe('Put Sling');
            expect(engine.getGameState().optionType).toBe('put');
        });

        test('switchProfile selects by index', () => {
            const profiles = new ProfileRegistry();
            profiles.register('retail', 'retail_a.json', createProfile({ name: 'A' }));
            profiles.register('retail', 'retail_b.json', createProfile({ name: 'B' }));
            const engine = createEngine({ profiles });

            expect(engine.switchProfile('retail', 1)).toBe(true);
            expect(profiles.getActiveProfile('retail')?.name).toBe('B');
            expect(engine.switchProfile('retail', 2)).toBe(false);
            expect(engine.switchProfile('retail', -1)).toBe(false);
            expect(engine.switchProfile('monkey', 0)).toBe(false);
        });

        test('switchProfile without a provider is rejected', () => {
            expect(createEngine().switchProfile('retail', 0)).toBe(false);
        });
    });

    describe('market handoff', () => {
        test('a queued market state applies at the start of the next tick', () => {
            const engine = createEngine({ trials: 0 });
            engine.applyMarketState(createMarket({ price: 631, impliedVol: 10 }));
            expect(engine.getGameState().spotPrice).toBe(628);

            engine.update();
            expect(engine.getGameState().spotPrice).toBe(631);
        });

        test('the strike universe is kept', () => {
            const engine = createEngine({ trials: 0 });
            engine.applyMarketState(createMarket({ strikes: [700, 705] }));
            engine.update();
            expect(engine.getGameState().strikes).toEqual([625, 630, 635]);
        });

        test('non-finite prices are ignored', () => {
            const engine = createEngine({ trials: 0 });
            engine.applyMarketState(createMarket({ price: Number.NaN }));
            engine.update();
            expect(engine.getGameState().spotPrice).toBe(628);
        });
    });

    describe('construction', () => {
        test('empty strike universe', () => {
            expect(() => createEngine({ market: createMarket({ strikes: [] }) })).toThrow(ConfigurationError);
        });

        test('unknown default equipment', () => {
            const catalog = { slingshots: [POWER_SLING], defaultSlingshot: 'Missing' };
            expect(() => createEngine({ catalog })).toThrow(ConfigurationError);
        });

        test('provider gamma is normalized, missing gamma is synthesized', () => {
            expect([...createEngine().getGamma().values()]).toEqual([1, 1, 1]);

            const synthetic = createEngine({ market: createMarket({ gammaProfile: new Map() }) }).getGamma();
            expect(synthetic.get(625)).toBeCloseTo(Math.pow(0.9, 3), 10);
            expect(synthetic.get(630)).toBeCloseTo(Math.pow(0.9, 2), 10);
        });

        test('snapshots are copies', () => {
            const engine = createEngine();
            const a = engine.getGameState();
            const b = engine.getGameState();
            expect(a.treeHits).not.toBe(b.treeHits);
            expect(a.treeHits).toEqual(b.treeHits);
        });
    });
});

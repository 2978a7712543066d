/**
 * Episode Runner Tests
 */

import { GameEngine } from '../src/engine';
import { defaultMaxTicks, runEpisode } from '../src/runtime/episodeRunner';
import { constantRandom, createCatalog, createEquipment, createMarket } from './fixtures';

function createEngine(trials: number): GameEngine {
    return new GameEngine({
        market: createMarket(),
        catalog: createCatalog(createEquipment({ name: 'Power Sling', power: 50, accuracy: 1 })),
        random: constantRandom(0),
        trials,
    });
}

describe('runEpisode', () => {
    test('runs until every trial has launched and drained', async () => {
        const engine = createEngine(2);
        const ticks: number[] = [];

        const summary = await runEpisode(engine, { onTick: (tick) => ticks.push(tick) });

        expect(summary.finished).toBe(true);
        expect(summary.ticks).toBe(3);
        expect(summary.launched).toBe(2);
        expect(summary.totalHits).toBe(2);
        expect(summary.hottestStrike).toBe(630);
        expect(summary.totalRetailJuice).toBeCloseTo(0.6, 10);
        expect(summary.totalMmJuice).toBeCloseTo(1.4, 10);
        expect(summary.episodeId).toBe(engine.episodeId);
        expect(ticks).toEqual([1, 2, 3]);
    });

    test('maxTicks stops early', async () => {
        const summary = await runEpisode(createEngine(5), { maxTicks: 1 });

        expect(summary.finished).toBe(false);
        expect(summary.ticks).toBe(1);
        expect(summary.totalHits).toBe(0);
        expect(summary.hottestStrike).toBeUndefined();
    });

    test('yields between ticks without changing the outcome', async () => {
        const summary = await runEpisode(createEngine(2), { yieldEvery: 1 });
        expect(summary.ticks).toBe(3);
        expect(summary.memorySummaries.retail).toBe(
            'Agent retail Insights:\n\nUseful Patterns:\n' +
            '- Hit call strike 630 at spot 628\n' +
            '- Hit call strike 630 at spot 628'
        );
    });

    test('default tick limit covers every trial plus the slowest flight', () => {
        // 2 trials + 30 dte * 60 fps + 1
        expect(defaultMaxTicks(createEngine(2))).toBe(1803);
    });

    test('a paused engine stops at the default tick limit', async () => {
        const engine = new GameEngine({
            market: createMarket(),
            catalog: createCatalog(createEquipment({ dte: 30 })),
            random: constantRandom(0),
            trials: 1,
            fps: 1,
        });
        engine.togglePause();

        const summary = await runEpisode(engine, { yieldEvery: 1 });

        // 1 trial + 30 frames + 1
        expect(summary.ticks).toBe(32);
        expect(summary.launched).toBe(0);
        expect(summary.finished).toBe(false);
    });
});

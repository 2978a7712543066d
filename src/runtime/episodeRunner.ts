/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * EPISODE RUNNER: HEADLESS DRIVER
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Ticks a GameEngine until every trial has launched and every coconut has
 * drained, or until maxTicks. Yields to the event loop every `yieldEvery`
 * ticks so timers (market refresh) can hand state in between ticks.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { GameEngine } from '../engine';
import { AGENT_ROLES, AgentRole, Strike } from '../types';
import logger from '../utils/logger';

export interface EpisodeOptions {
    /** Hard stop; defaults to trials + the longest possible flight + 1 */
    maxTicks?: number;
    yieldEvery?: number;
    /** Called after every tick that launched or resolved something */
    onTick?: (tick: number, engine: GameEngine) => void;
}

export interface EpisodeSummary {
    episodeId: string;
    ticks: number;
    launched: number;
    finished: boolean;
    totalHits: number;
    totalRetailJuice: number;
    totalMmJuice: number;
    /** Strike with the most hits, undefined when nothing hit */
    hottestStrike?: Strike;
    memorySummaries: Record<AgentRole, string>;
}

const DEFAULT_YIELD_EVERY = 60;

/**
 * Enough ticks to launch every trial and land the last coconut. A paused
 * engine stops here instead of ticking forever.
 */
export function defaultMaxTicks(engine: GameEngine): number {
    return engine.trialCount + engine.longestFlightFrames + 1;
}

export async function runEpisode(engine: GameEngine, options: EpisodeOptions = {}): Promise<EpisodeSummary> {
    const maxTicks = options.maxTicks ?? defaultMaxTicks(engine);
    const yieldEvery = Math.max(1, options.yieldEvery ?? DEFAULT_YIELD_EVERY);

    logger.info(`[EPISODE] ${engine.episodeId} starting: trials=${engine.trialCount}`);

    let ticks = 0;
    let launched = 0;
    while (!engine.isFinished() && ticks < maxTicks) {
        const result = engine.update();
        ticks += 1;

        if (result.launched) launched += 1;
        if (options.onTick && (result.launched || result.resolved.length > 0)) {
            options.onTick(ticks, engine);
        }

        if (ticks % yieldEvery === 0) {
            await yieldToEventLoop();
        }
    }

    const summary = summarizeEpisode(engine, ticks, launched);

    logger.info(
        `[EPISODE] ${summary.episodeId} ${summary.finished ? 'finished' : 'stopped'} after ${ticks} ticks: ` +
        `hits=${summary.totalHits} retailJuice=${summary.totalRetailJuice.toFixed(2)} ` +
        `mmJuice=${summary.totalMmJuice.toFixed(2)} hottest=${summary.hottestStrike ?? 'none'}`
    );
    for (const role of AGENT_ROLES) {
        logger.info(`[EPISODE] ${role} memory\n${summary.memorySummaries[role]}`);
    }

    return summary;
}

export function summarizeEpisode(engine: GameEngine, ticks: number, launched: number): EpisodeSummary {
    const state = engine.getGameState();
    const sum = (values: ReadonlyMap<Strike, number>) =>
        [...values.values()].reduce((total, v) => total + v, 0);

    let hottestStrike: Strike | undefined;
    let mostHits = 0;
    for (const strike of state.strikes) {
        const hits = state.treeHits.get(strike) ?? 0;
        if (hits > mostHits) {
            hottestStrike = strike;
            mostHits = hits;
        }
    }

    return {
        episodeId: engine.episodeId,
        ticks,
        launched,
        finished: engine.isFinished(),
        totalHits: sum(state.treeHits),
        totalRetailJuice: sum(state.retailJuice),
        totalMmJuice: sum(state.mmJuice),
        hottestStrike,
        memorySummaries: {
            retail: engine.summarizeMemory('retail'),
            monkey: engine.summarizeMemory('monkey'),
        },
    };
}

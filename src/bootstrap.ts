/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * BOOTSTRAP: COLLABORATOR FACTORY
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Builds every collaborator of one episode from a GameConfig. NO RUNTIME
 * LOOPS in this file; start.ts owns the loop and the refresher lifecycle.
 *
 * RULES:
 * 1. One RandomSource per episode, shared by the engine, agents and memories
 * 2. Configuration problems surface as ConfigurationError before any tick
 * 3. Memory persistence is file-backed unless PERSIST_MEMORIES=false
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { GameConfig } from './config/gameConfig';
import { EquipmentCatalog, GameEngine, loadEquipmentCatalog } from './engine';
import { MarketRefresher, StaticMarketProvider } from './market';
import { JsonFileMemoryPersistence, MemoryPersistence, MemoryStore } from './memory';
import { loadProfilesFromDir, ProfileRegistry } from './profiles';
import logger from './utils/logger';
import { createRandom, RandomSource } from './utils/random';

export interface BootstrapResult {
    engine: GameEngine;
    market: StaticMarketProvider;
    refresher: MarketRefresher;
    profiles: ProfileRegistry;
    catalog: EquipmentCatalog;
    random: RandomSource;
}

export function bootstrap(config: GameConfig): BootstrapResult {
    const random = createRandom(config.rngSeed);
    logger.info(`[BOOTSTRAP] RNG ${config.rngSeed === undefined ? 'unseeded' : `seeded with "${config.rngSeed}"`}`);

    const catalog = loadEquipmentCatalog(config.portfolioPath);
    logger.info(`[BOOTSTRAP] ${catalog.slingshots.length} slingshots, default "${catalog.defaultSlingshot}"`);

    const profiles = loadProfilesFromDir(config.profilesDir);
    const market = new StaticMarketProvider(catalog.slingshots);

    let persistence: MemoryPersistence | undefined;
    if (config.persistMemories) {
        persistence = new JsonFileMemoryPersistence(config.memoryDir);
        logger.info(`[BOOTSTRAP] Memories persist to ${config.memoryDir}`);
    }
    const memoryConfig = { maxMemories: config.maxMemories };

    const engine = new GameEngine({
        market: market.getMarketState(),
        catalog,
        profiles,
        targets: market,
        random,
        memory: {
            retail: new MemoryStore('retail', { config: memoryConfig, persistence, random }),
            monkey: new MemoryStore('monkey', { config: memoryConfig, persistence, random }),
        },
        trials: config.trials,
        fps: config.fps,
        width: config.width,
        height: config.height,
    });

    const refresher = new MarketRefresher(
        market,
        (state) => engine.applyMarketState(state),
        config.marketRefreshMs
    );

    return { engine, market, refresher, profiles, catalog, random };
}

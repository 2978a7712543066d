import 'dotenv/config';

import { bootstrap } from './bootstrap';
import { loadGameConfig } from './config/gameConfig';
import { MarketRefresher } from './market';
import { runEpisode } from './runtime/episodeRunner';
import { ConfigurationError } from './utils/errors';
import logger from './utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME STATE
// ═══════════════════════════════════════════════════════════════════════════════

let refresher: MarketRefresher | null = null;
let isShuttingDown = false;

// ═══════════════════════════════════════════════════════════════════════════════
// GRACEFUL SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * 1. Stop the market refresher
 * 2. Give the logger time to flush
 * 3. Exit
 */
async function gracefulShutdown(signal: string, exitCode: number = 0): Promise<void> {
    if (isShuttingDown) {
        logger.info(`[SHUTDOWN] Already shutting down, ignoring ${signal}`);
        return;
    }
    isShuttingDown = true;

    logger.info(`[SHUTDOWN] Received ${signal}, shutting down`);
    refresher?.stop();

    await new Promise((resolve) => setTimeout(resolve, 250));
    process.exit(exitCode);
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

function attachProcessHandlers(): void {
    process.on('SIGINT', () => {
        void gracefulShutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
        void gracefulShutdown('SIGTERM');
    });

    process.on('uncaughtException', (error) => {
        logger.error(`[FATAL] Uncaught Exception: ${error.message}`, { stack: error.stack });
        void gracefulShutdown('uncaughtException', 1);
    });

    process.on('unhandledRejection', (reason) => {
        logger.error(`[FATAL] Unhandled Rejection: ${String(reason)}`);
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRYPOINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
    logger.info('═══════════════════════════════════════════════════════════════════');
    logger.info(`🌴 GAMMA JUNGLE: STARTING (PID ${process.pid})`);
    logger.info('═══════════════════════════════════════════════════════════════════');

    attachProcessHandlers();

    // STEP 1: Configuration
    const config = loadGameConfig();
    logger.info(`[CONFIG] trials=${config.trials} fps=${config.fps} maxMemories=${config.maxMemories}`);

    // STEP 2: Collaborators
    const runtime = bootstrap(config);
    refresher = runtime.refresher;

    // STEP 3: Background market refresh, then run the episode
    refresher.start();
    const summary = await runEpisode(runtime.engine);
    refresher.stop();

    logger.info(`[EPISODE] ${summary.episodeId} complete: ${summary.launched} launches, ${summary.totalHits} hits`);
}

main().catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
        logger.error(`[CONFIG] ${error.message}`, { context: error.context });
    } else {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`[FATAL] ${message}`);
    }
    refresher?.stop();
    process.exitCode = 1;
});

/**
 * Market Refresher
 *
 * Interval timer that pulls a fresh MarketState and hands it to a sink
 * (normally GameEngine.applyMarketState). A refresh still in progress
 * causes the next interval tick to be skipped.
 */

import { MarketState } from '../types';
import logger from '../utils/logger';
import { MarketStateProvider } from './types';

export type MarketStateSink = (state: MarketState) => void;

export class MarketRefresher {
    private intervalHandle: NodeJS.Timeout | null = null;
    private isRunning = false;

    constructor(
        private readonly provider: MarketStateProvider,
        private readonly sink: MarketStateSink,
        private readonly intervalMs: number
    ) {}

    get running(): boolean {
        return this.intervalHandle !== null;
    }

    start(): void {
        if (this.intervalHandle) {
            logger.warn('[MARKET] Refresher already running');
            return;
        }

        this.intervalHandle = setInterval(() => {
            void this.refreshOnce();
        }, this.intervalMs);
        this.intervalHandle.unref();

        logger.info(`[MARKET] Refresher started with interval ${this.intervalMs}ms`);
    }

    stop(): void {
        if (!this.intervalHandle) return;
        clearInterval(this.intervalHandle);
        this.intervalHandle = null;
        logger.info('[MARKET] Refresher stopped');
    }

    /**
     * One fetch-and-apply. Returns false when skipped or failed.
     */
    async refreshOnce(): Promise<boolean> {
        if (this.isRunning) {
            logger.debug('[MARKET] Refresh still running, skipping');
            return false;
        }

        this.isRunning = true;
        try {
            const state = await this.provider.getMarketState();
            this.sink(state);
            return true;
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            logger.error(`[MARKET] Refresh failed: ${message}`);
            return false;
        } finally {
            this.isRunning = false;
        }
    }
}

/**
 * Market-side collaborators the engine consumes
 */

import { MarketState, SlingshotTarget } from '../types';

export interface MarketStateProvider {
    getMarketState(): MarketState | Promise<MarketState>;
}

/**
 * Fast-path targets for a slingshot, most attractive first.
 * Unknown equipment yields an empty list.
 */
export interface SlingshotTargetSource {
    getSlingshotTargets(equipmentName: string, spot: number): SlingshotTarget[];
}

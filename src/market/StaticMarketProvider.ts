/**
 * Static Market Provider
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Serves a fixed MarketState (the fallback quote unless one is supplied) and
 * the slingshot fast-path targets computed from it.
 *
 * TARGET ATTRACTIVENESS:
 *   a(s) = 1 / (1 + |s - (round(spot) + strikeBias)|) · (1 + gamma(s))
 *   gamma(s) is the raw provider gamma, 0.1 when the strike has none.
 *   Targets with a <= 0.3 are dropped; the rest sort descending.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { FALLBACK_MARKET } from '../config/constants';
import { Equipment, MarketState, SlingshotTarget, Strike } from '../types';
import logger from '../utils/logger';
import { MarketStateProvider, SlingshotTargetSource } from './types';

export function fallbackMarketState(): MarketState {
    const strikes: Strike[] = [];
    for (let s = FALLBACK_MARKET.MIN_STRIKE; s <= FALLBACK_MARKET.MAX_STRIKE; s++) {
        strikes.push(s);
    }
    return {
        price: FALLBACK_MARKET.PRICE,
        impliedVol: FALLBACK_MARKET.IMPLIED_VOL,
        strikes,
        gammaProfile: new Map(),
    };
}

export class StaticMarketProvider implements MarketStateProvider, SlingshotTargetSource {
    private state: MarketState;
    private readonly equipment: ReadonlyMap<string, Equipment>;

    constructor(equipment: readonly Equipment[], state: MarketState = fallbackMarketState()) {
        this.state = state;
        this.equipment = new Map(equipment.map((e) => [e.name, e]));
    }

    getMarketState(): MarketState {
        return this.state;
    }

    setMarketState(state: MarketState): void {
        this.state = state;
        logger.info(`[MARKET] State updated: price=${state.price} iv=${state.impliedVol} strikes=${state.strikes.length}`);
    }

    getSlingshotTargets(equipmentName: string, spot: number): SlingshotTarget[] {
        const equipment = this.equipment.get(equipmentName);
        if (!equipment) return [];

        const center = Math.round(spot) + equipment.strikeBias;
        const targets: SlingshotTarget[] = [];

        for (const strike of this.state.strikes) {
            const gamma = this.state.gammaProfile.get(strike) ?? FALLBACK_MARKET.DEFAULT_GAMMA;
            const attractiveness = (1 / (1 + Math.abs(strike - center))) * (1 + gamma);

            if (attractiveness > FALLBACK_MARKET.MIN_ATTRACTIVENESS) {
                targets.push({
                    strike,
                    attractiveness,
                    optionType: equipment.optionType,
                    dte: equipment.dte,
                });
            }
        }

        return targets.sort((a, b) => b.attractiveness - a.attractiveness);
    }
}

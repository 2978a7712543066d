/**
 * Hit Probability Model
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * p = base · (1 - iv/100) · (1 - gamma/10) · 1/max(0.1, dte/30)
 *       · (1 + accuracy·0.2) · (1 + power·0.1) · optionMod
 *
 *   base       1 / (1 + |spot - strike|), halved when the strike is defended
 *   optionMod  call: 1.1 if spot > strike else 0.9
 *              put:  1.1 if spot < strike else 0.9
 *
 * Clamped to [0, 1]. Any non-finite input or intermediate yields 0.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { HIT_MODEL, JUICE_SPLIT, MEMORY_IMPORTANCE } from '../config/constants';
import { MonkeyAgent, RetailAgent } from '../agents';
import { Equipment, Strike, TickSnapshot } from '../types';
import logger from '../utils/logger';
import { RandomSource } from '../utils/random';
import { StrikeUniverse } from './strikes';

export interface HitProbabilityInputs {
    spot: number;
    strike: Strike;
    impliedVol: number;
    gamma: number;
    equipment: Pick<Equipment, 'power' | 'accuracy' | 'dte' | 'optionType'>;
    defended: boolean;
}

export interface JuiceSplit {
    retail: number;
    mm: number;
}

export interface ShotResolution {
    strike: Strike;
    hit: boolean;
    probability: number;
    retailJuice: number;
    mmJuice: number;
    defended: boolean;
    /** Only set when the strike was defended */
    defenseSuccess?: boolean;
}

export interface ShotContext {
    snapshot: TickSnapshot;
    universe: StrikeUniverse;
    strike: number;
    impliedVol: number;
    gamma: ReadonlyMap<Strike, number>;
    equipment: Equipment;
    monkeyEnabled: boolean;
}

export interface HitProbabilityModelDeps {
    retail: RetailAgent;
    monkey: MonkeyAgent;
    random: RandomSource;
}

/**
 * Base chance before modifiers
 */
export function baseHitChance(spot: number, strike: Strike, defended: boolean): number {
    const base = 1 / (1 + Math.abs(spot - strike));
    return defended ? base * HIT_MODEL.DEFENSE_PENALTY : base;
}

export function computeHitProbability(inputs: HitProbabilityInputs): number {
    const { spot, strike, impliedVol, gamma, equipment, defended } = inputs;
    const numeric = [spot, strike, impliedVol, gamma, equipment.power, equipment.accuracy, equipment.dte];
    if (!numeric.every(Number.isFinite)) return 0;

    const base = baseHitChance(spot, strike, defended);
    const volPenalty = 1 - impliedVol / HIT_MODEL.VOL_DIVISOR;
    const gammaPenalty = 1 - gamma / HIT_MODEL.GAMMA_DIVISOR;
    const decay = Math.max(HIT_MODEL.MIN_DECAY, equipment.dte / HIT_MODEL.DTE_DIVISOR);
    const accuracyBonus = 1 + equipment.accuracy * HIT_MODEL.ACCURACY_BONUS;
    const powerBonus = 1 + equipment.power * HIT_MODEL.POWER_BONUS;

    const favored = equipment.optionType === 'call' ? spot > strike : spot < strike;
    const optionMod = favored ? HIT_MODEL.OPTION_FAVORED : HIT_MODEL.OPTION_UNFAVORED;

    const p = base * volPenalty * gammaPenalty * (1 / decay) * accuracyBonus * powerBonus * optionMod;
    if (!Number.isFinite(p)) return 0;
    return Math.max(0, Math.min(1, p));
}

export function splitJuice(hit: boolean): JuiceSplit {
    return hit ? { retail: JUICE_SPLIT.retail, mm: JUICE_SPLIT.mm } : { retail: 0, mm: 0 };
}

export class HitProbabilityModel {
    private readonly retail: RetailAgent;
    private readonly monkey: MonkeyAgent;
    private readonly random: RandomSource;

    constructor(deps: HitProbabilityModelDeps) {
        this.retail = deps.retail;
        this.monkey = deps.monkey;
        this.random = deps.random;
    }

    /**
     * Decide one shot: defense roll, hit draw, juice split. Records outcomes
     * and memories on both agents.
     */
    resolveShot(ctx: ShotContext): ShotResolution {
        const strike = ctx.universe.snap(ctx.strike);
        if (strike !== ctx.strike) {
            logger.debug(`[SNAP] Adjusted strike ${ctx.strike} to nearest valid strike ${strike}`);
        }

        const spot = ctx.snapshot.spotPrice;
        const optionType = ctx.equipment.optionType;

        let defended = false;
        let defenseSuccess: boolean | undefined;
        if (ctx.monkeyEnabled) {
            const predictions = this.monkey.predictDefended(ctx.snapshot);
            defended = predictions.some(([predicted]) => predicted === strike);
        }

        if (defended) {
            defenseSuccess = this.random.next() > baseHitChance(spot, strike, true);
            this.monkey.recordOutcome(defenseSuccess);
            if (defenseSuccess) {
                this.monkey.remember(`Successfully defended ${optionType} strike ${strike}`, MEMORY_IMPORTANCE.DEFENSE_SUCCESS);
            } else {
                this.monkey.remember(`Failed to defend ${optionType} strike ${strike}`, MEMORY_IMPORTANCE.DEFENSE_FAILURE);
            }
        }

        const probability = computeHitProbability({
            spot,
            strike,
            impliedVol: ctx.impliedVol,
            gamma: ctx.gamma.get(strike) ?? 0,
            equipment: ctx.equipment,
            defended,
        });

        const hit = this.random.next() < probability;
        const juice = splitJuice(hit);

        this.retail.recordOutcome(hit);
        if (hit) {
            this.retail.remember(`Hit ${optionType} strike ${strike} at spot ${spot}`, MEMORY_IMPORTANCE.RETAIL_HIT);
        } else {
            this.retail.remember(`Missed ${optionType} strike ${strike}`, MEMORY_IMPORTANCE.RETAIL_MISS);
        }

        return {
            strike,
            hit,
            probability,
            retailJuice: juice.retail,
            mmJuice: juice.mm,
            defended,
            defenseSuccess,
        };
    }
}

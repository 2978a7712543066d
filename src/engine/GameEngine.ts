/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * GAME ENGINE: ONE TICK AT A TIME
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Owns the strike universe, aggregate per-strike statistics, the live
 * coconuts, and both decision units. Nothing runs on its own: a driver
 * calls update() once per frame.
 *
 * TICK:
 * 1. Apply a queued market state (price, implied vol)
 * 2. Launch one coconut while frame < trials
 *      market fast-path target → retail agent → random strike (retail AI off)
 * 3. Advance every live coconut
 * 4. Fold finished coconuts into the aggregates, then drop them
 *
 * RULES:
 * - Aggregate maps always have exactly the universe's strikes as keys
 * - Aggregates never decrease except on reset()
 * - Each finished coconut is folded exactly once
 * - Snapshots are copies
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { MonkeyAgent, RetailAgent, AgentDecisionUnit, deriveCrowdSizes, deriveRetailClustering } from '../agents';
import { ProfileProvider } from '../agents/types';
import { FLIGHT, GAME_DEFAULTS } from '../config/constants';
import { SlingshotTargetSource } from '../market/types';
import { MemoryStore } from '../memory';
import {
    AgentRole,
    Equipment,
    GameStateSnapshot,
    MarketState,
    Strike,
    TickSnapshot,
} from '../types';
import { ConfigurationError } from '../utils/errors';
import { generateEpisodeId } from '../utils/id';
import logger from '../utils/logger';
import { createRandom, pick, RandomSource, uniform } from '../utils/random';
import { Coconut, CoconutSource, CoconutView } from './Coconut';
import { EquipmentCatalog, findEquipment, validateCatalog } from './equipment';
import { HitProbabilityModel, ShotResolution } from './hitProbability';
import { buildGammaMap, hasUsableGamma, layoutTrees, StrikeUniverse } from './strikes';

export interface GameEngineOptions {
    market: MarketState;
    catalog: EquipmentCatalog;
    profiles?: ProfileProvider;
    targets?: SlingshotTargetSource;
    random?: RandomSource;
    memory?: Partial<Record<AgentRole, MemoryStore>>;
    trials?: number;
    fps?: number;
    width?: number;
    height?: number;
}

export type TargetSource = 'market' | 'agent' | 'random';

export interface LaunchRecord extends ShotResolution {
    coconutId: string;
    sourceAgent: CoconutSource;
    targetSource: TargetSource;
    requestedStrike: number;
}

export interface TickResult {
    launched: LaunchRecord | null;
    resolved: CoconutView[];
}

export class GameEngine {
    readonly episodeId: string;

    private readonly universe: StrikeUniverse;
    private readonly gamma: Map<Strike, number>;
    private readonly treeX: Map<Strike, number>;
    private readonly treeY: number;

    private readonly catalog: EquipmentCatalog;
    private readonly targets?: SlingshotTargetSource;
    private readonly profiles?: ProfileProvider;
    private readonly random: RandomSource;

    private readonly retailAgent: RetailAgent;
    private readonly monkeyAgent: MonkeyAgent;
    private readonly hitModel: HitProbabilityModel;

    private readonly trials: number;
    private readonly fps: number;
    private readonly width: number;

    private spot: number;
    private impliedVol: number;
    private pendingMarket: MarketState | null = null;

    private treeHits = new Map<Strike, number>();
    private retailJuice = new Map<Strike, number>();
    private mmJuice = new Map<Strike, number>();

    private coconuts: Coconut[] = [];
    private frame = 0;
    private paused = false;
    private readonly aiEnabled: Record<AgentRole, boolean> = { retail: true, monkey: true };
    private currentEquipment: Equipment;

    constructor(options: GameEngineOptions) {
        const { market } = options;
        if (!Number.isFinite(market.price) || !Number.isFinite(market.impliedVol)) {
            throw new ConfigurationError('market price and implied vol must be finite', {
                price: market.price,
                impliedVol: market.impliedVol,
            });
        }

        this.universe = new StrikeUniverse(market.strikes);
        this.catalog = validateCatalog(options.catalog);
        this.currentEquipment = this.requireEquipment(this.catalog.defaultSlingshot);

        this.trials = options.trials ?? GAME_DEFAULTS.TRIALS;
        this.fps = options.fps ?? GAME_DEFAULTS.FPS;
        this.width = options.width ?? GAME_DEFAULTS.WIDTH;
        const height = options.height ?? GAME_DEFAULTS.HEIGHT;

        this.spot = market.price;
        this.impliedVol = market.impliedVol;
        this.gamma = buildGammaMap(this.universe, market.price, market.gammaProfile);
        const trees = layoutTrees(this.universe, this.width, height);
        this.treeX = trees.x;
        this.treeY = trees.y;

        this.targets = options.targets;
        this.profiles = options.profiles;
        this.random = options.random ?? createRandom();

        this.retailAgent = new RetailAgent({
            memory: options.memory?.retail ?? new MemoryStore('retail', { random: this.random }),
            random: this.random,
            profiles: this.profiles,
        });
        this.monkeyAgent = new MonkeyAgent({
            memory: options.memory?.monkey ?? new MemoryStore('monkey', { random: this.random }),
            random: this.random,
            profiles: this.profiles,
        });
        this.hitModel = new HitProbabilityModel({
            retail: this.retailAgent,
            monkey: this.monkeyAgent,
            random: this.random,
        });

        this.episodeId = generateEpisodeId();
        this.zeroAggregates();

        logger.info(
            `[ENGINE] ${this.episodeId} ready: ${this.universe.size} strikes ` +
            `${this.universe.strikes[0]}-${this.universe.strikes[this.universe.size - 1]}, ` +
            `spot=${this.spot}, gamma=${hasUsableGamma(market.gammaProfile) ? 'provider' : 'synthetic'}, ` +
            `equipment=${this.currentEquipment.name}`
        );
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // TICK
    // ═══════════════════════════════════════════════════════════════════════════

    update(): TickResult {
        if (this.paused) {
            return { launched: null, resolved: [] };
        }

        this.applyPendingMarket();

        let launched: LaunchRecord | null = null;
        if (this.frame < this.trials) {
            launched = this.launch();
        }

        const finished: Coconut[] = [];
        for (const coconut of this.coconuts) {
            coconut.update(this.random);
            if (!coconut.alive) {
                finished.push(coconut);
            }
        }

        for (const coconut of finished) {
            this.fold(coconut);
        }
        if (finished.length > 0) {
            this.coconuts = this.coconuts.filter((c) => c.alive);
        }

        return { launched, resolved: finished.map((c) => c.toView()) };
    }

    private launch(): LaunchRecord {
        const snapshot = this.buildTickSnapshot();

        let requested: number;
        let targetSource: TargetSource;
        if (this.aiEnabled.retail) {
            const marketTargets = this.targets?.getSlingshotTargets(this.currentEquipment.name, this.spot) ?? [];
            if (marketTargets.length > 0) {
                requested = marketTargets[0].strike;
                targetSource = 'market';
            } else {
                requested = this.retailAgent.selectTarget(snapshot).strike;
                targetSource = 'agent';
            }
        } else {
            requested = pick(this.random, this.universe.strikes) ?? this.universe.strikes[0];
            targetSource = 'random';
        }

        const strike = this.universe.snap(requested);
        if (strike !== requested) {
            logger.debug(`[SNAP] Adjusted strike ${requested} to nearest valid strike ${strike}`);
        }

        const resolution = this.hitModel.resolveShot({
            snapshot,
            universe: this.universe,
            strike,
            impliedVol: this.impliedVol,
            gamma: this.gamma,
            equipment: this.currentEquipment,
            monkeyEnabled: this.aiEnabled.monkey,
        });

        const sourceAgent: CoconutSource = this.aiEnabled.retail ? 'retail' : 'random';
        const coconut = new Coconut({
            strike: resolution.strike,
            origin: { x: this.width / 2, y: 0 },
            target: {
                x: (this.treeX.get(resolution.strike) ?? FLIGHT.TREE_START_X) + FLIGHT.TARGET_X_OFFSET,
                y: this.treeY,
            },
            equipment: this.currentEquipment,
            speed: uniform(this.random, FLIGHT.MIN_SPEED, FLIGHT.MAX_SPEED),
            hit: resolution.hit,
            retailJuice: resolution.retailJuice,
            mmJuice: resolution.mmJuice,
            sourceAgent,
            fps: this.fps,
        });

        this.coconuts.push(coconut);
        this.frame += 1;

        logger.debug(
            `[LAUNCH] ${coconut.id} frame=${this.frame} strike=${resolution.strike} ` +
            `source=${targetSource} p=${resolution.probability.toFixed(4)} hit=${resolution.hit}` +
            (resolution.defended ? ` defended=${resolution.defenseSuccess}` : '')
        );

        return {
            ...resolution,
            coconutId: coconut.id,
            sourceAgent,
            targetSource,
            requestedStrike: requested,
        };
    }

    private fold(coconut: Coconut): void {
        if (!coconut.hit) return;
        const strike = this.universe.snap(coconut.strike);
        this.treeHits.set(strike, (this.treeHits.get(strike) ?? 0) + 1);
        this.retailJuice.set(strike, (this.retailJuice.get(strike) ?? 0) + coconut.retailJuice);
        this.mmJuice.set(strike, (this.mmJuice.get(strike) ?? 0) + coconut.mmJuice);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // MARKET HANDOFF
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Queue a market state for the start of the next tick. Only price and
     * implied vol are taken; the strike universe and gamma stay fixed.
     */
    applyMarketState(state: MarketState): void {
        this.pendingMarket = state;
    }

    private applyPendingMarket(): void {
        const state = this.pendingMarket;
        if (!state) return;
        this.pendingMarket = null;

        if (!Number.isFinite(state.price) || !Number.isFinite(state.impliedVol)) {
            logger.warn(`[MARKET] Ignoring non-finite market state price=${state.price} iv=${state.impliedVol}`);
            return;
        }

        this.spot = state.price;
        this.impliedVol = state.impliedVol;
        logger.info(`[MARKET] Applied price=${state.price} iv=${state.impliedVol}`);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // CONTROLS
    // ═══════════════════════════════════════════════════════════════════════════

    togglePause(): boolean {
        this.paused = !this.paused;
        return this.paused;
    }

    toggleAi(role: AgentRole): boolean {
        this.aiEnabled[role] = !this.aiEnabled[role];
        logger.info(`[ENGINE] ${role} AI ${this.aiEnabled[role] ? 'enabled' : 'disabled'}`);
        return this.aiEnabled[role];
    }

    isAiEnabled(role: AgentRole): boolean {
        return this.aiEnabled[role];
    }

    get isPaused(): boolean {
        return this.paused;
    }

    /**
     * Zero aggregates, drop live coconuts, rewind the frame counter.
     * Agent memories and histories are kept.
     */
    reset(): void {
        this.zeroAggregates();
        this.coconuts = [];
        this.frame = 0;
        logger.info(`[ENGINE] ${this.episodeId} reset`);
    }

    switchEquipment(name: string): boolean {
        const equipment = findEquipment(this.catalog, name);
        if (!equipment) return false;
        this.currentEquipment = equipment;
        logger.info(`[ENGINE] Equipment switched to ${name}`);
        return true;
    }

    /**
     * Switch the active profile by its index in the provider's list
     */
    switchProfile(role: AgentRole, index: number): boolean {
        if (!this.profiles || !Number.isInteger(index) || index < 0) return false;
        const names = this.profiles.listProfiles(role);
        if (index >= names.length) return false;
        return this.profiles.switchProfile(role, names[index]);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // READ-ONLY VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    getGameState(): GameStateSnapshot {
        return {
            spotPrice: this.spot,
            strikes: [...this.universe.strikes],
            treeHits: new Map(this.treeHits),
            retailJuice: new Map(this.retailJuice),
            mmJuice: new Map(this.mmJuice),
            frame: this.frame,
            currentEquipmentName: this.currentEquipment.name,
            optionType: this.currentEquipment.optionType,
        };
    }

    getLiveCoconuts(): CoconutView[] {
        return this.coconuts.map((c) => c.toView());
    }

    getGamma(): ReadonlyMap<Strike, number> {
        return new Map(this.gamma);
    }

    getTreePositions(): ReadonlyMap<Strike, { x: number; y: number }> {
        const positions = new Map<Strike, { x: number; y: number }>();
        for (const [strike, x] of this.treeX) {
            positions.set(strike, { x, y: this.treeY });
        }
        return positions;
    }

    get currentEquipmentName(): string {
        return this.currentEquipment.name;
    }

    get trialCount(): number {
        return this.trials;
    }

    /**
     * Frames the slowest coconut in the catalog can stay in flight
     */
    get longestFlightFrames(): number {
        return Math.max(...this.catalog.slingshots.map((s) => Math.ceil(s.dte * this.fps)));
    }

    isFinished(): boolean {
        return this.frame >= this.trials && this.coconuts.length === 0;
    }

    getAgent(role: AgentRole): AgentDecisionUnit {
        return role === 'retail' ? this.retailAgent : this.monkeyAgent;
    }

    summarizeMemory(role: AgentRole): string {
        return this.getAgent(role).summarize();
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // INTERNALS
    // ═══════════════════════════════════════════════════════════════════════════

    private buildTickSnapshot(): TickSnapshot {
        const state = this.getGameState();
        return {
            ...state,
            crowdSize: deriveCrowdSizes(state.strikes, state.treeHits, state.retailJuice),
            retailClustering: deriveRetailClustering(state.strikes, state.treeHits, state.retailJuice),
        };
    }

    private zeroAggregates(): void {
        this.treeHits = new Map();
        this.retailJuice = new Map();
        this.mmJuice = new Map();
        for (const strike of this.universe.strikes) {
            this.treeHits.set(strike, 0);
            this.retailJuice.set(strike, 0);
            this.mmJuice.set(strike, 0);
        }
    }

    private requireEquipment(name: string): Equipment {
        const equipment = findEquipment(this.catalog, name);
        if (!equipment) {
            throw new ConfigurationError(`unknown default slingshot: ${name}`);
        }
        return equipment;
    }
}

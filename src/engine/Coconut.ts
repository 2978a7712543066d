/**
 * Coconut
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * One launched shot. The outcome (hit, juice split) is fixed at launch; the
 * flight only decides when the coconut leaves the board.
 *
 * STATE MACHINE:
 *   IN_FLIGHT ──frames exhausted──► EXPIRED
 *   IN_FLIGHT ──t >= 1─────────────► ARRIVED
 *
 * Terminal states never change. Updates on a terminal coconut are no-ops.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { FLIGHT } from '../config/constants';
import { Equipment, OptionType, Strike } from '../types';
import { generateCoconutId } from '../utils/id';
import { RandomSource, uniform } from '../utils/random';
import { Point } from './strikes';

export enum CoconutStatus {
    IN_FLIGHT = 'IN_FLIGHT',
    EXPIRED = 'EXPIRED',
    ARRIVED = 'ARRIVED',
}

export type CoconutSource = 'retail' | 'random';

export interface CoconutLaunch {
    strike: Strike;
    origin: Point;
    target: Point;
    equipment: Equipment;
    speed: number;
    hit: boolean;
    retailJuice: number;
    mmJuice: number;
    sourceAgent: CoconutSource;
    fps: number;
}

/**
 * Read-only view for rendering collaborators
 */
export interface CoconutView {
    id: string;
    strike: Strike;
    position: Point;
    target: Point;
    t: number;
    status: CoconutStatus;
    framesRemaining: number;
    optionType: OptionType;
    color: readonly [number, number, number];
    size: number;
    sourceAgent: CoconutSource;
}

export class Coconut {
    readonly id: string;
    readonly strike: Strike;
    readonly hit: boolean;
    readonly retailJuice: number;
    readonly mmJuice: number;
    readonly sourceAgent: CoconutSource;
    readonly equipment: Equipment;
    readonly speed: number;

    private readonly origin: Point;
    private readonly target: Point;
    private position: Point;
    private progress = 0;
    private frames: number;
    private state = CoconutStatus.IN_FLIGHT;

    constructor(launch: CoconutLaunch) {
        this.id = generateCoconutId();
        this.strike = launch.strike;
        this.hit = launch.hit;
        this.retailJuice = launch.retailJuice;
        this.mmJuice = launch.mmJuice;
        this.sourceAgent = launch.sourceAgent;
        this.equipment = launch.equipment;
        this.speed = launch.speed;
        this.origin = { ...launch.origin };
        this.target = { ...launch.target };
        this.position = { ...launch.origin };
        this.frames = launch.equipment.dte * launch.fps;
    }

    get status(): CoconutStatus {
        return this.state;
    }

    get alive(): boolean {
        return this.state === CoconutStatus.IN_FLIGHT;
    }

    get t(): number {
        return this.progress;
    }

    get framesRemaining(): number {
        return this.frames;
    }

    /**
     * Advance one frame
     */
    update(rng: RandomSource): CoconutStatus {
        if (!this.alive) return this.state;

        this.frames -= 1;
        if (this.frames <= 0) {
            this.state = CoconutStatus.EXPIRED;
            return this.state;
        }

        this.progress += this.speed * this.equipment.power;
        if (this.progress >= 1) {
            this.state = CoconutStatus.ARRIVED;
            return this.state;
        }

        const t = this.progress;
        const spread = 1 - this.equipment.accuracy;
        const jitter = uniform(rng, 1 - spread, 1 + spread);
        const arc = FLIGHT.ARC_HEIGHT_PER_POWER * this.equipment.power * t * (1 - t);

        this.position = {
            x: ((1 - t) * this.origin.x + t * this.target.x) * jitter,
            y: (1 - t) * this.origin.y + t * this.target.y - arc,
        };
        return this.state;
    }

    toView(): CoconutView {
        return {
            id: this.id,
            strike: this.strike,
            position: { ...this.position },
            target: { ...this.target },
            t: this.progress,
            status: this.state,
            framesRemaining: this.frames,
            optionType: this.equipment.optionType,
            color: this.equipment.color,
            size: this.equipment.size,
            sourceAgent: this.sourceAgent,
        };
    }
}

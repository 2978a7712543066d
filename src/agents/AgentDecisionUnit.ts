/**
 * Agent Decision Unit - Base
 *
 * Owns the agent's memory, scoring engine, and rolling outcome history.
 * Outcomes are success flags: hits for retail, successful defenses for the
 * monkey.
 */

import { Memory, MemoryStore, RetrievalContext } from '../memory';
import { AgentProfile, AgentRole, Strike } from '../types';
import { RandomSource } from '../utils/random';
import { AGENT_CONFIG } from './config';
import { recentRate } from './metrics';
import { ScoringEngine } from './ScoringEngine';
import { ProfileProvider } from './types';

export interface AgentDecisionUnitDeps {
    memory: MemoryStore;
    random: RandomSource;
    profiles?: ProfileProvider;
}

export abstract class AgentDecisionUnit {
    protected readonly memory: MemoryStore;
    protected readonly random: RandomSource;
    protected readonly profiles?: ProfileProvider;
    protected readonly scoring: ScoringEngine;

    private outcomes: boolean[] = [];
    private strikes: Strike[] = [];

    constructor(public readonly role: AgentRole, deps: AgentDecisionUnitDeps) {
        this.memory = deps.memory;
        this.random = deps.random;
        this.profiles = deps.profiles;
        this.scoring = new ScoringEngine(role, deps.profiles);
    }

    get activeProfile(): AgentProfile | undefined {
        return this.profiles?.getActiveProfile(this.role);
    }

    get outcomeHistory(): readonly boolean[] {
        return this.outcomes;
    }

    get strikeHistory(): readonly Strike[] {
        return this.strikes;
    }

    recordOutcome(success: boolean): void {
        this.outcomes = pushBounded(this.outcomes, success);
    }

    remember(content: string, importance: number): Memory {
        return this.memory.add(content, importance);
    }

    recall(context: RetrievalContext, limit?: number): Memory[] {
        return this.memory.retrieve(context, limit);
    }

    summarize(): string {
        return this.memory.summarize();
    }

    protected successRate(): number {
        return recentRate(this.outcomes, true);
    }

    protected failureRate(): number {
        return recentRate(this.outcomes, false);
    }

    protected recordStrike(strike: Strike): void {
        this.strikes = pushBounded(this.strikes, strike);
    }

    protected recentStrikes(window: number): readonly Strike[] {
        return this.strikes.slice(-window);
    }
}

function pushBounded<T>(list: readonly T[], value: T): T[] {
    return [...list, value].slice(-AGENT_CONFIG.HISTORY_LENGTH);
}

/**
 * Agent Memory - Store
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Bounded episodic log owned by exactly one agent.
 *
 * RULES:
 * 1. size <= maxMemories once add() returns
 * 2. references only change during retrieve(); every memory that scores a
 *    positive relevance is counted, returned or not
 * 3. memories are removed only by curation
 * 4. persistence failures are logged and swallowed
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { createRandom, RandomSource } from '../utils/random';
import { createMemoryConfig } from './config';
import { computeCurationScore, computeRelevance } from './scoring';
import {
    Memory,
    MemoryConfig,
    MemoryPersistence,
    MemoryStoreOptions,
    RetrievalContext,
} from './types';

export class MemoryStore {
    private memories: Memory[] = [];
    private readonly config: MemoryConfig;
    private readonly persistence?: MemoryPersistence;
    private readonly random: RandomSource;
    private readonly clock: () => number;

    constructor(
        public readonly agentName: string,
        options: MemoryStoreOptions = {}
    ) {
        this.config = createMemoryConfig(options.config);
        this.persistence = options.persistence;
        this.random = options.random ?? createRandom();
        this.clock = options.clock ?? Date.now;

        this.load();
    }

    get size(): number {
        return this.memories.length;
    }

    get maxMemories(): number {
        return this.config.maxMemories;
    }

    /**
     * Copies of the stored memories, in store order
     */
    list(): Memory[] {
        return this.memories.map((m) => ({ ...m }));
    }

    /**
     * Append a memory, curate if over capacity, persist.
     */
    add(content: string, importance: number): Memory {
        const memory: Memory = {
            content,
            importance: Math.max(0, Math.min(1, importance)),
            timestamp: new Date(this.clock()).toISOString(),
            references: 0,
        };
        this.memories.push(memory);

        if (this.memories.length > this.config.maxMemories) {
            this.curate();
        }

        this.save();
        return { ...memory };
    }

    /**
     * Memories relevant to the context, most relevant first.
     */
    retrieve(context: RetrievalContext, limit: number = this.config.retrieveLimit): Memory[] {
        const scored: Array<{ memory: Memory; relevance: number }> = [];

        for (const memory of this.memories) {
            const relevance = computeRelevance(memory, context, this.random, this.config);
            if (relevance > 0) {
                scored.push({ memory, relevance });
                memory.references += 1;
            }
        }

        scored.sort((a, b) => b.relevance - a.relevance);
        const selected = scored.slice(0, Math.max(0, limit)).map(({ memory }) => ({ ...memory }));

        this.save();
        return selected;
    }

    /**
     * Keep the top maxMemories by curation score. Stable for equal scores.
     */
    curate(): void {
        const now = this.clock();
        const before = this.memories.length;

        const scored = this.memories.map((memory) => ({
            memory,
            score: computeCurationScore(memory, now, this.config),
        }));
        scored.sort((a, b) => b.score - a.score);
        this.memories = scored.slice(0, this.config.maxMemories).map(({ memory }) => memory);

        const dropped = before - this.memories.length;
        if (dropped > 0) {
            logger.debug(`[MEMORY] ${this.agentName}: curated ${dropped} memories, kept ${this.memories.length}`);
        }
    }

    /**
     * Human-readable digest of high and medium importance memories
     */
    summarize(): string {
        if (this.memories.length === 0) {
            return 'No memories collected yet.';
        }

        const high: Memory[] = [];
        const medium: Memory[] = [];
        for (const memory of this.memories) {
            if (memory.importance >= this.config.highImportance) {
                high.push(memory);
            } else if (memory.importance >= this.config.mediumImportance) {
                medium.push(memory);
            }
        }

        const byReferences = (list: Memory[]) =>
            [...list]
                .sort((a, b) => b.references - a.references)
                .slice(0, this.config.summaryEntriesPerBucket);

        const lines = [`Agent ${this.agentName} Insights:`];

        if (high.length > 0) {
            lines.push('\nKey Learnings:');
            for (const memory of byReferences(high)) {
                lines.push(`- ${memory.content} (referenced ${memory.references} times)`);
            }
        }

        if (medium.length > 0) {
            lines.push('\nUseful Patterns:');
            for (const memory of byReferences(medium)) {
                lines.push(`- ${memory.content}`);
            }
        }

        return lines.join('\n');
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PERSISTENCE
    // ═══════════════════════════════════════════════════════════════════════════

    private load(): void {
        if (!this.persistence) return;
        try {
            this.memories = this.persistence.load(this.agentName);
            if (this.memories.length > this.config.maxMemories) {
                this.curate();
            }
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            logger.warn(`[MEMORY] Error loading memories for ${this.agentName}: ${message}`);
            this.memories = [];
        }
    }

    private save(): void {
        if (!this.persistence) return;
        try {
            this.persistence.save(this.agentName, this.memories);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            logger.warn(`[MEMORY] Error saving memories for ${this.agentName}: ${message}`);
        }
    }
}

/**
 * Agent Memory - Type Definitions
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Bounded episodic log per agent. Memories are curated by an
 * importance × reference × age-decay score once capacity is exceeded.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { RandomSource } from '../utils/random';

/**
 * One episodic memory. Also the persisted record shape.
 */
export interface Memory {
    /** Human-readable description of what happened */
    content: string;

    /** 0-1 */
    importance: number;

    /** ISO-8601 creation time */
    timestamp: string;

    /** How many retrievals have considered this memory */
    references: number;
}

/**
 * Context used to score memory relevance during retrieval
 */
export interface RetrievalContext {
    strikePrice?: number;
    spotPrice?: number;
    recentSuccess?: boolean;
}

/**
 * Storage backend for persisted memories
 */
export interface MemoryPersistence {
    load(agentName: string): Memory[];
    save(agentName: string, memories: readonly Memory[]): void;
}

/**
 * Memory store configuration
 */
export interface MemoryConfig {
    /** Capacity; curation runs once size exceeds it */
    maxMemories: number;

    /** Default number of memories returned by retrieve() */
    retrieveLimit: number;

    /** Age (seconds) at which the decay factor halves */
    decayHalfLifeSeconds: number;

    /** References needed to double a memory's curation score */
    referencesPerDoubling: number;

    /** Relevance bonus when the strike is mentioned */
    strikeMentionBonus: number;

    /** Relevance bonus when the spot price is mentioned */
    spotMentionBonus: number;

    /** Relevance bonus for success/failure keyword alignment */
    outcomeAlignmentBonus: number;

    /** Upper bound of the random exploration term */
    explorationBonus: number;

    /** Importance threshold for "Key Learnings" */
    highImportance: number;

    /** Importance threshold for "Useful Patterns" */
    mediumImportance: number;

    /** Entries listed per summary bucket */
    summaryEntriesPerBucket: number;
}

export interface MemoryStoreOptions {
    config?: Partial<MemoryConfig>;
    persistence?: MemoryPersistence;
    random?: RandomSource;
    /** Epoch ms */
    clock?: () => number;
}

/**
 * Agent Memory - Configuration
 */

import { MemoryConfig } from './types';

export type { MemoryConfig } from './types';

/**
 * Default configuration for agent memory
 */
export const DEFAULT_MEMORY_CONFIG: MemoryConfig = {
    maxMemories: 100,
    retrieveLimit: 5,

    // One day: a memory's score halves after 24h
    decayHalfLifeSeconds: 86400,

    // Ten references double the score
    referencesPerDoubling: 10,

    strikeMentionBonus: 0.3,
    spotMentionBonus: 0.2,
    outcomeAlignmentBonus: 0.2,
    explorationBonus: 0.1,

    highImportance: 0.8,
    mediumImportance: 0.5,
    summaryEntriesPerBucket: 3,
};

/**
 * Create custom configuration with overrides
 */
export function createMemoryConfig(overrides: Partial<MemoryConfig> = {}): MemoryConfig {
    return {
        ...DEFAULT_MEMORY_CONFIG,
        ...overrides,
    };
}

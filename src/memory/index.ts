/**
 * Agent Memory Module
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Per-agent episodic memory with capacity-bounded curation and
 * context-based retrieval.
 *
 * INTEGRATION:
 *   const store = new MemoryStore('retail', { persistence, random });
 *   store.add('Hit call strike 630 at spot 628', 0.7);
 *   const relevant = store.retrieve({ strikePrice: 630, recentSuccess: true });
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type {
    Memory,
    MemoryConfig,
    MemoryPersistence,
    MemoryStoreOptions,
    RetrievalContext,
} from './types';

export { DEFAULT_MEMORY_CONFIG, createMemoryConfig } from './config';
export { ageDecay, computeCurationScore, computeRelevance } from './scoring';
export { JsonFileMemoryPersistence, InMemoryPersistence, parseMemoryRecords } from './persistence';
export { MemoryStore } from './store';

/**
 * Agent Memory - Scoring
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Curation score:  importance × (1 + references / 10) × 1 / (1 + age / 1 day)
 * Relevance:       strike mention + spot mention + outcome alignment + noise
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Memory, MemoryConfig, RetrievalContext } from './types';
import { DEFAULT_MEMORY_CONFIG } from './config';
import { RandomSource } from '../utils/random';

/**
 * Age decay factor in (0, 1]. Unparseable timestamps count as brand new.
 */
export function ageDecay(
    timestamp: string,
    nowMs: number,
    config: MemoryConfig = DEFAULT_MEMORY_CONFIG
): number {
    const createdMs = Date.parse(timestamp);
    const ageSeconds = Number.isFinite(createdMs) ? (nowMs - createdMs) / 1000 : 0;
    return 1 / (1 + ageSeconds / config.decayHalfLifeSeconds);
}

/**
 * Score used to decide which memories survive curation
 */
export function computeCurationScore(
    memory: Memory,
    nowMs: number,
    config: MemoryConfig = DEFAULT_MEMORY_CONFIG
): number {
    return (
        memory.importance *
        (1 + memory.references / config.referencesPerDoubling) *
        ageDecay(memory.timestamp, nowMs, config)
    );
}

/**
 * Relevance of a memory to the current context. Always includes a small
 * random exploration term, so practically every memory scores above zero.
 */
export function computeRelevance(
    memory: Memory,
    context: RetrievalContext,
    rng: RandomSource,
    config: MemoryConfig = DEFAULT_MEMORY_CONFIG
): number {
    let relevance = 0;

    if (context.strikePrice !== undefined && memory.content.includes(String(context.strikePrice))) {
        relevance += config.strikeMentionBonus;
    }
    if (context.spotPrice !== undefined && memory.content.includes(String(context.spotPrice))) {
        relevance += config.spotMentionBonus;
    }

    const content = memory.content.toLowerCase();
    const recentSuccess = context.recentSuccess ?? false;
    if (recentSuccess && content.includes('success')) {
        relevance += config.outcomeAlignmentBonus;
    } else if (!recentSuccess && content.includes('fail')) {
        relevance += config.outcomeAlignmentBonus;
    }

    relevance += rng.next() * config.explorationBonus;

    return relevance;
}

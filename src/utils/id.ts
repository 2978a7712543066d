/**
 * ID Generation Utilities
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Coconuts and episodes get fresh ids per use. Ids are for log correlation
 * only; no simulation decision depends on them.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generate an id for a launched coconut.
 *
 * @example
 * ```typescript
 * generateCoconutId(); // "coconut_1f0c2a9e"
 * ```
 */
export function generateCoconutId(): string {
    return `coconut_${uuidv4().split('-')[0]}`;
}

/**
 * Generate an id for a simulation episode
 */
export function generateEpisodeId(now: number = Date.now()): string {
    return `episode_${now}_${uuidv4().split('-')[0]}`;
}

/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INDEX.TS: PUBLIC SURFACE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * RULES:
 * 1. NO runtime logic at import time
 * 2. NO process handlers here; start.ts owns the process
 *
 * The entrypoint is: node dist/start.js
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export * from './types';
export * from './agents';
export * from './engine';
export * from './market';
export * from './memory';
export * from './profiles';
export { bootstrap } from './bootstrap';
export type { BootstrapResult } from './bootstrap';
export { runEpisode, summarizeEpisode } from './runtime/episodeRunner';
export type { EpisodeOptions, EpisodeSummary } from './runtime/episodeRunner';
export { loadGameConfig } from './config/gameConfig';
export type { GameConfig } from './config/gameConfig';
export { ConfigurationError } from './utils/errors';
export { createRandom, pick, uniform } from './utils/random';
export type { RandomSource } from './utils/random';

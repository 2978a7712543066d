/**
 * Game Configuration
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Environment-driven settings for the headless runner. `.env` is loaded by
 * start.ts through dotenv; this module only parses what is in the env map.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import path from 'path';
import { z } from 'zod';
import { GAME_DEFAULTS } from './constants';
import { ConfigurationError } from '../utils/errors';

const DATA_DIR = path.resolve(__dirname, '../../data');

export interface GameConfig {
    trials: number;
    fps: number;
    width: number;
    height: number;
    maxMemories: number;
    memoryDir: string;
    persistMemories: boolean;
    profilesDir: string;
    portfolioPath: string;
    rngSeed?: string;
    marketRefreshMs: number;
}

const positiveInt = (fallback: number) =>
    z.coerce.number().int().positive().default(fallback);

const booleanFlag = (fallback: boolean) =>
    z.enum(['true', 'false']).default(fallback ? 'true' : 'false').transform((v) => v === 'true');

const envSchema = z.object({
    TRIALS: positiveInt(GAME_DEFAULTS.TRIALS),
    FPS: positiveInt(GAME_DEFAULTS.FPS),
    WIDTH: positiveInt(GAME_DEFAULTS.WIDTH),
    HEIGHT: positiveInt(GAME_DEFAULTS.HEIGHT),
    MAX_MEMORIES: positiveInt(GAME_DEFAULTS.MAX_MEMORIES),
    MEMORY_DIR: z.string().min(1).default(GAME_DEFAULTS.MEMORY_DIR),
    PERSIST_MEMORIES: booleanFlag(true),
    PROFILES_DIR: z.string().min(1).default(path.join(DATA_DIR, 'profiles')),
    PORTFOLIO_PATH: z.string().min(1).default(path.join(DATA_DIR, 'portfolio.json')),
    RNG_SEED: z.string().min(1).optional(),
    MARKET_REFRESH_MS: positiveInt(GAME_DEFAULTS.MARKET_REFRESH_MS),
});

/**
 * Parse game configuration from an environment map.
 * Empty strings count as unset.
 *
 * @throws ConfigurationError listing every invalid key
 */
export function loadGameConfig(env: NodeJS.ProcessEnv = process.env): GameConfig {
    const raw: Record<string, string> = {};
    for (const key of Object.keys(envSchema.shape)) {
        const value = env[key];
        if (value !== undefined && value.trim() !== '') {
            raw[key] = value.trim();
        }
    }

    const parsed = envSchema.safeParse(raw);
    if (!parsed.success) {
        const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
        throw new ConfigurationError(`Invalid environment configuration: ${keys.join(', ')}`, {
            issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
    }

    const cfg = parsed.data;
    return {
        trials: cfg.TRIALS,
        fps: cfg.FPS,
        width: cfg.WIDTH,
        height: cfg.HEIGHT,
        maxMemories: cfg.MAX_MEMORIES,
        memoryDir: cfg.MEMORY_DIR,
        persistMemories: cfg.PERSIST_MEMORIES,
        profilesDir: cfg.PROFILES_DIR,
        portfolioPath: cfg.PORTFOLIO_PATH,
        rngSeed: cfg.RNG_SEED,
        marketRefreshMs: cfg.MARKET_REFRESH_MS,
    };
}

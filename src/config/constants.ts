// Configuration Constants for Gamma Jungle

export const GAME_DEFAULTS = {
    // Screen layout
    WIDTH: 1280,
    HEIGHT: 720,
    FPS: 60,

    // Episode
    TRIALS: 1000,

    // Memory
    MAX_MEMORIES: 100,
    MEMORY_DIR: 'logs',

    // Background market refresh (5 minutes)
    MARKET_REFRESH_MS: 5 * 60 * 1000,
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// HIT MODEL
// ═══════════════════════════════════════════════════════════════════════════════
export const HIT_MODEL = {
    DEFENSE_PENALTY: 0.5,           // Base chance multiplier on a defended strike
    GAMMA_DIVISOR: 10,
    VOL_DIVISOR: 100,
    DTE_DIVISOR: 30,
    MIN_DECAY: 0.1,
    ACCURACY_BONUS: 0.2,
    POWER_BONUS: 0.1,
    OPTION_FAVORED: 1.1,            // call below spot / put above spot
    OPTION_UNFAVORED: 0.9,
} as const;

/**
 * Juice split on a hit. Shares sum to 1; a miss pays nothing.
 */
export const JUICE_SPLIT = {
    mm: 0.7,
    retail: 0.3,
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY IMPORTANCE
// ═══════════════════════════════════════════════════════════════════════════════
export const MEMORY_IMPORTANCE = {
    RETAIL_HIT: 0.7,
    RETAIL_MISS: 0.5,
    DEFENSE_SUCCESS: 0.8,
    DEFENSE_FAILURE: 0.6,
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// COCONUT FLIGHT
// ═══════════════════════════════════════════════════════════════════════════════
export const FLIGHT = {
    MIN_SPEED: 0.01,
    MAX_SPEED: 0.03,
    ARC_HEIGHT_PER_POWER: 100,
    TREE_START_X: 50,
    TREE_MAX_SPACING: 30,
    TREE_MARGIN: 100,
    TREE_BASELINE_OFFSET: 120,      // Trees sit this far above the bottom edge
    TARGET_X_OFFSET: 10,
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// SYNTHETIC GAMMA
// ═══════════════════════════════════════════════════════════════════════════════
export const SYNTHETIC_GAMMA = {
    PEAK: 1.0,
    DECAY_PER_POINT: 0.9,           // gamma = PEAK * DECAY^|strike - spot|
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// FALLBACK MARKET
// ═══════════════════════════════════════════════════════════════════════════════
export const FALLBACK_MARKET = {
    PRICE: 628.86,
    IMPLIED_VOL: 13.7,
    MIN_STRIKE: 610,
    MAX_STRIKE: 646,
    DEFAULT_GAMMA: 0.1,
    MIN_ATTRACTIVENESS: 0.3,
} as const;

/**
 * Agent Decision - Configuration
 */

import { AgentRole } from '../types';
import { Weights } from './types';

/**
 * Fallback weights when no profile is active (or it has no weights)
 */
export const DEFAULT_WEIGHTS: Readonly<Record<AgentRole, Readonly<Weights>>> = {
    retail: {
        spot_distance: 0.3,
        success_history: 0.2,
        mm_defense: 0.3,
        crowd_following: 0.2,
    },
    monkey: {
        spot_distance: 0.3,
        hit_history: 0.2,
        juice_collection: 0.3,
        retail_clustering: 0.2,
    },
};

export const AGENT_CONFIG = {
    // Rolling windows
    HISTORY_LENGTH: 10,             // Outcomes / targets kept per agent
    RATE_WINDOW: 5,                 // Outcomes used for success / loss rates
    RECENT_TARGET_WINDOW: 5,        // Retail: targets counted as "history"
    RECENT_DEFENSE_WINDOW: 3,       // Monkey: defenses eligible for repeat boost

    // Factor scaling
    DISTANCE_SCALE: 5,              // distance score = 1 / (1 + d / 5)
    CROWD_SCALE: 5,                 // crowd score = min(1, crowd / 5)
    HIT_SCALE: 10,                  // hit score = min(1, hits / 10)
    CROWD_JUICE_FACTOR: 10,         // crowd = floor((hits + juice * 10) / 2)
    MIN_CLUSTERING: 0.01,

    // Bias triggers
    OVERCONFIDENCE_SUCCESS_RATE: 0.5,
    HERD_CROWD_SIZE: 3,
    LOSS_AVERSION_LOSS_RATE: 0.3,
    RECENCY_CLUSTERING: 0.5,

    // Secondary modifiers
    FOMO_BOOST: 1.5,
    REFLEXIVITY_BOOST: 1.3,
    REPEAT_DEFENSE_BOOST: 1.2,

    // Monkey output
    DEFENDED_STRIKES: 3,

    // Selection fallback
    FALLBACK_CONFIDENCE: 0.5,
} as const;

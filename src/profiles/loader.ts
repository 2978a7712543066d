/**
 * Profile Loader
 *
 * Reads `retail_*.json` and `monkey_*.json` from a directory into a
 * ProfileRegistry. Files that fail to parse or validate are logged and
 * skipped; a missing directory yields an empty registry.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { AGENT_ROLES, AgentProfile, AgentRole } from '../types';
import logger from '../utils/logger';
import { ProfileRegistry } from './ProfileRegistry';

const profileFileSchema = z.object({
    name: z.string(),
    goal: z.string(),
    traits: z.record(z.union([z.number(), z.boolean()])),
    strategies: z.array(z.string()),
    biases: z.record(z.number()),
    behavior_weights: z.record(z.number()),
});

/**
 * Validate one profile document
 */
export function parseProfile(body: unknown): AgentProfile {
    const data = profileFileSchema.parse(body);
    return {
        name: data.name,
        goal: data.goal,
        traits: data.traits,
        strategies: data.strategies,
        biases: data.biases,
        behaviorWeights: data.behavior_weights,
    };
}

export function roleForFile(fileName: string): AgentRole | undefined {
    return AGENT_ROLES.find((role) => fileName.startsWith(`${role}_`) && fileName.endsWith('.json'));
}

export function loadProfilesFromDir(dir: string): ProfileRegistry {
    const registry = new ProfileRegistry();

    let files: string[];
    try {
        files = fs.readdirSync(dir).sort();
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn(`[PROFILE] Cannot read profiles directory ${dir}: ${message}`);
        return registry;
    }

    for (const file of files) {
        const role = roleForFile(file);
        if (!role) continue;

        try {
            const body: unknown = JSON.parse(fs.readFileSync(path.join(dir, file), 'utf-8'));
            registry.register(role, file, parseProfile(body));
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            logger.warn(`[PROFILE] Skipping ${file}: ${message}`);
        }
    }

    for (const role of AGENT_ROLES) {
        const names = registry.listProfiles(role);
        if (names.length === 0) {
            logger.warn(`[PROFILE] No ${role} profiles found in ${dir}`);
        } else {
            logger.info(`[PROFILE] Loaded ${role} profiles: ${names.join(', ')}`);
        }
    }

    return registry;
}

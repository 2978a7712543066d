/**
 * Profile Registry
 *
 * In-memory ProfileProvider. Profiles are keyed by file name per role.
 * Until switchProfile() picks one, the active profile is
 * `<role>_profile.json` when registered, otherwise the first registered.
 */

import { adjustProfileWeights } from '../agents/weights';
import { ProfileProvider, Weights } from '../agents/types';
import { AgentProfile, AgentRole, WeightSignals } from '../types';
import logger from '../utils/logger';

export class ProfileRegistry implements ProfileProvider {
    private readonly profiles: Record<AgentRole, Map<string, AgentProfile>> = {
        retail: new Map(),
        monkey: new Map(),
    };
    private readonly active: Partial<Record<AgentRole, string>> = {};

    register(role: AgentRole, name: string, profile: AgentProfile): void {
        this.profiles[role].set(name, profile);
    }

    getActiveProfile(role: AgentRole): AgentProfile | undefined {
        const name = this.activeProfileName(role);
        return name === undefined ? undefined : this.profiles[role].get(name);
    }

    activeProfileName(role: AgentRole): string | undefined {
        const explicit = this.active[role];
        if (explicit !== undefined) return explicit;

        const loaded = this.profiles[role];
        const conventional = `${role}_profile.json`;
        if (loaded.has(conventional)) return conventional;

        const [first] = [...loaded.keys()];
        return first;
    }

    weightsFor(role: AgentRole, signals: WeightSignals): Weights {
        const profile = this.getActiveProfile(role);
        if (!profile) return {};
        return adjustProfileWeights(profile, role, signals);
    }

    listProfiles(role: AgentRole): string[] {
        return [...this.profiles[role].keys()];
    }

    switchProfile(role: AgentRole, name: string): boolean {
        if (!this.profiles[role].has(name)) {
            logger.warn(`[PROFILE] Unknown ${role} profile: ${name}`);
            return false;
        }
        this.active[role] = name;
        logger.info(`[PROFILE] ${role} profile switched to ${name}`);
        return true;
    }
}

/**
 * Profile Registry & Loader Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadProfilesFromDir, parseProfile, ProfileRegistry, roleForFile } from '../src/profiles';
import { createProfile } from './fixtures';

const PROFILES_DIR = path.resolve(__dirname, '../data/profiles');

describe('ProfileRegistry', () => {
    test('the conventional file name is active by default', () => {
        const registry = new ProfileRegistry();
        registry.register('retail', 'retail_alt.json', createProfile({ name: 'Alt' }));
        registry.register('retail', 'retail_profile.json', createProfile({ name: 'Main' }));

        expect(registry.getActiveProfile('retail')?.name).toBe('Main');
    });

    test('otherwise the first registered profile is active', () => {
        const registry = new ProfileRegistry();
        registry.register('monkey', 'monkey_b.json', createProfile({ name: 'B' }));
        registry.register('monkey', 'monkey_c.json', createProfile({ name: 'C' }));

        expect(registry.activeProfileName('monkey')).toBe('monkey_b.json');
        expect(registry.getActiveProfile('retail')).toBeUndefined();
    });

    test('switchProfile only accepts registered names', () => {
        const registry = new ProfileRegistry();
        registry.register('retail', 'retail_a.json', createProfile({ name: 'A' }));
        registry.register('retail', 'retail_b.json', createProfile({ name: 'B' }));

        expect(registry.switchProfile('retail', 'retail_x.json')).toBe(false);
        expect(registry.getActiveProfile('retail')?.name).toBe('A');

        expect(registry.switchProfile('retail', 'retail_b.json')).toBe(true);
        expect(registry.getActiveProfile('retail')?.name).toBe('B');
        expect(registry.listProfiles('retail')).toEqual(['retail_a.json', 'retail_b.json']);
    });

    test('weightsFor is empty without a profile and normalized with one', () => {
        const registry = new ProfileRegistry();
        expect(registry.weightsFor('retail', {})).toEqual({});

        registry.register('retail', 'retail_profile.json', createProfile({
            behaviorWeights: { spot_distance: 3, crowd_following: 1 },
        }));
        expect(registry.weightsFor('retail', {})).toEqual({ spot_distance: 0.75, crowd_following: 0.25 });
    });
});

describe('loadProfilesFromDir', () => {
    test('loads the bundled profiles', () => {
        const registry = loadProfilesFromDir(PROFILES_DIR);

        expect(registry.listProfiles('retail')).toEqual(['retail_contrarian.json', 'retail_profile.json']);
        expect(registry.listProfiles('monkey')).toEqual(['monkey_pinner.json', 'monkey_profile.json']);
        expect(registry.getActiveProfile('retail')?.name).toBe('Momentum Chaser');
        expect(registry.getActiveProfile('monkey')?.traits.reflexivity_awareness).toBe(true);
    });

    test('skips invalid and unrelated files', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'profiles-'));
        try {
            const valid = {
                name: 'Valid',
                goal: 'g',
                traits: { fomo_threshold: 0.2 },
                strategies: [],
                biases: {},
                behavior_weights: { spot_distance: 1 },
            };
            fs.writeFileSync(path.join(dir, 'retail_valid.json'), JSON.stringify(valid));
            fs.writeFileSync(path.join(dir, 'retail_broken.json'), '{ not json');
            fs.writeFileSync(path.join(dir, 'monkey_incomplete.json'), JSON.stringify({ name: 'x' }));
            fs.writeFileSync(path.join(dir, 'notes.json'), JSON.stringify(valid));

            const registry = loadProfilesFromDir(dir);
            expect(registry.listProfiles('retail')).toEqual(['retail_valid.json']);
            expect(registry.listProfiles('monkey')).toEqual([]);
            expect(registry.getActiveProfile('retail')?.behaviorWeights).toEqual({ spot_distance: 1 });
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });

    test('a missing directory yields an empty registry', () => {
        const registry = loadProfilesFromDir(path.join(os.tmpdir(), 'no-such-profiles-dir-for-tests'));
        expect(registry.listProfiles('retail')).toEqual([]);
    });
});

describe('profile parsing', () => {
    test('maps snake_case weights', () => {
        const profile = parseProfile({
            name: 'n',
            goal: 'g',
            traits: { reflexivity_awareness: false },
            strategies: ['s'],
            biases: { recency: 0.1 },
            behavior_weights: { hit_history: 1 },
        });
        expect(profile.behaviorWeights).toEqual({ hit_history: 1 });
        expect(profile.traits).toEqual({ reflexivity_awareness: false });
    });

    test('roles come from the file prefix', () => {
        expect(roleForFile('retail_profile.json')).toBe('retail');
        expect(roleForFile('monkey_pinner.json')).toBe('monkey');
        expect(roleForFile('monkey_notes.txt')).toBeUndefined();
        expect(roleForFile('profile.json')).toBeUndefined();
    });
});

/**
 * Behavioral profiles: registry and file loader
 */

export { ProfileRegistry } from './ProfileRegistry';
export { loadProfilesFromDir, parseProfile, roleForFile } from './loader';

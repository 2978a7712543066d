/**
 * Fatal configuration problem surfaced to the caller before an episode
 * starts: empty strike universe, unknown default equipment, malformed
 * profile, portfolio or environment configuration.
 */
export class ConfigurationError extends Error {
    constructor(
        public readonly reason: string,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(`[CONFIGURATION_ERROR] ${reason}`);
        this.name = 'ConfigurationError';
    }
}

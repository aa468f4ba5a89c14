/**
 * @fileoverview Configuration types for `.tagnotes.json`.
 * No dependencies on other type modules.
 *
 * @module types/config
 */

/**
 * Which repository connector to use.
 * - auto: GitHub when the repository is hosted there, plain git otherwise
 * - git: local git commands only (commits as change units, no issues)
 * - github: git for tags and hashes, the GitHub API for PRs and issues
 * - mock: deterministic in-memory data
 */
export type ConnectorKind = 'auto' | 'git' | 'github' | 'mock';

/**
 * GitHub connector settings.
 */
export interface GitHubConfig {
    /** Repository owner; derived from the origin remote when null */
    readonly owner: string | null;
    /** Repository name; derived from the origin remote when null */
    readonly repo: string | null;
    /** Environment variable holding the API token */
    readonly tokenEnv: string;
    /** REST API base URL (GitHub Enterprise installs use their own) */
    readonly apiUrl: string;
}

/**
 * Controls what the tools emit.
 */
export interface ReportConfig {
    /** When false, known issues are left out of emitted build information */
    readonly includeKnownIssues: boolean;
}

/**
 * Root configuration object.
 *
 * @example
 * const config: TagnotesConfig = {
 *   version: 1,
 *   connector: 'github',
 *   concurrency: 8,
 *   github: { owner: 'example', repo: 'repo', tokenEnv: 'GITHUB_TOKEN', apiUrl: 'https://api.github.com' },
 *   report: { includeKnownIssues: true }
 * };
 */
export interface TagnotesConfig {
    /** Config schema version */
    readonly version: 1;
    readonly connector: ConnectorKind;
    /** Upper bound on concurrent detail lookups */
    readonly concurrency: number;
    readonly github: GitHubConfig;
    readonly report: ReportConfig;
}

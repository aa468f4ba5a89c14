/**
 * @fileoverview Configuration management for tagnotes.
 * Handles loading, validation and merging of `.tagnotes.json` files.
 *
 * @module state/config
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { AsyncResult, Result } from '../types/base.js';
import type {
    GitHubConfig,
    ReportConfig,
    TagnotesConfig,
} from '../types/config.js';
import { ok, err } from '../utils/result.js';
import { DEFAULT_API_URL } from '../connectors/github.js';

// ============================================================
// Types
// ============================================================

/**
 * Error types for configuration operations.
 */
export type ConfigError =
    | { readonly type: 'io'; readonly message: string }
    | { readonly type: 'parse'; readonly message: string }
    | { readonly type: 'validation'; readonly message: string };

/**
 * A configuration override; every section and field is optional.
 */
export interface ConfigOverride {
    readonly version?: 1;
    readonly connector?: TagnotesConfig['connector'];
    readonly concurrency?: number;
    readonly github?: Partial<GitHubConfig>;
    readonly report?: Partial<ReportConfig>;
}

// ============================================================
// Constants
// ============================================================

export const CONFIG_FILE = '.tagnotes.json';

const DEFAULT_GITHUB: GitHubConfig = {
    owner: null,
    repo: null,
    tokenEnv: 'GITHUB_TOKEN',
    apiUrl: DEFAULT_API_URL,
};

const DEFAULT_REPORT: ReportConfig = {
    includeKnownIssues: true,
};

// ============================================================
// Schema
// ============================================================

const ConfigOverrideSchema = z
    .object({
        version: z.literal(1).optional(),
        connector: z.enum(['auto', 'git', 'github', 'mock']).optional(),
        concurrency: z.number().int().min(1).max(64).optional(),
        github: z
            .object({
                owner: z.string().min(1).nullable().optional(),
                repo: z.string().min(1).nullable().optional(),
                tokenEnv: z.string().min(1).optional(),
                apiUrl: z.string().url().optional(),
            })
            .strict()
            .optional(),
        report: z
            .object({
                includeKnownIssues: z.boolean().optional(),
            })
            .strict()
            .optional(),
    })
    .strict();

// ============================================================
// Default Configuration
// ============================================================

/**
 * Returns the default configuration.
 *
 * @example
 * getDefault().connector; // 'auto'
 */
export function getDefault(): TagnotesConfig {
    return {
        version: 1,
        connector: 'auto',
        concurrency: 8,
        github: DEFAULT_GITHUB,
        report: DEFAULT_REPORT,
    };
}

// ============================================================
// Configuration Loading
// ============================================================

/**
 * Loads `.tagnotes.json` from a repository root.
 * A missing file yields the defaults.
 *
 * @example
 * const result = await loadConfig(process.cwd());
 * if (!result.ok) {
 *   console.error('[tagnotes] bad config:', result.error.message);
 * }
 */
export async function loadConfig(root: string): AsyncResult<TagnotesConfig, ConfigError> {
    const file = path.join(root, CONFIG_FILE);

    let json: string;
    try {
        json = await fs.readFile(file, 'utf-8');
    } catch (e) {
        if (isMissingFile(e)) {
            return ok(getDefault());
        }
        const message = e instanceof Error ? e.message : String(e);
        return err({ type: 'io', message: `Failed to load config: ${message}` });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        return err({ type: 'parse', message: `Invalid JSON in ${CONFIG_FILE}: ${message}` });
    }

    const validated = validateConfig(parsed);
    if (!validated.ok) {
        return validated;
    }
    return ok(mergeConfigs(getDefault(), validated.value));
}

function isMissingFile(e: unknown): boolean {
    return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}

// ============================================================
// Configuration Validation
// ============================================================

/**
 * Validates a parsed object as a configuration override.
 * Unknown keys are rejected.
 */
export function validateConfig(obj: unknown): Result<ConfigOverride, ConfigError> {
    const result = ConfigOverrideSchema.safeParse(obj);
    if (!result.success) {
        const first = result.error.issues[0];
        const where = first && first.path.length > 0 ? first.path.join('.') : 'config';
        return err({ type: 'validation', message: `${where}: ${first?.message ?? 'invalid'}` });
    }
    return ok(result.data);
}

// ============================================================
// Configuration Merging
// ============================================================

/**
 * Merges an override into a base configuration, section by section.
 *
 * @example
 * const merged = mergeConfigs(getDefault(), { github: { owner: 'example' } });
 * merged.github.tokenEnv; // 'GITHUB_TOKEN'
 */
export function mergeConfigs(base: TagnotesConfig, override: ConfigOverride): TagnotesConfig {
    return {
        version: 1,
        connector: override.connector ?? base.connector,
        concurrency: override.concurrency ?? base.concurrency,
        github: mergeGitHub(base.github, override.github),
        report: mergeReport(base.report, override.report),
    };
}

function mergeGitHub(base: GitHubConfig, override?: Partial<GitHubConfig>): GitHubConfig {
    if (!override) return base;
    return {
        owner: override.owner !== undefined ? override.owner : base.owner,
        repo: override.repo !== undefined ? override.repo : base.repo,
        tokenEnv: override.tokenEnv ?? base.tokenEnv,
        apiUrl: override.apiUrl ?? base.apiUrl,
    };
}

function mergeReport(base: ReportConfig, override?: Partial<ReportConfig>): ReportConfig {
    if (!override) return base;
    return {
        includeKnownIssues: override.includeKnownIssues ?? base.includeKnownIssues,
    };
}

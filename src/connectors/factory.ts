/**
 * @fileoverview Connector selection from configuration.
 *
 * @module connectors/factory
 */

import type { AsyncResult, Logger } from '../types/base.js';
import type { ConnectorKind, TagnotesConfig } from '../types/config.js';
import { ok, err } from '../utils/result.js';
import { GitConnector } from './git.js';
import {
    GitHubConnector,
    createGitHubClient,
    parseGitHubRemote,
    type GitHubRepository,
} from './github.js';
import { MockConnector, type MockRepositoryData } from './mock.js';
import { createCommandRunner, type CommandRunner } from './process.js';
import type { RepositoryConnector } from './types.js';

// ============================================================
// Types
// ============================================================

/**
 * Why a connector could not be created.
 */
export type ConnectorSelectionError =
    | { readonly type: 'missing-token'; readonly message: string }
    | { readonly type: 'unknown-repository'; readonly message: string };

/**
 * Process-level inputs to connector selection. Everything defaults to the
 * real process; tests pass their own.
 */
export interface ConnectorDependencies {
    readonly cwd?: string;
    readonly env?: Readonly<Record<string, string | undefined>>;
    readonly runner?: CommandRunner;
    readonly logger?: Logger;
    readonly mockData?: MockRepositoryData;
}

// ============================================================
// Selection
// ============================================================

/**
 * Whether the environment or the origin remote says the repository lives on GitHub.
 */
function detectKind(
    remote: string | null,
    env: Readonly<Record<string, string | undefined>>
): Exclude<ConnectorKind, 'auto'> {
    if (env['GITHUB_ACTIONS'] || env['GITHUB_WORKSPACE']) {
        return 'github';
    }
    return remote !== null && /github\.com/i.test(remote) ? 'github' : 'git';
}

function resolveRepository(config: TagnotesConfig, remote: string | null): GitHubRepository | null {
    const fromRemote = remote === null ? null : parseGitHubRemote(remote);
    const owner = config.github.owner ?? fromRemote?.owner;
    const repo = config.github.repo ?? fromRemote?.repo;
    return owner && repo ? { owner, repo } : null;
}

/**
 * Creates the connector named by `config.connector`.
 *
 * In `auto` mode a GitHub repository without a token falls back to the git
 * connector with a warning; an explicit `github` setting fails instead.
 *
 * @example
 * const result = await createConnector(config, { cwd: '/path/to/repo' });
 * if (result.ok) {
 *   const info = await createBuildInformation(result.value);
 * }
 */
export async function createConnector(
    config: TagnotesConfig,
    deps: ConnectorDependencies = {}
): AsyncResult<RepositoryConnector, ConnectorSelectionError> {
    if (config.connector === 'mock') {
        return ok(new MockConnector(deps.mockData));
    }

    const env = deps.env ?? process.env;
    const runner = deps.runner ?? createCommandRunner(deps.cwd ?? process.cwd());
    const git = new GitConnector(runner);
    if (config.connector === 'git') {
        return ok(git);
    }

    const remote = await git.getRemoteUrl();
    if (config.connector === 'auto' && detectKind(remote, env) === 'git') {
        return ok(git);
    }

    const token = env[config.github.tokenEnv];
    const repository = resolveRepository(config, remote);

    if (!token || !repository) {
        const failure: ConnectorSelectionError = !token
            ? { type: 'missing-token', message: `GitHub token not found in $${config.github.tokenEnv}` }
            : { type: 'unknown-repository', message: 'GitHub owner/repo not configured and not derivable from the origin remote' };

        if (config.connector === 'auto') {
            deps.logger?.warn(`[tagnotes] ${failure.message}; using the git connector`);
            return ok(git);
        }
        return err(failure);
    }

    return ok(new GitHubConnector({
        git,
        repository,
        octokit: createGitHubClient(token, config.github.apiUrl),
        concurrency: config.concurrency,
        ...(deps.logger ? { logger: deps.logger } : {}),
    }));
}

/**
 * @fileoverview Connector module exports.
 *
 * @module connectors
 */

export type { RepositoryConnector } from './types.js';

// Command execution
export { createCommandRunner, outputLines, CommandError } from './process.js';
export type { CommandRunner } from './process.js';

// Implementations
export { GitConnector, validateTagName } from './git.js';
export type { CommitRecord } from './git.js';
export { GitHubConnector, parseGitHubRemote, DEFAULT_API_URL, createGitHubClient } from './github.js';
export type { GitHubConnectorOptions, GitHubRepository } from './github.js';
export { MockConnector, DEFAULT_MOCK_DATA } from './mock.js';
export type { MockRepositoryData, MockTag, MockPullRequest, MockIssue } from './mock.js';

// Selection
export { createConnector } from './factory.js';
export type { ConnectorSelectionError, ConnectorDependencies } from './factory.js';

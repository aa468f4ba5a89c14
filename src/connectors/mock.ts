/**
 * @fileoverview Deterministic in-memory connector.
 * Backs the `mock` connector setting and the engine's tests.
 *
 * Each pull request records the first tag that contains it; a range
 * `(from, to]` yields the PRs whose tag lies after `from` and at or before
 * `to`. PRs with a null tag are untagged work on top of the newest tag and
 * only appear when the target is not tagged yet.
 *
 * @module connectors/mock
 */

import type { ChangeUnit, IssueDetails, IssueId } from '../types/build.js';
import type { Version } from '../types/version.js';
import { ConnectorError } from '../core/errors.js';
import type { RepositoryConnector } from './types.js';

// ============================================================
// Types
// ============================================================

export interface MockTag {
    readonly name: string;
    readonly hash: string;
}

export interface MockPullRequest {
    readonly number: number;
    readonly title: string;
    readonly labels: readonly string[];
    readonly issues: readonly IssueId[];
    /** First tag containing the PR, null for untagged work */
    readonly tag: string | null;
}

export interface MockIssue {
    readonly id: IssueId;
    readonly title: string;
    readonly labels: readonly string[];
    readonly open: boolean;
}

/**
 * Complete mock repository.
 */
export interface MockRepositoryData {
    /** Oldest first */
    readonly tags: readonly MockTag[];
    readonly currentHash: string;
    readonly pullRequests: readonly MockPullRequest[];
    readonly issues: readonly MockIssue[];
    readonly baseUrl: string;
}

// ============================================================
// Default Data
// ============================================================

/**
 * Five tags mixing prefixes and pre-releases, four PRs (one without linked
 * issues), five issues of which two are open bugs. The checkout is at `2.0.0`.
 */
export const DEFAULT_MOCK_DATA: MockRepositoryData = {
    tags: [
        { name: 'v1.0.0', hash: 'abc123def456' },
        { name: 'ver-1.1.0', hash: 'def456ghi789' },
        { name: 'release_2.0.0-beta.1', hash: 'ghi789jkl012' },
        { name: 'v2.0.0-rc.1', hash: 'jkl012mno345' },
        { name: '2.0.0', hash: 'mno345pqr678' },
    ],
    currentHash: 'mno345pqr678',
    pullRequests: [
        { number: 10, title: 'Add feature X', labels: ['enhancement'], issues: ['1'], tag: 'v1.0.0' },
        { number: 13, title: 'Tidy CI workflow', labels: [], issues: [], tag: 'ver-1.1.0' },
        { number: 11, title: 'Fix bug in Y', labels: ['bug'], issues: ['2'], tag: 'release_2.0.0-beta.1' },
        { number: 12, title: 'Update documentation', labels: ['documentation'], issues: ['3'], tag: 'v2.0.0-rc.1' },
    ],
    issues: [
        { id: '1', title: 'Add feature X', labels: ['feature'], open: false },
        { id: '2', title: 'Fix bug in Y', labels: ['bug'], open: false },
        { id: '3', title: 'Update documentation', labels: ['documentation'], open: false },
        { id: '4', title: 'Known bug A', labels: ['bug'], open: true },
        { id: '5', title: 'Known bug B', labels: ['bug'], open: true },
    ],
    baseUrl: 'https://github.com/example/repo',
};

// ============================================================
// Connector
// ============================================================

/**
 * Repository connector over a {@link MockRepositoryData} value.
 */
export class MockConnector implements RepositoryConnector {
    constructor(private readonly data: MockRepositoryData = DEFAULT_MOCK_DATA) {}

    async getTagHistory(): Promise<string[]> {
        return this.data.tags.map(tag => tag.name);
    }

    async getHashForTag(tag: string | null): Promise<string> {
        if (tag === null) {
            return this.data.currentHash;
        }
        const found = this.data.tags.find(t => t.name === tag);
        if (!found) {
            throw new ConnectorError(`Unknown tag: ${tag}`, 'getHashForTag', { tag });
        }
        return found.hash;
    }

    async getChangeUnitsBetween(from: Version | null, to: Version): Promise<ChangeUnit[]> {
        const position = (name: string | null): number => {
            const index = name === null ? -1 : this.data.tags.findIndex(t => t.name === name);
            return index === -1 ? this.data.tags.length : index;
        };
        const lower = from ? position(from.tag) : -1;
        const upper = position(to.tag);

        return this.data.pullRequests
            .filter(pr => {
                const at = position(pr.tag);
                return at > lower && at <= upper;
            })
            .map((pr): ChangeUnit => ({
                id: String(pr.number),
                kind: 'pull-request',
                title: pr.title,
                url: `${this.data.baseUrl}/pull/${pr.number}`,
                labels: pr.labels,
                order: pr.number,
            }));
    }

    async getLinkedIssues(unit: ChangeUnit): Promise<IssueId[]> {
        const pr = this.data.pullRequests.find(p => String(p.number) === unit.id);
        return pr ? [...pr.issues] : [];
    }

    async getIssueDetails(id: IssueId): Promise<IssueDetails> {
        const issue = this.data.issues.find(i => i.id === id);
        if (!issue) {
            throw new ConnectorError(`Unknown issue: ${id}`, 'getIssueDetails', { id });
        }
        return this.toDetails(issue);
    }

    async getOpenIssues(): Promise<IssueDetails[]> {
        return this.data.issues.filter(issue => issue.open).map(issue => this.toDetails(issue));
    }

    private toDetails(issue: MockIssue): IssueDetails {
        return {
            id: issue.id,
            title: issue.title,
            url: `${this.data.baseUrl}/issues/${issue.id}`,
            labels: issue.labels,
        };
    }
}

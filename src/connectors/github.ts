/**
 * @fileoverview Connector backed by git plus the GitHub API.
 * Tags, hashes and the commit range come from local git. Pull requests are
 * looked up per commit in that range and kept when their merge commit lies
 * inside it; linked issues are the PR's closing references.
 *
 * @module connectors/github
 */

import { Octokit } from '@octokit/rest';
import { z } from 'zod';
import type { Logger } from '../types/base.js';
import type { ChangeUnit, IssueDetails, IssueId } from '../types/build.js';
import type { Version } from '../types/version.js';
import { ConnectorError, errorMessage } from '../core/errors.js';
import { mapInBatches } from '../utils/batch.js';
import type { GitConnector } from './git.js';
import type { RepositoryConnector } from './types.js';

// ============================================================
// Constants
// ============================================================

export const DEFAULT_API_URL = 'https://api.github.com';

const DEFAULT_CONCURRENCY = 8;

const NUMERIC_ID_PATTERN = /^\d+$/;

/** Closing references are only exposed through GraphQL */
const LINKED_ISSUES_QUERY = `
query($owner: String!, $repo: String!, $number: Int!) {
  repository(owner: $owner, name: $repo) {
    pullRequest(number: $number) {
      closingIssuesReferences(first: 100) { nodes { number } }
    }
  }
}`;

// ============================================================
// Response Schemas
// ============================================================

const LabelsSchema = z
    .array(z.union([z.string(), z.object({ name: z.string().nullish() })]))
    .nullish();

const PullRequestSchema = z.object({
    number: z.number().int(),
    title: z.string(),
    html_url: z.string(),
    merged_at: z.string().nullable(),
    merge_commit_sha: z.string().nullable(),
    labels: LabelsSchema,
});

const IssueSchema = z.object({
    number: z.number().int(),
    title: z.string(),
    html_url: z.string(),
    labels: LabelsSchema,
    pull_request: z.unknown().optional(),
});

const LinkedIssuesSchema = z.object({
    repository: z.object({
        pullRequest: z
            .object({
                closingIssuesReferences: z.object({ nodes: z.array(z.unknown()).nullable() }).nullable(),
            })
            .nullable(),
    }),
});

const IssueNumberSchema = z.object({ number: z.number().int() });

type PullRequest = z.infer<typeof PullRequestSchema>;

// ============================================================
// Helpers
// ============================================================

/**
 * Owner and repository name of a GitHub remote.
 */
export interface GitHubRepository {
    readonly owner: string;
    readonly repo: string;
}

/**
 * Extracts owner and repository from a GitHub remote URL.
 *
 * @example
 * parseGitHubRemote('git@github.com:example/repo.git');   // { owner: 'example', repo: 'repo' }
 * parseGitHubRemote('https://gitlab.com/example/repo');   // null
 */
export function parseGitHubRemote(url: string): GitHubRepository | null {
    const match = /github\.com[:/]([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/i.exec(url.trim());
    const owner = match?.[1];
    const repo = match?.[2];
    if (!owner || !repo) {
        return null;
    }
    return { owner, repo };
}

function labelNames(labels: z.infer<typeof LabelsSchema>): string[] {
    const names: string[] = [];
    for (const label of labels ?? []) {
        const name = typeof label === 'string' ? label : label.name;
        if (name) names.push(name);
    }
    return names;
}

function toIssueDetails(issue: z.infer<typeof IssueSchema>): IssueDetails {
    return {
        id: String(issue.number),
        title: issue.title,
        url: issue.html_url,
        labels: labelNames(issue.labels),
    };
}

// ============================================================
// Connector
// ============================================================

/**
 * Options for {@link GitHubConnector}.
 */
export interface GitHubConnectorOptions {
    readonly git: GitConnector;
    readonly repository: GitHubRepository;
    /** Authenticated client */
    readonly octokit: Octokit;
    /** Maximum concurrent per-commit lookups (default 8) */
    readonly concurrency?: number;
    readonly logger?: Logger;
}

/**
 * Repository connector for GitHub-hosted repositories.
 */
export class GitHubConnector implements RepositoryConnector {
    private readonly git: GitConnector;
    private readonly repository: GitHubRepository;
    private readonly octokit: Octokit;
    private readonly concurrency: number;
    private readonly logger: Logger | undefined;

    constructor(options: GitHubConnectorOptions) {
        this.git = options.git;
        this.repository = options.repository;
        this.octokit = options.octokit;
        this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
        this.logger = options.logger;
    }

    getTagHistory(): Promise<string[]> {
        return this.git.getTagHistory();
    }

    getHashForTag(tag: string | null): Promise<string> {
        return this.git.getHashForTag(tag);
    }

    /**
     * Merged pull requests whose merge commit is one of the range's commits,
     * in the order their merge commits appear.
     */
    async getChangeUnitsBetween(from: Version | null, to: Version): Promise<ChangeUnit[]> {
        const commits = await this.git.getCommitsBetween(from, to);
        const inRange = new Set(commits.map(commit => commit.hash));
        const perCommit = await mapInBatches(commits, this.concurrency, commit =>
            this.pullRequestsFor(commit.hash)
        );

        const seen = new Set<number>();
        const units: ChangeUnit[] = [];
        for (const pr of perCommit.flat()) {
            if (pr.merged_at === null || pr.merge_commit_sha === null) continue;
            if (!inRange.has(pr.merge_commit_sha) || seen.has(pr.number)) continue;
            seen.add(pr.number);
            units.push({
                id: String(pr.number),
                kind: 'pull-request',
                title: pr.title,
                url: pr.html_url,
                labels: labelNames(pr.labels),
                order: pr.number,
            });
        }
        return units;
    }

    async getLinkedIssues(unit: ChangeUnit): Promise<IssueId[]> {
        if (unit.kind !== 'pull-request') {
            return [];
        }
        const number = this.parseNumber(unit.id, 'getLinkedIssues');
        const data = await this.call('getLinkedIssues', () =>
            this.octokit.graphql<unknown>(LINKED_ISSUES_QUERY, { ...this.repository, number })
        );
        const parsed = LinkedIssuesSchema.safeParse(data);
        if (!parsed.success) {
            throw new ConnectorError(`Unexpected response for pull request ${unit.id}`, 'getLinkedIssues', parsed.error.issues);
        }

        const ids: IssueId[] = [];
        for (const node of parsed.data.repository.pullRequest?.closingIssuesReferences?.nodes ?? []) {
            const issue = IssueNumberSchema.safeParse(node);
            if (issue.success) {
                ids.push(String(issue.data.number));
            } else {
                this.skip('linked issue', issue.error.message);
            }
        }
        return ids;
    }

    async getIssueDetails(id: IssueId): Promise<IssueDetails> {
        const number = this.parseNumber(id, 'getIssueDetails');
        const response = await this.call('getIssueDetails', () =>
            this.octokit.rest.issues.get({ ...this.repository, issue_number: number })
        );
        const issue = IssueSchema.safeParse(response.data);
        if (!issue.success) {
            throw new ConnectorError(`Issue ${id} not found or malformed`, 'getIssueDetails', issue.error.issues);
        }
        return toIssueDetails(issue.data);
    }

    async getOpenIssues(): Promise<IssueDetails[]> {
        const items = await this.call('getOpenIssues', () =>
            this.octokit.paginate(this.octokit.rest.issues.listForRepo, {
                ...this.repository,
                state: 'open',
                per_page: 100,
            })
        );

        const issues: IssueDetails[] = [];
        for (const item of items) {
            const issue = IssueSchema.safeParse(item);
            if (!issue.success) {
                this.skip('open issue', issue.error.message);
            } else if (issue.data.pull_request === undefined) {
                issues.push(toIssueDetails(issue.data));
            }
        }
        return issues;
    }

    // --------------------------------------------------------
    // Requests
    // --------------------------------------------------------

    private async pullRequestsFor(sha: string): Promise<PullRequest[]> {
        const response = await this.call('getChangeUnitsBetween', () =>
            this.octokit.rest.repos.listPullRequestsAssociatedWithCommit({
                ...this.repository,
                commit_sha: sha,
                per_page: 100,
            })
        );

        const pulls: PullRequest[] = [];
        for (const node of response.data) {
            const pr = PullRequestSchema.safeParse(node);
            if (pr.success) {
                pulls.push(pr.data);
            } else {
                this.skip('pull request', pr.error.message);
            }
        }
        return pulls;
    }

    private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
        try {
            return await request();
        } catch (error) {
            throw new ConnectorError(`GitHub request failed: ${errorMessage(error)}`, operation, error);
        }
    }

    private parseNumber(id: string, operation: string): number {
        if (!NUMERIC_ID_PATTERN.test(id)) {
            throw new ConnectorError(`Invalid ID: ${id}`, operation, { id });
        }
        return Number.parseInt(id, 10);
    }

    private skip(kind: string, reason: string): void {
        this.logger?.debug?.(`[tagnotes] skipped malformed ${kind}: ${reason}`);
    }
}

/**
 * Creates an authenticated client for an API base URL.
 *
 * @example
 * const octokit = createGitHubClient(process.env.GITHUB_TOKEN ?? '', DEFAULT_API_URL);
 */
export function createGitHubClient(token: string, baseUrl: string): Octokit {
    return new Octokit({ auth: token, baseUrl, userAgent: 'tagnotes' });
}

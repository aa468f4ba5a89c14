/**
 * @fileoverview Connector backed by local git commands.
 * Change units are the commits in range; there is no issue tracker, so no
 * unit has linked issues and there are no open issues.
 *
 * @module connectors/git
 */

import type { ChangeUnit, IssueDetails, IssueId } from '../types/build.js';
import type { Version } from '../types/version.js';
import { ConnectorError, errorMessage } from '../core/errors.js';
import type { RepositoryConnector } from './types.js';
import { outputLines, type CommandRunner } from './process.js';

// ============================================================
// Constants
// ============================================================

/** Tag names passed to git; a leading '-' would be read as an option */
const TAG_NAME_PATTERN = /^[a-zA-Z0-9._/+][a-zA-Z0-9._/+-]*$/;

/** Unit separator between fields of `git log` output */
const FIELD_SEPARATOR = '\x1f';

const SHORT_HASH_LENGTH = 7;

// ============================================================
// Helpers
// ============================================================

/**
 * Checks a tag name before it is handed to git.
 *
 * @throws ConnectorError for names outside the allowed character set
 */
export function validateTagName(tag: string): string {
    if (!TAG_NAME_PATTERN.test(tag)) {
        throw new ConnectorError(`Invalid tag name: ${tag}`, 'validateTagName', { tag });
    }
    return tag;
}

/**
 * A commit as read from `git log`.
 */
export interface CommitRecord {
    readonly hash: string;
    readonly subject: string;
}

function parseCommitLine(line: string): CommitRecord | null {
    const separator = line.indexOf(FIELD_SEPARATOR);
    if (separator <= 0) {
        return null;
    }
    return { hash: line.slice(0, separator), subject: line.slice(separator + 1) };
}

// ============================================================
// Connector
// ============================================================

/**
 * Repository connector that shells out to git.
 */
export class GitConnector implements RepositoryConnector {
    constructor(private readonly runner: CommandRunner) {}

    async getTagHistory(): Promise<string[]> {
        const output = await this.git('getTagHistory', ['tag', '--sort=creatordate', '--merged', 'HEAD']);
        return outputLines(output);
    }

    async getHashForTag(tag: string | null): Promise<string> {
        const ref = tag === null ? 'HEAD' : validateTagName(tag);
        const output = await this.git('getHashForTag', ['rev-parse', '--verify', `${ref}^{commit}`]);
        return output.trim();
    }

    /**
     * Whether a tag exists. A target version that is not tagged yet is
     * described against HEAD. A name git could not hold as a tag is never tagged.
     */
    async tagExists(tag: string): Promise<boolean> {
        if (!TAG_NAME_PATTERN.test(tag)) {
            return false;
        }
        const output = await this.runner.tryRun('git', ['rev-parse', '--verify', '--quiet', `refs/tags/${validateTagName(tag)}`]);
        return output !== null && output !== '';
    }

    /**
     * Commits after `from` up to `to` (or HEAD when `to` is not tagged), oldest first.
     */
    async getCommitsBetween(from: Version | null, to: Version): Promise<CommitRecord[]> {
        const toRef = (await this.tagExists(to.tag)) ? to.tag : 'HEAD';
        const range = from ? `${validateTagName(from.tag)}..${toRef}` : toRef;
        const output = await this.git('getChangeUnitsBetween', [
            'log',
            '--reverse',
            `--format=%H${FIELD_SEPARATOR}%s`,
            range,
        ]);

        const commits: CommitRecord[] = [];
        for (const line of outputLines(output)) {
            const commit = parseCommitLine(line);
            if (commit) commits.push(commit);
        }
        return commits;
    }

    async getChangeUnitsBetween(from: Version | null, to: Version): Promise<ChangeUnit[]> {
        const commits = await this.getCommitsBetween(from, to);
        return commits.map((commit, index): ChangeUnit => ({
            id: commit.hash.slice(0, SHORT_HASH_LENGTH),
            kind: 'commit',
            title: commit.subject,
            url: '',
            labels: [],
            order: index + 1,
        }));
    }

    async getLinkedIssues(_unit: ChangeUnit): Promise<IssueId[]> {
        return [];
    }

    async getIssueDetails(id: IssueId): Promise<IssueDetails> {
        throw new ConnectorError(`Issue ${id} cannot be looked up without an issue tracker`, 'getIssueDetails', { id });
    }

    async getOpenIssues(): Promise<IssueDetails[]> {
        return [];
    }

    /**
     * URL of the origin remote, or null when there is none.
     */
    async getRemoteUrl(): Promise<string | null> {
        const output = await this.runner.tryRun('git', ['remote', 'get-url', 'origin']);
        return output === null || output.trim() === '' ? null : output.trim();
    }

    private async git(operation: string, args: readonly string[]): Promise<string> {
        try {
            return await this.runner.run('git', args);
        } catch (error) {
            throw new ConnectorError(errorMessage(error), operation, error);
        }
    }
}

/**
 * @fileoverview The repository connector capability the engine depends on.
 *
 * @module connectors/types
 */

import type { ChangeUnit, IssueDetails, IssueId } from '../types/build.js';
import type { Version } from '../types/version.js';

/**
 * Source of tags, commits, pull requests and issues.
 *
 * Tag history and hashes are structural: implementations throw when they
 * cannot produce them. The assembler decides which other failures degrade.
 */
export interface RepositoryConnector {
    /** Raw tag names reachable from the current branch, oldest first */
    getTagHistory(): Promise<string[]>;

    /** Commit hash of a tag, or of the current checkout when `tag` is null */
    getHashForTag(tag: string | null): Promise<string>;

    /** Change units after `from` (exclusive) up to `to` (inclusive), in range order */
    getChangeUnitsBetween(from: Version | null, to: Version): Promise<ChangeUnit[]>;

    /** Issues a change unit resolves */
    getLinkedIssues(unit: ChangeUnit): Promise<IssueId[]>;

    getIssueDetails(id: IssueId): Promise<IssueDetails>;

    getOpenIssues(): Promise<IssueDetails[]>;
}

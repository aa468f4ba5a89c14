/**
 * @fileoverview Types for change units, issues and assembled build information.
 * Imports only from types/version.ts.
 *
 * @module types/build
 */

import type { Version } from './version.js';

// ============================================================
// Categories
// ============================================================

/**
 * Category of a change, derived from its labels.
 */
export type ChangeCategory =
    | 'bug'
    | 'feature'
    | 'documentation'
    | 'performance'
    | 'security'
    | 'other';

// ============================================================
// Connector Data
// ============================================================

/**
 * Kind of a change unit. Pull request items are reported as `#<id>`,
 * commit items by their abbreviated hash.
 */
export type ChangeUnitKind = 'pull-request' | 'commit';

/**
 * A pull request or commit within the baseline..target range.
 *
 * @example
 * const unit: ChangeUnit = {
 *   id: '13',
 *   kind: 'pull-request',
 *   title: 'Tidy CI workflow',
 *   url: 'https://github.com/example/repo/pull/13',
 *   labels: [],
 *   order: 13
 * };
 */
export interface ChangeUnit {
    /** PR number or commit hash */
    readonly id: string;
    readonly kind: ChangeUnitKind;
    readonly title: string;
    readonly url: string;
    readonly labels: readonly string[];
    /**
     * Intrinsic ordering key: the PR number for pull requests, the 1-based
     * position within the range for commits.
     */
    readonly order: number;
}

/** Issue identifier as reported by the tracker (a number in string form) */
export type IssueId = string;

/**
 * Issue fields needed to categorize and list it.
 */
export interface IssueDetails {
    readonly id: IssueId;
    readonly title: string;
    readonly url: string;
    readonly labels: readonly string[];
}

// ============================================================
// Output
// ============================================================

/**
 * One entry of the changes, bugs or known-issues lists.
 */
export interface ChangeItem {
    /** `#<n>` for pull requests, the issue number for issues */
    readonly id: string;
    readonly title: string;
    readonly url: string;
    readonly category: ChangeCategory;
    /** Sort key only; never used for identity */
    readonly orderIndex: number;
}

/**
 * Build information for one target version.
 * The three lists are pairwise disjoint by id.
 */
export interface BuildInformation {
    /** Baseline version, null when comparing from the start of history */
    readonly fromVersion: Version | null;
    readonly toVersion: Version;
    readonly fromHash: string | null;
    readonly toHash: string;
    /** Non-bug changes in the range */
    readonly changes: readonly ChangeItem[];
    /** Bugs fixed in the range */
    readonly bugs: readonly ChangeItem[];
    /** Open bugs not fixed in the range */
    readonly knownIssues: readonly ChangeItem[];
}

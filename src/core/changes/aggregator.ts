/**
 * @fileoverview Change aggregation.
 *
 * Folds change units and their linked issues into three disjoint lists:
 * changes, bugs and known issues. The fold is pure; every fetch has already
 * happened by the time it runs.
 *
 * @module core/changes/aggregator
 */

import type {
    ChangeItem,
    ChangeUnit,
    IssueDetails,
    IssueId,
} from '../../types/build.js';
import { categorizeLabels } from './categories.js';

// ============================================================
// Types
// ============================================================

/**
 * Everything the fold needs, already fetched.
 */
export interface AggregationInput {
    /** Change units in range order */
    readonly units: readonly ChangeUnit[];
    /** Linked issue ids per unit id; a missing entry means no linked issues */
    readonly linkedIssues: ReadonlyMap<string, readonly IssueId[]>;
    /** Details per issue id; a missing entry falls back to {@link fallbackIssueDetails} */
    readonly issueDetails: ReadonlyMap<IssueId, IssueDetails>;
    /** Issues currently open */
    readonly openIssues: readonly IssueDetails[];
}

/**
 * The three categorized lists, pairwise disjoint by id.
 */
export interface AggregationResult {
    readonly changes: readonly ChangeItem[];
    readonly bugs: readonly ChangeItem[];
    readonly knownIssues: readonly ChangeItem[];
}

/**
 * Fold accumulator. Each step returns a new value.
 */
interface Accumulator {
    readonly processed: ReadonlySet<string>;
    readonly changes: readonly ChangeItem[];
    readonly bugs: readonly ChangeItem[];
}

const EMPTY: Accumulator = { processed: new Set<string>(), changes: [], bugs: [] };

// ============================================================
// Item Construction
// ============================================================

/**
 * Id under which a unit without linked issues is reported.
 */
export function unitItemId(unit: ChangeUnit): string {
    return unit.kind === 'pull-request' ? `#${unit.id}` : unit.id;
}

/**
 * Sort key of an issue: its number, with non-numeric ids sorted last.
 */
export function issueOrder(id: IssueId): number {
    return /^\d+$/.test(id) ? Number.parseInt(id, 10) : Number.MAX_SAFE_INTEGER;
}

/**
 * Placeholder used when an issue's details could not be fetched.
 */
export function fallbackIssueDetails(id: IssueId): IssueDetails {
    return { id, title: `Issue ${id}`, url: '', labels: [] };
}

function unitToItem(unit: ChangeUnit): ChangeItem {
    return {
        id: unitItemId(unit),
        title: unit.title,
        url: unit.url,
        category: categorizeLabels(unit.labels),
        orderIndex: unit.order,
    };
}

function issueToItem(issue: IssueDetails): ChangeItem {
    return {
        id: issue.id,
        title: issue.title,
        url: issue.url,
        category: categorizeLabels(issue.labels),
        orderIndex: issueOrder(issue.id),
    };
}

// ============================================================
// Fold
// ============================================================

function record(acc: Accumulator, item: ChangeItem): Accumulator {
    if (acc.processed.has(item.id)) {
        return acc;
    }
    const processed = new Set(acc.processed).add(item.id);
    return item.category === 'bug'
        ? { processed, changes: acc.changes, bugs: [...acc.bugs, item] }
        : { processed, changes: [...acc.changes, item], bugs: acc.bugs };
}

function step(input: AggregationInput) {
    return (acc: Accumulator, unit: ChangeUnit): Accumulator => {
        const issueIds = input.linkedIssues.get(unit.id) ?? [];
        if (issueIds.length === 0) {
            return record(acc, unitToItem(unit));
        }
        return issueIds.reduce((inner, id) => {
            if (inner.processed.has(id)) {
                return inner;
            }
            const details = input.issueDetails.get(id) ?? fallbackIssueDetails(id);
            return record(inner, issueToItem({ ...details, id }));
        }, acc);
    };
}

/**
 * Stable sort by orderIndex, ascending.
 */
export function sortByOrder(items: readonly ChangeItem[]): ChangeItem[] {
    return items
        .map((item, position) => ({ item, position }))
        .sort((a, b) => a.item.orderIndex - b.item.orderIndex || a.position - b.position)
        .map(entry => entry.item);
}

/**
 * Aggregates change units into changes, bugs and known issues.
 *
 * - A unit without linked issues is reported itself, categorized by its labels.
 * - A unit with linked issues is reported through those issues instead.
 * - An id is reported at most once, in the first list it lands in.
 * - Open bugs not already reported become known issues.
 *
 * @example
 * const result = aggregateChanges({
 *   units: [{ id: '13', kind: 'pull-request', title: 'PR #13', url: '', labels: [], order: 13 }],
 *   linkedIssues: new Map(),
 *   issueDetails: new Map(),
 *   openIssues: [],
 * });
 * // result.changes: [{ id: '#13', category: 'other', ... }]
 */
export function aggregateChanges(input: AggregationInput): AggregationResult {
    const folded = input.units.reduce(step(input), EMPTY);

    const known = input.openIssues.reduce<{ seen: ReadonlySet<string>; items: readonly ChangeItem[] }>(
        (acc, issue) => {
            if (folded.processed.has(issue.id) || acc.seen.has(issue.id)) {
                return acc;
            }
            const item = issueToItem(issue);
            if (item.category !== 'bug') {
                return acc;
            }
            return { seen: new Set(acc.seen).add(issue.id), items: [...acc.items, item] };
        },
        { seen: new Set<string>(), items: [] }
    );

    return {
        changes: sortByOrder(folded.changes),
        bugs: sortByOrder(folded.bugs),
        knownIssues: sortByOrder(known.items),
    };
}

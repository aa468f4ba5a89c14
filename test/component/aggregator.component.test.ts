/**
 * @fileoverview Component tests for change aggregation.
 * Exercises categorization, deduplication, known-issue selection and ordering
 * together through aggregateChanges.
 *
 * @module test/component/aggregator
 */

import { describe, it, expect } from 'vitest';
import { aggregateChanges, sortByOrder, type AggregationInput } from '../../src/core/changes/aggregator.js';
import type { ChangeItem, ChangeUnit, IssueDetails } from '../../src/types/build.js';

// ============================================================
// Test Helpers
// ============================================================

const pr = (id: number, title: string, labels: string[] = []): ChangeUnit => ({
    id: String(id),
    kind: 'pull-request',
    title,
    url: `https://example.test/pull/${id}`,
    labels,
    order: id,
});

const issue = (id: string, title: string, labels: string[] = []): IssueDetails => ({
    id,
    title,
    url: `https://example.test/issues/${id}`,
    labels,
});

const input = (overrides: Partial<AggregationInput>): AggregationInput => ({
    units: [],
    linkedIssues: new Map(),
    issueDetails: new Map(),
    openIssues: [],
    ...overrides,
});

const ids = (items: readonly ChangeItem[]): string[] => items.map(item => item.id);

// ============================================================
// Units Without Linked Issues
// ============================================================

describe('aggregateChanges - units without linked issues', () => {
    it('reports an unlabeled pull request under its own number', () => {
        const result = aggregateChanges(input({ units: [pr(13, 'PR #13')] }));

        expect(result.changes).toEqual([{
            id: '#13',
            title: 'PR #13',
            url: 'https://example.test/pull/13',
            category: 'other',
            orderIndex: 13,
        }]);
        expect(result.bugs).toEqual([]);
        expect(result.knownIssues).toEqual([]);
    });

    it('reports a commit under its bare id', () => {
        const commit: ChangeUnit = { id: 'abc1234', kind: 'commit', title: 'Fix typo', url: '', labels: [], order: 1 };

        const result = aggregateChanges(input({ units: [commit] }));

        expect(ids(result.changes)).toEqual(['abc1234']);
    });

    it('sends a bug-labeled pull request to bugs', () => {
        const result = aggregateChanges(input({ units: [pr(7, 'Crash on start', ['type: bug'])] }));

        expect(result.changes).toEqual([]);
        expect(result.bugs).toEqual([{
            id: '#7',
            title: 'Crash on start',
            url: 'https://example.test/pull/7',
            category: 'bug',
            orderIndex: 7,
        }]);
    });
});

// ============================================================
// Units With Linked Issues
// ============================================================

describe('aggregateChanges - linked issues', () => {
    it('reports the linked issues instead of the unit', () => {
        const result = aggregateChanges(input({
            units: [pr(10, 'Add feature X', ['enhancement'])],
            linkedIssues: new Map([['10', ['1']]]),
            issueDetails: new Map([['1', issue('1', 'Feature X request', ['documentation'])]]),
        }));

        expect(result.changes).toEqual([{
            id: '1',
            title: 'Feature X request',
            url: 'https://example.test/issues/1',
            category: 'documentation',
            orderIndex: 1,
        }]);
    });

    it('reports an issue linked from several units once', () => {
        const result = aggregateChanges(input({
            units: [pr(20, 'Part one'), pr(21, 'Part two')],
            linkedIssues: new Map([['20', ['5']], ['21', ['5', '6']]]),
            issueDetails: new Map([
                ['5', issue('5', 'Slow startup', ['performance'])],
                ['6', issue('6', 'Wrong total', ['bug'])],
            ]),
        }));

        expect(ids(result.changes)).toEqual(['5']);
        expect(ids(result.bugs)).toEqual(['6']);
    });

    it('uses a placeholder for issues without details', () => {
        const result = aggregateChanges(input({
            units: [pr(30, 'Something')],
            linkedIssues: new Map([['30', ['9']]]),
        }));

        expect(result.changes).toEqual([{ id: '9', title: 'Issue 9', url: '', category: 'other', orderIndex: 9 }]);
    });

    it('keeps the requested id even when details report another', () => {
        const result = aggregateChanges(input({
            units: [pr(31, 'Something')],
            linkedIssues: new Map([['31', ['4']]]),
            issueDetails: new Map([['4', issue('40', 'Moved issue')]]),
        }));

        expect(ids(result.changes)).toEqual(['4']);
    });

    it('keeps pull request ids and issue ids apart', () => {
        const result = aggregateChanges(input({
            units: [pr(5, 'Unlinked PR'), pr(6, 'Linked PR')],
            linkedIssues: new Map([['6', ['5']]]),
            issueDetails: new Map([['5', issue('5', 'Issue five')]]),
        }));

        expect(ids(result.changes)).toEqual(['#5', '5']);
    });
});

// ============================================================
// Known Issues
// ============================================================

describe('aggregateChanges - known issues', () => {
    it('lists open bugs that were not fixed in range', () => {
        const result = aggregateChanges(input({
            units: [pr(11, 'Fix bug in Y')],
            linkedIssues: new Map([['11', ['2']]]),
            issueDetails: new Map([['2', issue('2', 'Fix bug in Y', ['bug'])]]),
            openIssues: [
                issue('2', 'Fix bug in Y', ['bug']),
                issue('5', 'Known bug B', ['bug']),
                issue('4', 'Known bug A', ['Defect']),
                issue('8', 'Wish list', ['enhancement']),
                issue('5', 'Known bug B', ['bug']),
            ],
        }));

        expect(ids(result.bugs)).toEqual(['2']);
        expect(result.knownIssues).toEqual([
            { id: '4', title: 'Known bug A', url: 'https://example.test/issues/4', category: 'bug', orderIndex: 4 },
            { id: '5', title: 'Known bug B', url: 'https://example.test/issues/5', category: 'bug', orderIndex: 5 },
        ]);
    });
});

// ============================================================
// Ordering
// ============================================================

describe('aggregateChanges - ordering', () => {
    it('sorts each list by order index', () => {
        const result = aggregateChanges(input({
            units: [pr(12, 'Later'), pr(3, 'Earlier'), pr(8, 'Middle')],
        }));

        expect(ids(result.changes)).toEqual(['#3', '#8', '#12']);
    });

    it('sorts non-numeric issue ids last', () => {
        const result = aggregateChanges(input({
            units: [pr(1, 'One')],
            linkedIssues: new Map([['1', ['JIRA-7', '42']]]),
        }));

        expect(ids(result.changes)).toEqual(['42', 'JIRA-7']);
        expect(result.changes[1]?.orderIndex).toBe(Number.MAX_SAFE_INTEGER);
    });

    it('keeps insertion order between equal order indices', () => {
        const items: ChangeItem[] = [
            { id: 'b', title: 'B', url: '', category: 'other', orderIndex: 2 },
            { id: 'a', title: 'A', url: '', category: 'other', orderIndex: 1 },
            { id: 'c', title: 'C', url: '', category: 'other', orderIndex: 2 },
        ];

        expect(ids(sortByOrder(items))).toEqual(['a', 'b', 'c']);
    });
});

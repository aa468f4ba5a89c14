/**
 * @fileoverview Label-based change categorization.
 *
 * Labels are matched by case-insensitive substring against an ordered keyword
 * table. Labels are tried in the order given; for each label the table is
 * tried top to bottom. The first hit decides the category.
 *
 * @module core/changes/categories
 */

import type { ChangeCategory } from '../../types/build.js';

// ============================================================
// Keyword Table
// ============================================================

/**
 * Keyword to category mapping, in match order.
 */
export const LABEL_KEYWORDS: ReadonlyArray<readonly [keyword: string, category: ChangeCategory]> = [
    ['bug', 'bug'],
    ['defect', 'bug'],
    ['feature', 'feature'],
    ['enhancement', 'feature'],
    ['documentation', 'documentation'],
    ['performance', 'performance'],
    ['security', 'security'],
];

// ============================================================
// Categorization
// ============================================================

/**
 * Derives a category from a set of labels.
 *
 * @param labels - Labels in the order the tracker reports them
 * @returns The first matching category, or 'other'
 *
 * @example
 * categorizeLabels(['Type: Enhancement', 'bug']); // 'feature'
 * categorizeLabels(['wontfix']);                  // 'other'
 */
export function categorizeLabels(labels: readonly string[]): ChangeCategory {
    for (const label of labels) {
        const lower = label.toLowerCase();
        for (const [keyword, category] of LABEL_KEYWORDS) {
            if (lower.includes(keyword)) {
                return category;
            }
        }
    }
    return 'other';
}

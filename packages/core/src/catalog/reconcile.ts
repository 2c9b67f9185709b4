/**
 * Catalog reconciliation: merge discovered workbooks into a collection.
 *
 * PURE FUNCTION: Returns a new collection. Does not mutate input.
 */

import type { Workbook } from '../types/index.js';
import type { ReconcileResult, WorkbookCollection } from './types.js';

/**
 * Merge discovered candidates into an existing collection.
 *
 * - Candidate id absent -> inserted.
 * - Candidate id present -> existing entry kept as is, including its loaded
 *   state and any reclassification.
 * - Existing entry without a candidate -> kept. Removal is a separate,
 *   explicit operation (see removeWorkbooks).
 *
 * Running it twice with the same candidates adds nothing the second time.
 */
export function reconcile(
    existing: WorkbookCollection,
    discovered: readonly Workbook[]
): ReconcileResult {
    const updated = new Map(existing);
    const addedIds: string[] = [];

    for (const candidate of discovered) {
        if (updated.has(candidate.wb_id)) {
            continue;
        }
        updated.set(candidate.wb_id, candidate);
        addedIds.push(candidate.wb_id);
    }

    return { updated, addedIds };
}

/**
 * Workbooks of a collection in display order (sorted by id).
 */
export function sortedWorkbooks(collection: WorkbookCollection): Workbook[] {
    return [...collection.values()].sort((a, b) => compareIds(a.wb_id, b.wb_id));
}

/**
 * Code-unit ordering, independent of locale.
 */
export function compareIds(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

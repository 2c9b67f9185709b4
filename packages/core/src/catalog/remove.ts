/**
 * Stale-entry detection and explicit removal.
 *
 * Rescans never remove entries. A stale entry (cataloged, but not found by
 * the latest successful scan of its folder) is only reported; it leaves the
 * catalog through removeWorkbooks.
 */

import type { Workbook } from '../types/index.js';
import type { ScannedScope, WorkbookCollection } from './types.js';
import { compareIds } from './reconcile.js';

/**
 * Ids of entries whose folder was scanned successfully but which were not
 * rediscovered. Entries in folders that were not scanned (unreachable,
 * unmapped) are never reported.
 */
export function findStaleIds(
    existing: WorkbookCollection,
    discovered: readonly Workbook[],
    scanned: readonly ScannedScope[]
): string[] {
    const found = new Set(discovered.map((wb) => wb.wb_id));
    const stale: string[] = [];

    for (const wb of existing.values()) {
        if (found.has(wb.wb_id)) continue;
        const inScannedScope = scanned.some(
            (scope) =>
                scope.wfKey === wb.wf_key &&
                scope.purpose === wb.wf_purpose &&
                scope.folder === wb.wf_folder
        );
        if (inScannedScope) {
            stale.push(wb.wb_id);
        }
    }

    return stale.sort(compareIds);
}

export interface RemoveResult {
    updated: WorkbookCollection;
    removed: Workbook[];
    /** Requested ids that were not in the collection */
    missingIds: string[];
}

/**
 * Remove entries by id.
 *
 * PURE FUNCTION: Returns a new collection. Does not mutate input.
 */
export function removeWorkbooks(
    collection: WorkbookCollection,
    ids: readonly string[]
): RemoveResult {
    const updated = new Map(collection);
    const removed: Workbook[] = [];
    const missingIds: string[] = [];

    for (const id of ids) {
        const wb = updated.get(id);
        if (!wb) {
            missingIds.push(id);
            continue;
        }
        updated.delete(id);
        removed.push(wb);
    }

    return { updated, removed, missingIds };
}

import type { Purpose, Workbook } from '../types/index.js';

/**
 * Workbooks of one FI keyed by id. Display order is the id-sorted order.
 */
export type WorkbookCollection = ReadonlyMap<string, Workbook>;

export interface ReconcileResult {
    updated: WorkbookCollection;
    /** Ids inserted by this pass, in discovery order */
    addedIds: string[];
}

/**
 * One (workflow, purpose, folder) scope of an FI whose folder was scanned
 * successfully.
 */
export interface ScannedScope {
    wfKey: string;
    purpose: Purpose;
    folder: string;
}

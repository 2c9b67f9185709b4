import type { Purpose } from '../types/index.js';

/**
 * Folder role a workflow maps to one purpose.
 */
export interface PurposeFolder {
    folderId: string;
    /** Relative folder as configured, e.g. "data/new" */
    folder: string;
}

export interface InitializeOptions {
    /** Create missing folders. Defaults to the store's `create_missing_folders` option. */
    createMissingFolders?: boolean;
    /** Propagate the first FI or folder failure. Defaults to the store's `raise_on_errors` option. */
    raiseOnErrors?: boolean;
    /** Checked between FIs; an aborted run stops before the next FI. */
    signal?: AbortSignal;
}

/**
 * Non-fatal problem with one (FI, workflow, purpose) folder: the folder was
 * skipped and the remaining folders were still processed.
 */
export interface ReconciliationWarning {
    fiKey: string;
    wfKey: string;
    purpose: Purpose;
    folder: string;
    path?: string;
    reason: string;
}

export interface SkippedFi {
    fiKey: string;
    reason: string;
}

/**
 * Outcome of one initialization run.
 */
export interface InitializeReport {
    rootPath: string;
    /** FIs whose folders were fully processed */
    fiCount: number;
    workflowCount: number;
    /** Catalog size after the run, all FIs */
    workbookCount: number;
    /** Folders scanned successfully */
    scannedFolderCount: number;
    addedIds: string[];
    /** Cataloged entries not found in their (successfully scanned) folder */
    staleIds: string[];
    warnings: ReconciliationWarning[];
    skippedFis: SkippedFi[];
    cancelled: boolean;
    digest: string;
}

/**
 * Gateways through which the headless core reaches storage.
 *
 * Core never touches the filesystem itself. The CLI package provides
 * node:fs implementations; tests provide in-memory ones.
 */

import type { BudgetStore, Workbook } from '../types/index.js';

/**
 * A workbook file found in a folder.
 */
export interface FileDescriptor {
    /** Filename with extension, e.g. "A.xlsx" */
    name: string;
    /** Filename without extension */
    stem: string;
    /** Lower-case extension with leading dot */
    extension: string;
    /** file:// URL of the file */
    url: string;
}

/**
 * Result of scanning one folder. A folder that could not be read yields no
 * files and a diagnostic instead of an exception.
 */
export interface ScanResult {
    files: FileDescriptor[];
    diagnostic?: string;
}

export interface VerifyOptions {
    /** Create the folder (and its parents) when missing */
    create: boolean;
    /** Throw NotFoundError instead of returning false when missing */
    raiseOnMissing: boolean;
}

/**
 * Path/Folder Resolver plus folder scanner.
 */
export interface FolderGateway {
    /**
     * Join configured segments into an absolute path.
     * Throws ConfigurationError for an empty segment.
     */
    resolve(root: string, fiFolder?: string, wfFolder?: string): string;
    verify(path: string, options: VerifyOptions): Promise<boolean>;
    scan(path: string): Promise<ScanResult>;
}

export interface StoreAck {
    url: string;
    bytes: number;
}

export interface SaveAck extends StoreAck {
    /** Content digest of what was written, "sha256:<hex>" */
    digest: string;
}

/**
 * Workbook content persistence. Content is opaque to core.
 */
export interface WorkbookContentStore<TContent> {
    load(workbook: Workbook): Promise<TContent>;
    save(workbook: Workbook, content: TContent): Promise<SaveAck>;
}

/**
 * Configuration record persistence.
 */
export interface ConfigStore {
    get(url: string): Promise<BudgetStore>;
    put(record: BudgetStore, url: string): Promise<StoreAck>;
}

/**
 * Workbook discovery: folder scan results -> candidate catalog entries.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Scan problems come back as a
 * diagnostic string, never as an exception.
 */

import { WB_TYPES, WB_TYPE_UNKNOWN } from '../types/index.js';
import type { Purpose, Workbook, WorkbookType } from '../types/index.js';
import type { FileDescriptor, FolderGateway, ScanResult } from '../storage/types.js';
import { errorMessage } from '../errors.js';
import { workbookId } from './workbook-id.js';

/**
 * Where a folder sits in the catalog: one (FI, workflow, purpose) triple
 * and the folder role mapped to it.
 */
export interface DiscoveryContext {
    fiKey: string;
    wfKey: string;
    purpose: Purpose;
    folderId: string;
    folder: string;
}

export interface DiscoveryResult {
    workbooks: Workbook[];
    diagnostic?: string;
}

/**
 * Classify a workbook from its filename stem.
 * First known type contained in the lower-cased stem wins.
 */
export function classifyWorkbook(stem: string): WorkbookType {
    const lower = stem.toLowerCase();
    for (const type of WB_TYPES) {
        if (lower.includes(type)) {
            return type;
        }
    }
    return WB_TYPE_UNKNOWN;
}

/**
 * Build candidate workbooks for the descriptors of one folder.
 * Pure: same descriptors and context always give the same ids.
 */
export function buildCandidates(
    descriptors: readonly FileDescriptor[],
    context: DiscoveryContext
): Workbook[] {
    return descriptors.map((file) => ({
        wb_id: workbookId({
            fiKey: context.fiKey,
            wfKey: context.wfKey,
            purpose: context.purpose,
            folder: context.folder,
            name: file.name,
        }),
        wb_name: file.name,
        wb_stem: file.stem,
        wb_filetype: file.extension,
        wb_type: classifyWorkbook(file.stem),
        wb_url: file.url,
        fi_key: context.fiKey,
        wf_key: context.wfKey,
        wf_purpose: context.purpose,
        wf_folder_id: context.folderId,
        wf_folder: context.folder,
        wb_loaded: false,
    }));
}

/**
 * Scan a resolved folder and build its candidates.
 *
 * A folder that is missing or unreadable yields zero candidates and a
 * diagnostic. An empty folder yields zero candidates and no diagnostic.
 */
export async function discoverWorkbooks(
    gateway: FolderGateway,
    folderPath: string,
    context: DiscoveryContext
): Promise<DiscoveryResult> {
    let scan: ScanResult;
    try {
        scan = await gateway.scan(folderPath);
    } catch (err) {
        return { workbooks: [], diagnostic: `Scan failed for ${folderPath}: ${errorMessage(err)}` };
    }

    if (scan.diagnostic) {
        return { workbooks: [], diagnostic: scan.diagnostic };
    }

    return { workbooks: buildCandidates(scan.files, context) };
}

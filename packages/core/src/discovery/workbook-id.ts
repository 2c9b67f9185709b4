/**
 * Workbook id composition.
 *
 * Format: "{fi_key}|{wf_key}|{wf_purpose}|{wf_folder}|{wb_name}"
 *
 * The id is a pure function of where the file sits in the catalog, so the
 * same physical file rescanned always gets the same id, and files in
 * different (FI, workflow, purpose, folder) contexts never collide.
 */

import { WORKBOOK_ID } from '../types/index.js';
import type { Purpose } from '../types/index.js';

export interface WorkbookIdParts {
    fiKey: string;
    wfKey: string;
    purpose: Purpose;
    folder: string;
    name: string;
}

/**
 * Build the catalog id of a workbook.
 *
 * @throws Error if a part is empty or contains the separator (except the
 * filename, which is always the last part)
 */
export function workbookId(parts: WorkbookIdParts): string {
    const prefix = [parts.fiKey, parts.wfKey, parts.purpose, parts.folder];
    for (const part of prefix) {
        if (part.length === 0 || part.includes(WORKBOOK_ID.SEPARATOR)) {
            throw new Error(`Invalid workbook id part: "${part}"`);
        }
    }
    if (parts.name.length === 0) {
        throw new Error('Invalid workbook id part: empty filename');
    }
    return [...prefix, parts.name].join(WORKBOOK_ID.SEPARATOR);
}

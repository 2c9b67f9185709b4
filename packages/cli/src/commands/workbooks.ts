import type { Workbook } from '@budget-workbench/shared';
import { openSession, persistSession } from '../session.js';
import { log, warn } from '../utils/console.js';
import type { WorkbooksOptions } from '../types.js';

/**
 * List the catalog of the current FI (or --fi <key|all>) in display order.
 */
export async function listWorkbooks(options: WorkbooksOptions): Promise<void> {
    const session = await openSession(options);
    const { model, context } = session;

    const fiKeys = options.fi ? model.selectFiKeys(options.fi) : context.fiKey ? [context.fiKey] : [];
    if (fiKeys.length === 0) {
        warn('No FI configured.');
        return;
    }

    for (const fiKey of fiKeys) {
        log(`\n${model.fi(fiKey).fi_name} (${fiKey})`);
        const workbooks = model.sortedWorkbooks(fiKey);
        if (workbooks.length === 0) {
            log('  (no workbooks)');
            continue;
        }
        const currentId = context.fiKey === fiKey ? context.currentWorkbook?.id : undefined;
        workbooks.forEach((wb, index) => log(formatWorkbookLine(index, wb, wb.wb_id === currentId)));
    }

    await persistSession(session);
}

/**
 * One catalog line: selection marker, index, type, workflow/purpose, name.
 */
export function formatWorkbookLine(index: number, wb: Workbook, current: boolean): string {
    const marker = current ? '*' : ' ';
    const loaded = wb.wb_loaded ? 'loaded' : '';
    const error = wb.wb_last_error ? `  [error: ${wb.wb_last_error}]` : '';
    return `${marker} ${String(index).padStart(3)}  ${wb.wb_type.padEnd(14)} ${`${wb.wf_key}/${wb.wf_purpose}`.padEnd(24)} ${wb.wb_name}${loaded ? `  (${loaded})` : ''}${error}`;
}

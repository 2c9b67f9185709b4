import { errorMessage } from '@budget-workbench/core';
import { openSession, persistSession, resolveTargets } from '../session.js';
import { summarizeWorkbook } from '../excel/register.js';
import { arrow, log, success, warn } from '../utils/console.js';
import type { GlobalOptions } from '../types.js';

export interface CheckSummary {
    loaded: number;
    failed: number;
}

/**
 * Load each referenced workbook and print its sheets. Load failures are
 * recorded on the catalog entry and reported; the rest still load.
 */
export async function checkWorkbooks(ref: string | undefined, options: GlobalOptions): Promise<CheckSummary> {
    const session = await openSession(options);
    const { context } = session;
    const targets = resolveTargets(context, ref);

    const summary: CheckSummary = { loaded: 0, failed: 0 };
    for (const workbook of targets.workbooks) {
        try {
            const content = await context.load(workbook);
            summary.loaded++;
            success(workbook.wb_name);
            for (const sheet of summarizeWorkbook(content)) {
                arrow(`${sheet.name}: ${sheet.rows} row(s), ${sheet.columns} column(s)`);
            }
        } catch (err) {
            summary.failed++;
            warn(`${workbook.wb_name}: ${errorMessage(err)}`);
        }
    }

    log(`\nLoaded ${summary.loaded}, failed ${summary.failed}`);
    await persistSession(session);
    return summary;
}

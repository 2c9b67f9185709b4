import { ConfigurationError } from '@budget-workbench/core';
import { openSession, persistSession, unmatchedRef } from '../session.js';
import { describeSelection } from './status.js';
import { success } from '../utils/console.js';
import type { UseOptions } from '../types.js';

/**
 * Change the current FI / workflow / purpose / workbook and save the
 * selection as the workspace default.
 */
export async function useSelection(options: UseOptions): Promise<string> {
    const session = await openSession(options);
    const { context } = session;

    if (options.fi) context.setFi(options.fi);
    if (options.wf) context.setWorkflow(options.wf);
    if (options.purpose) context.setPurpose(options.purpose);
    if (options.workbook) {
        const resolved = context.selectWorkbook(options.workbook);
        if (resolved.isAll) {
            throw new ConfigurationError('"all" cannot be the current workbook');
        }
        if (!resolved.workbook) {
            throw unmatchedRef(context, options.workbook);
        }
    }

    await persistSession(session);
    const selection = describeSelection(context);
    success(`Current: ${selection}`);
    return selection;
}

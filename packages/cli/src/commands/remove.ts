import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ConfigurationError, type RemoveResult } from '@budget-workbench/core';
import { openSession, persistSession, resolveTargets } from '../session.js';
import { promptContinue } from '../utils/prompt.js';
import { info, success, warn } from '../utils/console.js';
import type { RemoveOptions } from '../types.js';

/**
 * Drop one workbook from the catalog. The file itself is left alone.
 */
export async function removeWorkbook(ref: string, options: RemoveOptions): Promise<RemoveResult | null> {
    const session = await openSession(options);
    const { context } = session;
    const targets = resolveTargets(context, ref);
    const [target] = targets.workbooks;
    if (targets.isAll) {
        throw new ConfigurationError('Refusing to remove "all"; name one workbook');
    }
    if (!target) {
        return null;
    }

    const confirmed = await promptContinue(`Remove ${target.wb_id} from the catalog?`, options.yes);
    if (!confirmed) {
        warn('Nothing removed.');
        return null;
    }

    const result = context.removeWorkbook({ kind: 'id', id: target.wb_id });
    await persistSession(session);
    success(`Removed ${target.wb_id}`);
    if (existsSync(fileURLToPath(target.wb_url))) {
        info(`The file is still on disk and will be cataloged again on the next scan: ${target.wb_url}`);
    }
    return result;
}

import type { BudgetDomainModel, DataContext, InitializeReport } from '@budget-workbench/core';
import { openSession, persistSession } from '../session.js';
import { arrow, info, log, success, warn } from '../utils/console.js';
import type { GlobalOptions } from '../types.js';

/**
 * Scan the workspace, report what was found and save the catalog.
 */
export async function showStatus(options: GlobalOptions): Promise<InitializeReport> {
    const session = await openSession(options);
    const { model, context, report } = session;

    log(`\nBudget Workbench - ${model.bdmId}`);
    success(`Workspace: ${session.workspace.root}`);
    printReport(report, model, options.verbose);
    arrow(`Current: ${describeSelection(context)}`);

    await persistSession(session);
    return report;
}

export function printReport(report: InitializeReport, model: BudgetDomainModel, verbose: boolean): void {
    arrow(`Budget folder: ${report.rootPath}`);

    if (report.cancelled) {
        warn('Scan cancelled; remaining FIs were not scanned.');
    }
    for (const w of report.warnings) {
        warn(`Skipped ${w.fiKey}/${w.wfKey}/${w.purpose} (${w.folder}): ${w.reason}`);
    }
    for (const skipped of report.skippedFis) {
        warn(`Skipped FI ${skipped.fiKey}: ${skipped.reason}`);
    }
    for (const id of report.staleIds) {
        warn(`Not found on disk: ${id} (use "budwb remove" to drop it)`);
    }

    arrow(`FIs processed: ${report.fiCount}/${model.fiKeys().length}`);
    arrow(`Workflows: ${report.workflowCount}`);
    arrow(`Folders scanned: ${report.scannedFolderCount}`);
    arrow(`Workbooks: ${report.workbookCount} (${report.addedIds.length} new)`);
    arrow(`Catalog digest: ${report.digest}`);

    if (verbose) {
        for (const fiKey of model.fiKeys()) {
            log(`  ${fiKey}: ${model.workbooks(fiKey).size} workbook(s)`);
        }
        for (const id of report.addedIds) {
            info(`New: ${id}`);
        }
    }
}

export function describeSelection<T>(context: DataContext<T>): string {
    const current = context.currentWorkbook;
    return [
        `fi=${context.fiKey ?? '-'}`,
        `wf=${context.wfKey ?? '-'}`,
        `purpose=${context.purpose ?? '-'}`,
        `workbook=${current ? `${current.index}:${current.name}` : '-'}`,
    ].join(' ');
}

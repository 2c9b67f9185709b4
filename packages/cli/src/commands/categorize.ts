import type { Workbook as ExcelWorkbook } from 'exceljs';
import type { CategorizationColumns, Workbook } from '@budget-workbench/shared';
import {
    ConfigurationError,
    categorizeDescription,
    compileRules,
    errorMessage,
    tallyByCategory,
    type CompiledRules,
    type TallyResult,
} from '@budget-workbench/core';
import { openSession, persistSession, resolveTargets, type Session } from '../session.js';
import { describeFile } from '../storage/folders.js';
import { loadCategoryRules } from '../workspace/config.js';
import {
    locateColumns,
    readRegisterRows,
    registerSheet,
    writeCategories,
    writeTotalsSheet,
} from '../excel/register.js';
import { arrow, info, log, success, warn } from '../utils/console.js';
import type { CategorizeOptions } from '../types.js';

export interface RegisterCategorization {
    sheetName: string;
    rowCount: number;
    tally: TallyResult;
}

/**
 * Categorize the register sheet of loaded workbook content: one category per
 * data row, and a fresh totals sheet.
 *
 * @throws ConfigurationError when the workbook has no register sheet or
 * lacks a configured column
 */
export function categorizeRegister(
    content: ExcelWorkbook,
    compiled: CompiledRules,
    columns: CategorizationColumns
): RegisterCategorization {
    const sheet = registerSheet(content);
    if (!sheet) {
        throw new ConfigurationError('Workbook has no register sheet');
    }
    const { layout, missing } = locateColumns(sheet, columns);
    if (!layout) {
        throw new ConfigurationError(`Sheet '${sheet.name}' is missing column(s): ${missing.join(', ')}`);
    }

    const rows = readRegisterRows(sheet, layout);
    writeCategories(
        sheet,
        layout,
        columns.category,
        rows.map(row => ({ rowNumber: row.rowNumber, category: categorizeDescription(row.description, compiled) }))
    );
    const tally = tallyByCategory(rows, compiled);
    writeTotalsSheet(content, tally.totals);
    return { sheetName: sheet.name, rowCount: rows.length, tally };
}

export interface CategorizeSummary {
    categorized: number;
    failed: number;
}

/**
 * Categorize the referenced input workbooks of the current workflow with
 * the workspace rules. Each result is written to the workflow's output
 * folder under its output name (unless --dry-run); the input stays as it
 * is. A workbook that fails is reported and the rest still run.
 */
export async function categorizeWorkbooks(
    ref: string | undefined,
    options: CategorizeOptions
): Promise<CategorizeSummary> {
    const session = await openSession(options);
    const { context, model, workspace } = session;
    const wfKey = context.wfKey;
    if (wfKey === null) {
        throw new ConfigurationError('No current workflow. Select one with "budwb use --wf <key>".');
    }
    if (!options.dryRun && !model.purposeFolder(wfKey, 'output')) {
        throw new ConfigurationError(`Workflow '${wfKey}' has no output folder`);
    }

    const isInput = (wb: Workbook) => wb.wf_key === wfKey && wb.wf_purpose === 'input';
    const targets = resolveTargets(context, ref);
    const workbooks = targets.isAll ? targets.workbooks.filter(isInput) : targets.workbooks;

    const compiled = compileRules(loadCategoryRules(workspace));
    for (const warning of compiled.warnings) {
        warn(warning);
    }
    info(`${compiled.rules.length} rule(s), fallback "${compiled.fallback}"`);

    const summary: CategorizeSummary = { categorized: 0, failed: 0 };
    for (const workbook of workbooks) {
        log(`\n${workbook.wb_name}`);
        try {
            if (!isInput(workbook)) {
                throw new ConfigurationError(`'${workbook.wb_name}' is not an input workbook of workflow '${wfKey}'`);
            }
            const content = await context.load(workbook);
            const result = categorizeRegister(content, compiled, model.options.columns);

            for (const warning of result.tally.warnings) {
                warn(`${result.sheetName}: ${warning}`);
            }
            for (const total of result.tally.totals) {
                arrow(`${total.category.padEnd(24)} ${String(total.count).padStart(5)}  ${total.total.padStart(12)}`);
            }
            arrow(`${'Net'.padEnd(24)} ${String(result.rowCount).padStart(5)}  ${result.tally.net.padStart(12)}`);

            if (options.dryRun) {
                info('Dry run: workbook not saved');
            } else {
                const output = await catalogOutput(session, workbook, wfKey);
                const ack = await context.saveAs(workbook, output);
                success(`Saved ${ack.url} (${ack.bytes} bytes, ${ack.digest.slice(0, 19)})`);
            }
            summary.categorized++;
        } catch (err) {
            summary.failed++;
            warn(`${workbook.wb_name}: ${errorMessage(err)}`);
        }
    }

    log(`\nCategorized ${summary.categorized}, failed ${summary.failed}`);
    await persistSession(session);
    return summary;
}

/**
 * Catalog entry a categorized workbook is written to: the workflow's output
 * folder of the same FI, under the workflow's output name. Legacy .xls
 * input is written as .xlsx.
 */
async function catalogOutput(session: Session, source: Workbook, wfKey: string): Promise<Workbook> {
    const { model, gateway } = session;
    const output = model.purposeFolder(wfKey, 'output');
    if (!output) {
        throw new ConfigurationError(`Workflow '${wfKey}' has no output folder`);
    }
    const folder = gateway.resolve(model.folder, model.fi(source.fi_key).fi_folder, output.folder);
    await gateway.verify(folder, { create: true, raiseOnMissing: true });

    const name = source.wb_filetype === '.xls' ? `${source.wb_stem}.xlsx` : source.wb_name;
    return model.catalogFile(source.fi_key, wfKey, 'output', describeFile(folder, model.outputName(wfKey, name)));
}

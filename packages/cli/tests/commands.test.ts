import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import exceljs from 'exceljs';
import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse } from 'yaml';
import { ConfigurationError, NotFoundError } from '@budget-workbench/core';
import { initWorkspace } from '../src/commands/init.js';
import { showStatus } from '../src/commands/status.js';
import { listWorkbooks, formatWorkbookLine } from '../src/commands/workbooks.js';
import { useSelection } from '../src/commands/use.js';
import { checkWorkbooks } from '../src/commands/check.js';
import { categorizeWorkbooks } from '../src/commands/categorize.js';
import { removeWorkbook } from '../src/commands/remove.js';
import { addRule } from '../src/commands/add-rule.js';
import { runCli } from '../src/cli.js';
import { createWorkbook } from '../src/excel/utils.js';
import { TOTALS_SHEET } from '../src/excel/register.js';
import { muteConsole, printed, useTempDir } from './helpers/temp.js';

const CATEGORIZATION_ID = 'boa|categorization|input|data/new|register.xlsx';
const INTAKE_ID = 'boa|intake|output|data/new|register.xlsx';
const OUTPUT_ID = 'boa|categorization|output|data/categorized|categorized_register.xlsx';

async function writeRegister(path: string): Promise<void> {
    const workbook = createWorkbook();
    const sheet = workbook.addWorksheet('Register');
    sheet.addRow(['Description', 'Amount']);
    sheet.addRow(['ACME PAYROLL', 2500]);
    sheet.addRow(['Corner Grocery Store', -82.15]);
    sheet.addRow(['Coffee shop', -4.5]);
    await workbook.xlsx.writeFile(path);
}

describe('workspace commands', () => {
    const tempDir = useTempDir();
    let output: ReturnType<typeof muteConsole>;

    beforeEach(() => {
        output = muteConsole();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    const options = () => ({ workspace: tempDir(), verbose: false });
    const newFolder = () => join(tempDir(), 'budget', 'boa', 'data', 'new');
    const categorizedFolder = () => join(tempDir(), 'budget', 'boa', 'data', 'categorized');

    it('init writes both stores and refuses to overwrite without --force', async () => {
        const workspace = await initWorkspace({ workspace: tempDir(), force: false });
        expect(existsSync(workspace.config.budgetStorePath)).toBe(true);
        expect(existsSync(workspace.config.categoryRulesPath)).toBe(true);

        await expect(initWorkspace({ workspace: tempDir(), force: false })).rejects.toBeInstanceOf(ConfigurationError);
        await expect(initWorkspace({ workspace: tempDir(), force: true })).resolves.toEqual(workspace);
    });

    it('status creates the workflow folders of every FI', async () => {
        await initWorkspace({ workspace: tempDir(), force: false });

        const report = await showStatus(options());

        expect(report.fiCount).toBe(2);
        expect(report.workflowCount).toBe(3);
        expect(report.scannedFolderCount).toBe(10);
        expect(report.workbookCount).toBe(0);
        expect(report.warnings).toEqual([]);
        for (const fi of ['boa', 'merrill']) {
            for (const folder of ['new', 'categorized', 'finalized']) {
                expect(existsSync(join(tempDir(), 'budget', fi, 'data', folder))).toBe(true);
            }
        }
    });

    it('status with --no-create reports missing folders instead', async () => {
        await initWorkspace({ workspace: tempDir(), force: false });

        await expect(showStatus({ ...options(), createMissingFolders: false })).rejects.toBeInstanceOf(NotFoundError);
        expect(existsSync(join(tempDir(), 'budget'))).toBe(false);
    });

    it('catalogs a workbook once per workflow purpose that maps its folder', async () => {
        await initWorkspace({ workspace: tempDir(), force: false });
        await showStatus(options());
        await writeRegister(join(newFolder(), 'register.xlsx'));

        const report = await showStatus(options());
        // workflows are scanned in configuration order: intake first
        expect(report.addedIds).toEqual([INTAKE_ID, CATEGORIZATION_ID]);
        expect(report.workbookCount).toBe(2);

        const stored = parse(await readFile(join(tempDir(), 'config', 'budget.yaml'), 'utf-8'));
        expect(stored.workbooks.boa.map((wb: { wb_id: string }) => wb.wb_id)).toEqual([CATEGORIZATION_ID, INTAKE_ID]);

        const again = await showStatus(options());
        expect(again.addedIds).toEqual([]);
        expect(again.workbookCount).toBe(2);
        expect(again.digest).toBe(report.digest);
    });

    it('use, check and categorize work on the selected workbook', async () => {
        await initWorkspace({ workspace: tempDir(), force: false });
        await showStatus(options());
        await writeRegister(join(newFolder(), 'register.xlsx'));

        const selection = await useSelection({ ...options(), workbook: '0' });
        expect(selection).toBe('fi=boa wf=categorization purpose=input workbook=0:register.xlsx');

        const summary = await checkWorkbooks(undefined, options());
        expect(summary).toEqual({ loaded: 1, failed: 0 });

        const input = await readFile(join(newFolder(), 'register.xlsx'));
        const done = await categorizeWorkbooks(undefined, { ...options(), dryRun: false });
        expect(done).toEqual({ categorized: 1, failed: 0 });
        expect(printed(output.log)).toContain(`→ ${'Net'.padEnd(24)} ${'3'.padStart(5)}  ${'2413.35'.padStart(12)}`);

        const saved = new exceljs.Workbook();
        await saved.xlsx.readFile(join(categorizedFolder(), 'categorized_register.xlsx'));
        const sheet = saved.getWorksheet('Register');
        expect([1, 2, 3, 4].map(r => sheet?.getRow(r).getCell(3).value)).toEqual([
            'Category',
            'Income',
            'Groceries',
            'Uncategorized',
        ]);
        expect(saved.getWorksheet(TOTALS_SHEET)).toBeDefined();
        expect((await readFile(join(newFolder(), 'register.xlsx'))).equals(input)).toBe(true);

        const stored = parse(await readFile(join(tempDir(), 'config', 'budget.yaml'), 'utf-8'));
        expect(stored.data_context.wb_ref).toBe(OUTPUT_ID);
        expect(stored.workbooks.boa.map((wb: { wb_id: string }) => wb.wb_id)).toEqual([
            CATEGORIZATION_ID,
            OUTPUT_ID,
            INTAKE_ID,
        ]);
    });

    it('categorize all reports failing workbooks and still saves the catalog', async () => {
        await initWorkspace({ workspace: tempDir(), force: false });
        await showStatus(options());
        const notes = createWorkbook();
        notes.addWorksheet('Notes').addRow(['Memo']);
        await notes.xlsx.writeFile(join(newFolder(), 'a_notes.xlsx'));
        await writeRegister(join(newFolder(), 'b_register.xlsx'));

        const summary = await categorizeWorkbooks('all', { ...options(), dryRun: false });

        expect(summary).toEqual({ categorized: 1, failed: 1 });
        expect(printed(output.warn)).toContain(
            "⚠️  a_notes.xlsx: Sheet 'Notes' is missing column(s): Description, Amount"
        );
        expect(existsSync(join(categorizedFolder(), 'categorized_b_register.xlsx'))).toBe(true);
        expect(existsSync(join(categorizedFolder(), 'categorized_a_notes.xlsx'))).toBe(false);

        const stored = parse(await readFile(join(tempDir(), 'config', 'budget.yaml'), 'utf-8'));
        expect(stored.workbooks.boa.map((wb: { wb_id: string }) => wb.wb_id)).toEqual([
            'boa|categorization|input|data/new|a_notes.xlsx',
            'boa|categorization|input|data/new|b_register.xlsx',
            'boa|categorization|output|data/categorized|categorized_b_register.xlsx',
            'boa|intake|output|data/new|a_notes.xlsx',
            'boa|intake|output|data/new|b_register.xlsx',
        ]);
    });

    it('categorize refuses a workbook that is not an input of the workflow', async () => {
        await initWorkspace({ workspace: tempDir(), force: false });
        await showStatus(options());
        await writeRegister(join(newFolder(), 'register.xlsx'));

        const summary = await categorizeWorkbooks(INTAKE_ID, { ...options(), dryRun: false });

        expect(summary).toEqual({ categorized: 0, failed: 1 });
        expect(printed(output.warn)).toContain(
            "⚠️  register.xlsx: 'register.xlsx' is not an input workbook of workflow 'categorization'"
        );
    });

    it('categorize --dry-run leaves the file untouched', async () => {
        await initWorkspace({ workspace: tempDir(), force: false });
        await showStatus(options());
        const path = join(newFolder(), 'register.xlsx');
        await writeRegister(path);
        const before = await readFile(path);

        await categorizeWorkbooks('all', { ...options(), dryRun: true });

        expect((await readFile(path)).equals(before)).toBe(true);
    });

    it('check counts workbooks that fail to load', async () => {
        await initWorkspace({ workspace: tempDir(), force: false });
        await showStatus(options());
        await writeFile(join(newFolder(), 'broken.xlsx'), 'not a zip');

        const summary = await checkWorkbooks('broken.xlsx', options());

        expect(summary).toEqual({ loaded: 0, failed: 1 });
        const stored = parse(await readFile(join(tempDir(), 'config', 'budget.yaml'), 'utf-8'));
        const entry = stored.workbooks.boa.find((wb: { wb_name: string }) => wb.wb_name === 'broken.xlsx');
        expect(entry.wb_last_error).toMatch(/^Cannot load broken\.xlsx: /);
    });

    it('use rejects unknown keys and unmatched workbooks', async () => {
        await initWorkspace({ workspace: tempDir(), force: false });
        await expect(useSelection({ ...options(), fi: 'chase' })).rejects.toThrow("Unknown fi key: 'chase'");
        await expect(useSelection({ ...options(), workbook: 'nope.xlsx' })).rejects.toThrow(
            "No workbook matches 'nope.xlsx' in FI 'boa'"
        );
        await expect(useSelection({ ...options(), workbook: '7' })).rejects.toThrow(
            "No workbook matches '#7' in FI 'boa'"
        );
        await expect(useSelection({ ...options(), workbook: 'all' })).rejects.toThrow(
            '"all" cannot be the current workbook'
        );
    });

    it('remove drops a catalog entry and keeps the file', async () => {
        await initWorkspace({ workspace: tempDir(), force: false });
        await showStatus(options());
        await writeRegister(join(newFolder(), 'register.xlsx'));
        await showStatus(options());

        const result = await removeWorkbook(INTAKE_ID, { ...options(), yes: true });

        expect(result?.removed.map(wb => wb.wb_id)).toEqual([INTAKE_ID]);
        expect(existsSync(join(newFolder(), 'register.xlsx'))).toBe(true);
        const stored = parse(await readFile(join(tempDir(), 'config', 'budget.yaml'), 'utf-8'));
        expect(stored.workbooks.boa.map((wb: { wb_id: string }) => wb.wb_id)).toEqual([CATEGORIZATION_ID]);

        await expect(removeWorkbook('all', { ...options(), yes: true })).rejects.toThrow(
            'Refusing to remove "all"; name one workbook'
        );
    });

    it('workbooks lists every FI with --fi all', async () => {
        await initWorkspace({ workspace: tempDir(), force: false });
        await showStatus(options());
        await writeRegister(join(newFolder(), 'register.xlsx'));

        await listWorkbooks({ ...options(), fi: 'all' });

        const lines = printed(output.log);
        expect(lines).toContain('\nBank of America (boa)');
        expect(lines).toContain('\nMerrill Lynch (merrill)');
        expect(lines).toContain('  (no workbooks)');
        expect(lines.filter(line => line.endsWith('register.xlsx'))).toHaveLength(2);
    });

    it('rule appends to the workspace rules and rejects bad regexes', async () => {
        await initWorkspace({ workspace: tempDir(), force: false });

        await addRule('netflix', 'Subscriptions', { workspace: tempDir(), substring: true });
        await expect(addRule('(unclosed', 'X', { workspace: tempDir(), substring: false })).rejects.toThrow(
            /^Invalid regex pattern "\(unclosed": /
        );

        const rules = parse(await readFile(join(tempDir(), 'config', 'category-rules.yaml'), 'utf-8'));
        expect(rules.rules).toHaveLength(3);
        expect(rules.rules[2]).toEqual({ pattern: 'netflix', pattern_type: 'substring', category: 'Subscriptions' });
    });
});

describe('formatWorkbookLine', () => {
    it('marks the current workbook and load errors', () => {
        const line = formatWorkbookLine(
            3,
            {
                wb_id: CATEGORIZATION_ID,
                wb_name: 'register.xlsx',
                wb_stem: 'register',
                wb_filetype: '.xlsx',
                wb_type: 'unknown',
                wb_url: 'file:///budget/boa/data/new/register.xlsx',
                fi_key: 'boa',
                wf_key: 'categorization',
                wf_purpose: 'input',
                wf_folder_id: 'wf_input_folder',
                wf_folder: 'data/new',
                wb_loaded: false,
                wb_last_error: 'Cannot load register.xlsx: bad zip',
            },
            true
        );
        expect(line).toBe(
            `*   3  unknown        ${'categorization/input'.padEnd(24)} register.xlsx  [error: Cannot load register.xlsx: bad zip]`
        );
    });
});

describe('runCli', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('prints usage without a command', async () => {
        const output = muteConsole();
        expect(await runCli([])).toBe(0);
        expect(printed(output.log)[0]).toMatch(/^Budget Workbench v0\.1\.0/);
    });

    it('rejects unknown commands', async () => {
        muteConsole();
        await expect(runCli(['frobnicate'])).rejects.toThrow("Unknown command 'frobnicate'");
    });

    it('requires a ref for remove', async () => {
        await expect(runCli(['remove'])).rejects.toThrow('Usage: budwb remove <ref> [--yes]');
    });
});

/**
 * Workbook content store: exceljs handles over .xlsx / .csv files.
 *
 * Legacy .xls files are read through SheetJS and converted into an exceljs
 * workbook; they cannot be written back.
 */

import exceljs from 'exceljs';
import type { Workbook as ExcelWorkbook } from 'exceljs';
import * as XLSX from 'xlsx';
import { readFile, stat } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { Workbook } from '@budget-workbench/shared';
import { StorageIOError, errorMessage, type SaveAck, type WorkbookContentStore } from '@budget-workbench/core';
import { createWorkbook } from '../excel/utils.js';
import { hashFile } from '../utils/hash.js';

export class ExcelContentStore implements WorkbookContentStore<ExcelWorkbook> {
    async load(workbook: Workbook): Promise<ExcelWorkbook> {
        const path = fileURLToPath(workbook.wb_url);
        try {
            switch (workbook.wb_filetype) {
                case '.xlsx': {
                    const content = new exceljs.Workbook();
                    await content.xlsx.readFile(path);
                    return content;
                }
                case '.csv': {
                    const content = new exceljs.Workbook();
                    await content.csv.readFile(path);
                    return content;
                }
                case '.xls':
                    return convertLegacyWorkbook(await readFile(path));
                default:
                    throw new StorageIOError(path, `Unsupported workbook type '${workbook.wb_filetype}': ${workbook.wb_name}`);
            }
        } catch (err) {
            if (err instanceof StorageIOError) {
                throw err;
            }
            throw new StorageIOError(path, `Cannot load ${workbook.wb_name}: ${errorMessage(err)}`, { cause: err });
        }
    }

    async save(workbook: Workbook, content: ExcelWorkbook): Promise<SaveAck> {
        const path = fileURLToPath(workbook.wb_url);
        if (workbook.wb_filetype === '.xls') {
            throw new StorageIOError(path, `Saving legacy .xls workbooks is not supported: ${workbook.wb_name}`);
        }
        try {
            if (workbook.wb_filetype === '.csv') {
                await content.csv.writeFile(path);
            } else {
                await content.xlsx.writeFile(path);
            }
            const { size } = await stat(path);
            return { url: workbook.wb_url, bytes: size, digest: await hashFile(path) };
        } catch (err) {
            throw new StorageIOError(path, `Cannot save ${workbook.wb_name}: ${errorMessage(err)}`, { cause: err });
        }
    }
}

/**
 * Copy every sheet of a legacy workbook into a new exceljs workbook,
 * cell values only.
 */
export function convertLegacyWorkbook(data: Buffer): ExcelWorkbook {
    const source = XLSX.read(data, { type: 'buffer', cellDates: true });
    const target = createWorkbook();
    for (const name of source.SheetNames) {
        const sheet = target.addWorksheet(name);
        const rows = XLSX.utils.sheet_to_json<unknown[]>(source.Sheets[name], { header: 1, raw: true, defval: null });
        for (const row of rows) {
            sheet.addRow(row);
        }
    }
    return target;
}

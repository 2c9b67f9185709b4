import type { Workbook, Worksheet } from 'exceljs';
import type { CategorizationColumns } from '@budget-workbench/shared';
import type { CategorizableRow, CategoryTotal } from '@budget-workbench/core';
import { autoFitColumns, cellAmount, cellText, formatCurrencyCell, formatHeaderRow } from './utils.js';

export const TOTALS_SHEET = 'Category Totals';

/**
 * Where the register columns sit in a worksheet (1-based column numbers,
 * header in row 1).
 */
export interface RegisterLayout {
    description: number;
    amount: number;
    /** null when the sheet has no category column yet */
    category: number | null;
}

export interface RegisterRow extends CategorizableRow {
    rowNumber: number;
}

export interface SheetSummary {
    name: string;
    rows: number;
    columns: number;
}

export function summarizeWorkbook(workbook: Workbook): SheetSummary[] {
    return workbook.worksheets.map(sheet => ({
        name: sheet.name,
        rows: sheet.actualRowCount,
        columns: sheet.actualColumnCount,
    }));
}

/**
 * First worksheet that is not a generated totals sheet.
 */
export function registerSheet(workbook: Workbook): Worksheet | undefined {
    return workbook.worksheets.find(sheet => sheet.name !== TOTALS_SHEET);
}

/**
 * Find the configured columns by header text (case-insensitive).
 * Returns the names of required headers that are missing.
 */
export function locateColumns(
    sheet: Worksheet,
    columns: CategorizationColumns
): { layout: RegisterLayout | null; missing: string[] } {
    const positions = new Map<string, number>();
    sheet.getRow(1).eachCell((cell, colNumber) => {
        const header = cellText(cell.value).trim().toLowerCase();
        if (header && !positions.has(header)) {
            positions.set(header, colNumber);
        }
    });

    const description = positions.get(columns.description.toLowerCase());
    const amount = positions.get(columns.amount.toLowerCase());
    const missing = [
        ...(description === undefined ? [columns.description] : []),
        ...(amount === undefined ? [columns.amount] : []),
    ];
    if (description === undefined || amount === undefined) {
        return { layout: null, missing };
    }
    return {
        layout: { description, amount, category: positions.get(columns.category.toLowerCase()) ?? null },
        missing,
    };
}

/**
 * Data rows below the header. Rows without a description and amount are
 * skipped.
 */
export function readRegisterRows(sheet: Worksheet, layout: RegisterLayout): RegisterRow[] {
    const rows: RegisterRow[] = [];
    for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
        const row = sheet.getRow(rowNumber);
        const description = cellText(row.getCell(layout.description).value).trim();
        const amount = cellAmount(row.getCell(layout.amount).value);
        if (description === '' && amount === null) {
            continue;
        }
        rows.push({ rowNumber, description, amount });
    }
    return rows;
}

/**
 * Write one category per row, adding the category column after the last
 * used column when the sheet has none.
 *
 * @returns the category column number
 */
export function writeCategories(
    sheet: Worksheet,
    layout: RegisterLayout,
    header: string,
    assignments: ReadonlyArray<{ rowNumber: number; category: string }>
): number {
    let column = layout.category;
    if (column === null) {
        column = sheet.columnCount + 1;
        const headerCell = sheet.getRow(1).getCell(column);
        headerCell.value = header;
        headerCell.font = sheet.getRow(1).getCell(layout.description).font;
    }
    for (const { rowNumber, category } of assignments) {
        sheet.getRow(rowNumber).getCell(column).value = category;
    }
    return column;
}

/**
 * Replace the totals sheet with the given per-category totals.
 */
export function writeTotalsSheet(workbook: Workbook, totals: readonly CategoryTotal[]): Worksheet {
    const existing = workbook.getWorksheet(TOTALS_SHEET);
    if (existing) {
        workbook.removeWorksheet(existing.id);
    }

    const sheet = workbook.addWorksheet(TOTALS_SHEET);
    sheet.columns = [
        { header: 'category', key: 'category' },
        { header: 'count', key: 'count' },
        { header: 'total', key: 'total' },
    ];
    for (const total of totals) {
        sheet.addRow({ category: total.category, count: total.count, total: Number(total.total) });
    }

    formatHeaderRow(sheet);
    formatCurrencyCell(sheet, 'total');
    autoFitColumns(sheet);
    return sheet;
}

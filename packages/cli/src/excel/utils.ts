import exceljs from 'exceljs';
import type { CellValue, Worksheet, Workbook } from 'exceljs';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Budget Workbench';
    workbook.created = new Date();
    return workbook;
}

/**
 * Applies header styling to the first row.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = {
        bold: true,
        color: { argb: 'FFFFFFFF' },
        size: 11
    };

    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF4472C4' }
    };

    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center'
    };

    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 }
    ];
}

/**
 * Attempts to auto-fit column widths based on cell content.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            const len = cellText(cell.value).length;
            if (len > maxLen) maxLen = len;
        });
        // Padding, capped at 100
        column.width = Math.min(maxLen + 2, 100);
    });
}

/**
 * Applies currency formatting to a column.
 */
export function formatCurrencyCell(worksheet: Worksheet, col: string | number): void {
    const column = worksheet.getColumn(col);
    column.numFmt = '#,##0.00;[Red]-#,##0.00';
    column.alignment = { horizontal: 'right' };
}

/**
 * Display text of any cell value. Formulas show their cached result.
 */
export function cellText(value: CellValue): string {
    if (value === null || value === undefined) {
        return '';
    }
    if (value instanceof Date) {
        return value.toISOString().slice(0, 10);
    }
    if (typeof value === 'object') {
        if ('richText' in value) {
            return value.richText.map(part => part.text).join('');
        }
        if ('hyperlink' in value) {
            return value.text;
        }
        if ('result' in value) {
            return value.result === undefined ? '' : cellText(value.result);
        }
        if ('error' in value) {
            return String(value.error);
        }
        return '';
    }
    return String(value);
}

/**
 * Amount-like view of a cell: numbers stay numbers, everything else is
 * its text, blanks are null.
 */
export function cellAmount(value: CellValue): string | number | null {
    if (typeof value === 'number') {
        return value;
    }
    if (value !== null && typeof value === 'object' && 'result' in value && typeof value.result === 'number') {
        return value.result;
    }
    const text = cellText(value).trim();
    return text === '' ? null : text;
}

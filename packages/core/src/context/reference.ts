/**
 * Workbook references: how a user or caller names a workbook.
 *
 * One tagged union and one resolver. Raw input (CLI argument, persisted
 * wb_ref) goes through parseWorkbookRef first.
 */

import { ALL_KEY } from '../types/index.js';
import type { Workbook } from '../types/index.js';

export type WorkbookRef =
    | { kind: 'all' }
    | { kind: 'index'; index: number }
    | { kind: 'id'; id: string }
    | { kind: 'name'; name: string }
    | { kind: 'url'; url: string }
    /** Free text: tried as id, then name, then url */
    | { kind: 'text'; text: string };

export interface ResolvedRef {
    isAll: boolean;
    /** Position in the id-sorted collection, -1 when unresolved or "all" */
    index: number;
    workbook: Workbook | null;
}

export const UNRESOLVED: ResolvedRef = Object.freeze({ isAll: false, index: -1, workbook: null });

const DIGITS = /^\d+$/;

/**
 * Turn raw input into a reference.
 *
 * "all" -> all; integer or digit string -> index; anything else -> text.
 */
export function parseWorkbookRef(raw: string | number): WorkbookRef {
    if (typeof raw === 'number') {
        return Number.isInteger(raw) ? { kind: 'index', index: raw } : { kind: 'text', text: String(raw) };
    }
    const trimmed = raw.trim();
    if (trimmed === ALL_KEY) {
        return { kind: 'all' };
    }
    if (DIGITS.test(trimmed)) {
        return { kind: 'index', index: Number.parseInt(trimmed, 10) };
    }
    return { kind: 'text', text: trimmed };
}

/**
 * Resolve a reference against a collection in display order.
 * Never throws; an unmatched reference resolves to UNRESOLVED.
 */
export function resolveWorkbookRef(ref: WorkbookRef, ordered: readonly Workbook[]): ResolvedRef {
    const at = (index: number): ResolvedRef => {
        const workbook = ordered[index];
        return index >= 0 && workbook ? { isAll: false, index, workbook } : UNRESOLVED;
    };
    const find = (predicate: (wb: Workbook) => boolean): ResolvedRef => at(ordered.findIndex(predicate));

    switch (ref.kind) {
        case 'all':
            return { isAll: true, index: -1, workbook: null };
        case 'index':
            return at(ref.index);
        case 'id':
            return find((wb) => wb.wb_id === ref.id);
        case 'name':
            return find((wb) => wb.wb_name === ref.name);
        case 'url':
            return find((wb) => wb.wb_url === ref.url);
        case 'text': {
            for (const predicate of [
                (wb: Workbook) => wb.wb_id === ref.text,
                (wb: Workbook) => wb.wb_name === ref.text,
                (wb: Workbook) => wb.wb_url === ref.text,
            ]) {
                const resolved = find(predicate);
                if (resolved.workbook) {
                    return resolved;
                }
            }
            return UNRESOLVED;
        }
    }
}

/**
 * Display form of a reference, for messages.
 */
export function describeRef(ref: WorkbookRef): string {
    switch (ref.kind) {
        case 'all':
            return ALL_KEY;
        case 'index':
            return `#${ref.index}`;
        case 'id':
            return ref.id;
        case 'name':
            return ref.name;
        case 'url':
            return ref.url;
        case 'text':
            return ref.text;
    }
}

/**
 * Internal types for categorizer module.
 */

import type { CategoryRule } from '../types/index.js';

/**
 * A rule ready for matching. Substring patterns are stored normalized;
 * regex patterns are compiled once, case-insensitive.
 */
export type CompiledRule =
    | { kind: 'regex'; rule: CategoryRule; regex: RegExp }
    | { kind: 'substring'; rule: CategoryRule; needle: string };

export interface CompiledRules {
    rules: CompiledRule[];
    fallback: string;
    /** Rules that could not be compiled and were skipped */
    warnings: string[];
}

/**
 * One row of a register as the categorizer sees it.
 */
export interface CategorizableRow {
    description: string;
    /** Raw cell value; may carry thousands separators */
    amount: string | number | null;
}

export interface CategoryTotal {
    category: string;
    count: number;
    /** Decimal string, e.g. "-42.50" */
    total: string;
}

export interface TallyResult {
    totals: CategoryTotal[];
    /** Net of all counted amounts, decimal string */
    net: string;
    warnings: string[];
}

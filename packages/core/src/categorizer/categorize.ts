/**
 * Rule-based categorization of register rows.
 *
 * First matching rule wins; rows no rule matches get the fallback category.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in result.
 */

import { Decimal } from 'decimal.js';
import { normalizeDescription } from '../utils/normalize.js';
import type { CategoryRuleSet } from '../types/index.js';
import { compileRule, matchesCompiled } from './match.js';
import type { CategorizableRow, CompiledRule, CompiledRules, TallyResult } from './types.js';

/**
 * Compile a rule set once for repeated matching.
 */
export function compileRules(ruleSet: CategoryRuleSet): CompiledRules {
    const rules: CompiledRule[] = [];
    const warnings: string[] = [];

    for (const rule of ruleSet.rules) {
        const { compiled, warning } = compileRule(rule);
        if (warning) warnings.push(warning);
        if (compiled) rules.push(compiled);
    }

    return { rules, fallback: ruleSet.fallback_category, warnings };
}

/**
 * Category for one description.
 */
export function categorizeDescription(description: string, compiled: CompiledRules): string {
    const desc = normalizeDescription(description);
    for (const candidate of compiled.rules) {
        if (matchesCompiled(desc, candidate)) {
            return candidate.rule.category;
        }
    }
    return compiled.fallback;
}

/**
 * Parse a cell amount. Commas are stripped before Decimal conversion.
 * Returns null for empty cells and values Decimal rejects.
 */
export function parseAmount(value: string | number | null): Decimal | null {
    if (value === null) {
        return null;
    }
    const clean = String(value).replace(/,/g, '').trim();
    if (clean === '') {
        return null;
    }
    try {
        const amount = new Decimal(clean);
        return amount.isFinite() ? amount : null;
    } catch {
        return null;
    }
}

/**
 * Categorize rows and total their amounts per category.
 *
 * Rows with an empty amount count toward their category with zero; rows
 * with an unparseable amount are counted but not summed, with a warning.
 * Totals are sorted by category name.
 */
export function tallyByCategory(rows: readonly CategorizableRow[], compiled: CompiledRules): TallyResult {
    const sums = new Map<string, { count: number; total: Decimal }>();
    const warnings: string[] = [];
    let net = new Decimal(0);

    rows.forEach((row, i) => {
        const category = categorizeDescription(row.description, compiled);
        const entry = sums.get(category) ?? { count: 0, total: new Decimal(0) };
        entry.count++;

        const amount = parseAmount(row.amount);
        if (amount) {
            entry.total = entry.total.plus(amount);
            net = net.plus(amount);
        } else if (row.amount !== null && String(row.amount).trim() !== '') {
            warnings.push(`Row ${i + 1}: invalid amount "${String(row.amount)}", not summed`);
        }
        sums.set(category, entry);
    });

    const totals = [...sums.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([category, { count, total }]) => ({ category, count, total: total.toFixed(2) }));

    return { totals, net: net.toFixed(2), warnings };
}

/**
 * Pattern matching for categorization.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Invalid regex returns warning in result.
 */

import { normalizeDescription } from '../utils/normalize.js';
import type { CategoryRule } from '../types/index.js';
import type { CompiledRule } from './types.js';

/**
 * Compile one rule. Invalid regex yields a warning instead of a rule.
 */
export function compileRule(rule: CategoryRule): { compiled?: CompiledRule; warning?: string } {
    if (rule.pattern_type === 'regex') {
        try {
            return { compiled: { kind: 'regex', rule, regex: new RegExp(rule.pattern, 'i') } };
        } catch (e) {
            const errorMsg = e instanceof Error ? e.message : String(e);
            return { warning: `Invalid regex pattern "${rule.pattern}": ${errorMsg}` };
        }
    }
    // Substring: normalize pattern same as description
    return { compiled: { kind: 'substring', rule, needle: normalizeDescription(rule.pattern) } };
}

/**
 * Match a normalized description against a compiled rule.
 *
 * @param normalizedDesc - Already normalized description (via normalizeDescription)
 */
export function matchesCompiled(normalizedDesc: string, compiled: CompiledRule): boolean {
    if (compiled.kind === 'regex') {
        return compiled.regex.test(normalizedDesc);
    }
    return compiled.needle.length > 0 && normalizedDesc.includes(compiled.needle);
}

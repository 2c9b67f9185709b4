/**
 * Categorizer module: rule-based categorization of register rows.
 */

export { compileRules, categorizeDescription, tallyByCategory, parseAmount } from './categorize.js';
export { compileRule, matchesCompiled } from './match.js';
export type {
    CompiledRule,
    CompiledRules,
    CategorizableRow,
    CategoryTotal,
    TallyResult,
} from './types.js';

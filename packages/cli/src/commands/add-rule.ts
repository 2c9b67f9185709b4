import { existsSync } from 'node:fs';
import { CategoryRuleSchema } from '@budget-workbench/shared';
import { ConfigurationError, compileRule } from '@budget-workbench/core';
import { findWorkspace } from '../session.js';
import { appendRuleToYaml } from '../yaml/rules.js';
import { arrow, success } from '../utils/console.js';
import type { AddRuleOptions } from '../types.js';

/**
 * Append a categorization rule to category-rules.yaml.
 *
 * @throws ConfigurationError if the pattern does not compile
 */
export async function addRule(pattern: string, category: string, options: AddRuleOptions): Promise<void> {
    const workspace = findWorkspace(options);
    const rule = CategoryRuleSchema.parse({
        pattern,
        pattern_type: options.substring ? 'substring' : 'regex',
        category,
        note: options.note,
    });

    const { warning } = compileRule(rule);
    if (warning) {
        throw new ConfigurationError(warning);
    }

    const path = workspace.config.categoryRulesPath;
    const created = !existsSync(path);
    await appendRuleToYaml(path, rule);
    success(`${created ? 'Created' : 'Updated'} ${path}`);
    arrow(`${rule.pattern_type} "${rule.pattern}" -> ${rule.category}`);
}

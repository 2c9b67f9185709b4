import { parseDocument, isSeq, isMap } from 'yaml';
import { readFile, writeFile } from 'node:fs/promises';
import type { CategoryRule } from '@budget-workbench/shared';
import { ConfigurationError } from '@budget-workbench/core';
import { isNotFound } from '../utils/fs-errors.js';

/**
 * Appends a new category rule to a YAML file while preserving comments.
 * The file is a mapping with a `rules` list; a missing or empty file
 * gets one.
 */
export async function appendRuleToYaml(filePath: string, rule: CategoryRule): Promise<void> {
    let content = '';
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (isNotFound(err)) {
            content = '# Category rules, first match wins.\nrules:\n';
        } else {
            throw err;
        }
    }

    const doc = parseDocument(content || 'rules:');
    const root: unknown = doc.contents;
    const entry = Object.fromEntries(Object.entries(rule).filter(([, value]) => value !== undefined));

    if (isMap(root)) {
        const rules = root.get('rules');
        if (rules === null || rules === undefined) {
            // No rules key (or an empty one)
            root.set('rules', doc.createNode([entry]));
        } else if (isSeq(rules)) {
            rules.add(doc.createNode(entry));
        } else {
            throw new ConfigurationError(`Invalid YAML structure in ${filePath}: "rules" must be a list.`);
        }
    } else if (root === null) {
        doc.set('rules', doc.createNode([entry]));
    } else {
        throw new ConfigurationError(`Invalid YAML structure in ${filePath}: expected a mapping with a "rules" list.`);
    }

    await writeFile(filePath, doc.toString());
}

import { existsSync } from 'node:fs';
import { copyFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import { ConfigurationError } from '@budget-workbench/core';
import { resolveAssetPath, resolveWorkspace } from '../workspace/paths.js';
import { parseBudgetStore } from '../workspace/config.js';
import { arrow, log, success } from '../utils/console.js';
import type { InitOptions, Workspace } from '../types.js';

/**
 * Write starter configuration files into a workspace.
 */
export async function initWorkspace(options: InitOptions): Promise<Workspace> {
    const workspace = resolveWorkspace(options.workspace ?? process.cwd());
    const { budgetStorePath, categoryRulesPath } = workspace.config;

    if (existsSync(budgetStorePath) && !options.force) {
        throw new ConfigurationError(`${budgetStorePath} already exists. Use --force to overwrite it.`);
    }

    const templatePath = resolveAssetPath('budget.template.yaml');
    const template = await readFile(templatePath, 'utf-8');
    const store = parseBudgetStore(template, templatePath);

    await mkdir(workspace.configDir, { recursive: true });
    await writeFile(budgetStorePath, template);
    success(`Created ${budgetStorePath}`);

    if (!existsSync(categoryRulesPath)) {
        await copyFile(resolveAssetPath('category-rules.template.yaml'), categoryRulesPath);
        success(`Created ${categoryRulesPath}`);
    }

    arrow(`FIs: ${Object.keys(store.fi_collection).join(', ')}`);
    arrow(`Workflows: ${Object.keys(store.wf_collection).join(', ')}`);
    log('\nNext: run "budwb status" to create the folders and catalog your workbooks.');
    return workspace;
}

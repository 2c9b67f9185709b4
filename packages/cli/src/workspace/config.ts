import { readFileSync, existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import {
    BudgetStoreSchema,
    CategoryRuleSetSchema,
    type BudgetStore,
    type CategoryRuleSet,
} from '@budget-workbench/shared';
import {
    ConfigurationError,
    NotFoundError,
    StorageIOError,
    errorMessage,
    type ConfigStore,
    type StoreAck,
} from '@budget-workbench/core';
import { writeBudgetStoreYaml } from '../yaml/store.js';
import { isNotFound } from '../utils/fs-errors.js';
import type { Workspace } from '../types.js';

/**
 * Parse and validate budget.yaml text.
 */
export function parseBudgetStore(content: string, source: string): BudgetStore {
    return BudgetStoreSchema.parse(parseYaml(content, source));
}

/**
 * Loads the category rules (category-rules.yaml). A missing file means no
 * rules, so every row gets the fallback category.
 */
export function loadCategoryRules(workspace: Workspace): CategoryRuleSet {
    const path = workspace.config.categoryRulesPath;
    if (!existsSync(path)) {
        return CategoryRuleSetSchema.parse({});
    }
    const content = readFileSync(path, 'utf-8');
    return validated(() => CategoryRuleSetSchema.parse(parseYaml(content, path) ?? {}), path);
}

/**
 * ConfigStore over YAML files. Urls may be file paths or file: URLs.
 */
export class YamlConfigStore implements ConfigStore {
    async get(url: string): Promise<BudgetStore> {
        const path = toPath(url);
        let content: string;
        try {
            content = await readFile(path, 'utf-8');
        } catch (err) {
            if (isNotFound(err)) {
                throw new NotFoundError(path, `Configuration file not found: ${path}`, { cause: err });
            }
            throw new StorageIOError(path, `Cannot read ${path}: ${errorMessage(err)}`, { cause: err });
        }
        return validated(() => parseBudgetStore(content, path), path);
    }

    async put(record: BudgetStore, url: string): Promise<StoreAck> {
        const path = toPath(url);
        try {
            const bytes = await writeBudgetStoreYaml(path, record);
            return { url, bytes };
        } catch (err) {
            throw new StorageIOError(path, `Cannot write ${path}: ${errorMessage(err)}`, { cause: err });
        }
    }
}

function toPath(url: string): string {
    return url.startsWith('file:') ? fileURLToPath(url) : url;
}

function parseYaml(content: string, source: string): unknown {
    try {
        return parse(content);
    } catch (err) {
        throw new ConfigurationError(`Invalid YAML in ${source}: ${errorMessage(err)}`, { cause: err });
    }
}

function validated<T>(fn: () => T, source: string): T {
    try {
        return fn();
    } catch (err) {
        if (err instanceof ZodError) {
            const issues = err.issues
                .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
                .join('; ');
            throw new ConfigurationError(`Invalid configuration in ${source}: ${issues}`, { cause: err });
        }
        throw err;
    }
}

import { join, dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { STORE_FILES } from '@budget-workbench/shared';
import type { Workspace } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    const absolute = resolve(root);
    const configDir = join(absolute, STORE_FILES.CONFIG_DIR);

    return {
        root: absolute,
        configDir,
        config: {
            budgetStorePath: join(configDir, STORE_FILES.BUDGET_STORE),
            categoryRulesPath: join(configDir, STORE_FILES.CATEGORY_RULES),
        },
    };
}

/**
 * Path of a file shipped in the package's assets folder.
 */
export function resolveAssetPath(name: string): string {
    // packages/cli/src/workspace -> packages/cli
    const pkgRoot = join(__dirname, '..', '..');
    return join(pkgRoot, 'assets', name);
}

import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { STORE_FILES } from '@budget-workbench/shared';

/**
 * Searches for the workspace root by looking for 'config/budget.yaml'.
 * Starts at startPath and bubbles up to the root.
 */
export function detectWorkspaceRoot(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (true) {
        const configPath = join(current, STORE_FILES.CONFIG_DIR, STORE_FILES.BUDGET_STORE);
        if (existsSync(configPath)) {
            return current;
        }
        const parent = dirname(current);
        if (parent === current) {
            break;
        }
        current = parent;
    }
    return null;
}

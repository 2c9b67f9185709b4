import { ConfigurationError } from '@budget-workbench/core';
import { boolFlag, globalOptions, parseArgs, stringFlag } from './args.js';
import { initWorkspace } from './commands/init.js';
import { showStatus } from './commands/status.js';
import { listWorkbooks } from './commands/workbooks.js';
import { useSelection } from './commands/use.js';
import { checkWorkbooks } from './commands/check.js';
import { categorizeWorkbooks } from './commands/categorize.js';
import { removeWorkbook } from './commands/remove.js';
import { addRule } from './commands/add-rule.js';
import { log } from './utils/console.js';

export const VERSION = '0.1.0';

const USAGE = `Budget Workbench v${VERSION}

Usage: budwb <command> [options]

Commands:
  init                         Create config/budget.yaml and category-rules.yaml
  status                       Scan workflow folders and update the catalog
  workbooks [--fi <key|all>]   List cataloged workbooks
  use [--fi k] [--wf k] [--purpose p] [--workbook ref]
                               Change the current selection
  check [ref]                  Load workbooks and show their sheets (default: current)
  categorize [ref] [--dry-run] Categorize input workbooks into the workflow's output folder
  remove <ref> [--yes]         Drop a workbook from the catalog
  rule <pattern> <category> [--substring] [--note text]
                               Append a categorization rule

A workbook ref is "all", a list index, an id, a file name or a path.

Options:
  --workspace <path>           Workspace root (default: detected from cwd)
  --no-create                  Do not create missing folders
  --raise                      Stop at the first folder or FI error
  -v, --verbose                More output
  --force                      init: overwrite an existing budget.yaml
`;

/**
 * Run one command. Returns the process exit code; errors propagate.
 */
export async function runCli(argv: readonly string[]): Promise<number> {
    const { command, positionals, flags } = parseArgs(argv);
    const options = globalOptions(flags);

    if (!command || command === 'help' || boolFlag(flags, 'help')) {
        log(USAGE);
        return 0;
    }

    switch (command) {
        case 'init':
            await initWorkspace({ workspace: options.workspace, force: boolFlag(flags, 'force') });
            return 0;
        case 'status':
            await showStatus(options);
            return 0;
        case 'workbooks':
        case 'ls':
            await listWorkbooks({ ...options, fi: stringFlag(flags, 'fi') });
            return 0;
        case 'use':
            await useSelection({
                ...options,
                fi: stringFlag(flags, 'fi'),
                wf: stringFlag(flags, 'wf'),
                purpose: stringFlag(flags, 'purpose'),
                workbook: stringFlag(flags, 'workbook') ?? positionals[0],
            });
            return 0;
        case 'check': {
            const summary = await checkWorkbooks(positionals[0], options);
            return summary.failed > 0 ? 1 : 0;
        }
        case 'categorize': {
            const summary = await categorizeWorkbooks(positionals[0], {
                ...options,
                dryRun: boolFlag(flags, 'dry-run'),
            });
            return summary.failed > 0 ? 1 : 0;
        }
        case 'remove': {
            const ref = positionals[0];
            if (!ref) {
                throw new ConfigurationError('Usage: budwb remove <ref> [--yes]');
            }
            const removed = await removeWorkbook(ref, { ...options, yes: boolFlag(flags, 'yes') });
            return removed ? 0 : 1;
        }
        case 'rule': {
            const [pattern, category] = positionals;
            if (!pattern || !category) {
                throw new ConfigurationError('Usage: budwb rule <pattern> <category> [--substring] [--note text]');
            }
            await addRule(pattern, category, {
                workspace: options.workspace,
                substring: boolFlag(flags, 'substring'),
                note: stringFlag(flags, 'note'),
            });
            return 0;
        }
        default:
            throw new ConfigurationError(`Unknown command '${command}'. Run "budwb help".`);
    }
}

import { ConfigurationError } from '@budget-workbench/core';
import type { GlobalOptions } from './types.js';

export interface ParsedArgs {
    command: string | undefined;
    positionals: string[];
    flags: Map<string, string | true>;
}

/** Flags that take a value: `--fi boa` or `--fi=boa`. */
const VALUE_FLAGS = new Set(['workspace', 'fi', 'wf', 'purpose', 'workbook', 'note']);

const SHORT_FLAGS: Record<string, string> = {
    v: 'verbose',
    y: 'yes',
    h: 'help',
};

/**
 * Split argv into command, positionals and flags. Everything after `--`
 * is positional.
 *
 * @throws ConfigurationError for an unknown short flag or a value flag
 * without a value
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
    const positionals: string[] = [];
    const flags = new Map<string, string | true>();

    for (let index = 0; index < argv.length; index++) {
        const token = argv[index];
        if (token === undefined) break;

        if (token === '--') {
            positionals.push(...argv.slice(index + 1));
            break;
        }

        if (token.startsWith('--')) {
            const eq = token.indexOf('=');
            const key = eq < 0 ? token.slice(2) : token.slice(2, eq);
            if (!key) {
                throw new ConfigurationError(`Invalid option '${token}'`);
            }
            if (eq >= 0) {
                flags.set(key, token.slice(eq + 1));
            } else if (VALUE_FLAGS.has(key)) {
                const value = argv[index + 1];
                if (value === undefined || value.startsWith('--')) {
                    throw new ConfigurationError(`Missing value for option '--${key}'`);
                }
                flags.set(key, value);
                index++;
            } else {
                flags.set(key, true);
            }
            continue;
        }

        if (token.startsWith('-') && token.length > 1 && !/^-\d/.test(token)) {
            for (const letter of token.slice(1)) {
                const name = SHORT_FLAGS[letter];
                if (!name) {
                    throw new ConfigurationError(`Unknown option '-${letter}'`);
                }
                flags.set(name, true);
            }
            continue;
        }

        positionals.push(token);
    }

    const [command, ...rest] = positionals;
    return { command, positionals: rest, flags };
}

export function stringFlag(flags: ParsedArgs['flags'], name: string): string | undefined {
    const value = flags.get(name);
    return typeof value === 'string' ? value : undefined;
}

export function boolFlag(flags: ParsedArgs['flags'], name: string): boolean {
    return flags.has(name);
}

/**
 * Options every workspace command accepts. `--no-create` and `--raise`
 * override the stored folder options for one run.
 */
export function globalOptions(flags: ParsedArgs['flags']): GlobalOptions {
    return {
        workspace: stringFlag(flags, 'workspace'),
        verbose: boolFlag(flags, 'verbose'),
        createMissingFolders: boolFlag(flags, 'no-create') ? false : undefined,
        raiseOnErrors: boolFlag(flags, 'raise') ? true : undefined,
    };
}

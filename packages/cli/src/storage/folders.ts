/**
 * Path/folder resolution, verification and scanning over node:fs.
 *
 * The only filesystem mutation performed here is directory creation.
 */

import { mkdir, readdir, stat } from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import { homedir } from 'node:os';
import { basename, extname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { pathToFileURL } from 'node:url';
import { WORKBOOK_FILETYPES } from '@budget-workbench/shared';
import {
    ConfigurationError,
    NotFoundError,
    StorageIOError,
    errorMessage,
    type FileDescriptor,
    type FolderGateway,
    type ScanResult,
    type VerifyOptions,
} from '@budget-workbench/core';
import { isNotFound } from '../utils/fs-errors.js';

/**
 * Expand a leading "~" to the user's home folder.
 */
export function expandHome(path: string): string {
    if (path === '~') {
        return homedir();
    }
    if (path.startsWith('~/')) {
        return join(homedir(), path.slice(2));
    }
    return path;
}

/**
 * Join configured segments into an absolute, normalized path. A relative
 * root is resolved against `base`. The FI folder stays within the root and
 * the workflow folder within the FI folder.
 *
 * @throws ConfigurationError if a given segment is empty or leaves its parent
 */
export function resolveFolderPath(
    root: string,
    fiFolder?: string,
    wfFolder?: string,
    base: string = process.cwd()
): string {
    const segments: Array<[string, string | undefined]> = [
        ['root folder', root],
        ['FI folder', fiFolder],
        ['workflow folder', wfFolder],
    ];
    for (const [label, segment] of segments) {
        if (segment !== undefined && segment.trim() === '') {
            throw new ConfigurationError(`Empty ${label} in configuration`);
        }
    }

    const rootPath = resolve(base, expandHome(root));
    const fiPath = join(rootPath, fiFolder ?? '');
    if (!isWithin(rootPath, fiPath)) {
        throw new ConfigurationError(`FI folder '${fiFolder}' leaves the root folder ${rootPath}`);
    }
    const wfPath = join(fiPath, wfFolder ?? '');
    if (!isWithin(fiPath, wfPath)) {
        throw new ConfigurationError(`Workflow folder '${wfFolder}' leaves the FI folder ${fiPath}`);
    }
    return wfPath;
}

function isWithin(parent: string, child: string): boolean {
    const rel = relative(parent, child);
    return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/**
 * Make sure a folder exists.
 *
 * - exists as a directory -> true
 * - missing, create -> created (with parents) -> true
 * - missing, no create -> false, or NotFoundError with raiseOnMissing
 *
 * A path that exists but is not a directory is never created over; it
 * counts as missing.
 */
export async function verifyFolder(path: string, options: VerifyOptions): Promise<boolean> {
    let stats: Stats | null;
    try {
        stats = await stat(path);
    } catch (err) {
        if (!isNotFound(err)) {
            throw new StorageIOError(path, `Cannot access ${path}: ${errorMessage(err)}`, { cause: err });
        }
        stats = null;
    }

    if (stats?.isDirectory()) {
        return true;
    }

    if (stats === null && options.create) {
        try {
            await mkdir(path, { recursive: true });
            return true;
        } catch (err) {
            throw new StorageIOError(path, `Cannot create folder ${path}: ${errorMessage(err)}`, { cause: err });
        }
    }

    if (options.raiseOnMissing) {
        throw new NotFoundError(
            path,
            stats === null ? `Folder does not exist: ${path}` : `Not a folder: ${path}`
        );
    }
    return false;
}

/**
 * List workbook files of a folder, sorted by name. Hidden files and office
 * lock files ("~$Book.xlsx") are skipped. Never throws: an unreadable
 * folder yields a diagnostic.
 */
export async function scanFolder(path: string): Promise<ScanResult> {
    let entries: Dirent[];
    try {
        entries = await readdir(path, { withFileTypes: true });
    } catch (err) {
        return { files: [], diagnostic: `Cannot read folder ${path}: ${errorMessage(err)}` };
    }

    const files = entries
        .filter((entry) => entry.isFile() && !entry.name.startsWith('.') && !entry.name.startsWith('~'))
        .map((entry) => describeFile(path, entry.name))
        .filter((file) => isWorkbookExtension(file.extension))
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    return { files };
}

export function describeFile(folder: string, name: string): FileDescriptor {
    const ext = extname(name);
    return {
        name,
        stem: basename(name, ext),
        extension: ext.toLowerCase(),
        url: pathToFileURL(join(folder, name)).href,
    };
}

function isWorkbookExtension(extension: string): boolean {
    return (WORKBOOK_FILETYPES as readonly string[]).includes(extension);
}

/**
 * FolderGateway over the local filesystem. Relative roots resolve against
 * `base` (the workspace root).
 */
export class NodeFolderGateway implements FolderGateway {
    private readonly base: string;

    constructor(base: string = process.cwd()) {
        this.base = base;
    }

    resolve(root: string, fiFolder?: string, wfFolder?: string): string {
        return resolveFolderPath(root, fiFolder, wfFolder, this.base);
    }

    verify(path: string, options: VerifyOptions): Promise<boolean> {
        return verifyFolder(path, options);
    }

    scan(path: string): Promise<ScanResult> {
        return scanFolder(path);
    }
}

import { Document, parseDocument, isMap } from 'yaml';
import { readFile, writeFile } from 'node:fs/promises';
import type { BudgetStore } from '@budget-workbench/shared';
import { isNotFound } from '../utils/fs-errors.js';

/**
 * Writes the configuration record to budget.yaml while preserving comments.
 * Only top-level sections whose value changed are replaced; hand-written
 * sections (and their comments) are left as they are.
 *
 * @returns bytes written
 */
export async function writeBudgetStoreYaml(filePath: string, record: BudgetStore): Promise<number> {
    let content = '';
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (!isNotFound(err)) {
            throw err;
        }
    }

    const doc = parseDocument(content);
    let text: string;
    if (doc.errors.length === 0 && isMap(doc.contents)) {
        const current: unknown = doc.toJS();
        for (const [key, value] of Object.entries(record)) {
            if (value === undefined) continue;
            const previous = isRecord(current) ? current[key] : undefined;
            if (JSON.stringify(previous) !== JSON.stringify(value)) {
                doc.set(key, doc.createNode(value));
            }
        }
        text = doc.toString();
    } else {
        text = new Document(record).toString();
    }

    await writeFile(filePath, text);
    return Buffer.byteLength(text);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Catalog digest for drift detection between runs.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 so core stays free of node:crypto.
 */

import { sha256 } from 'js-sha256';
import type { WorkbookCollection } from './types.js';
import { compareIds } from './reconcile.js';

export const CATALOG_DIGEST_LENGTH = 16;

/**
 * Hash of the sorted ids of one or more collections.
 * Equal catalogs give equal digests regardless of insertion order.
 */
export function catalogDigest(collections: Iterable<WorkbookCollection>): string {
    const ids: string[] = [];
    for (const collection of collections) {
        ids.push(...collection.keys());
    }
    ids.sort(compareIds);
    return sha256(ids.join('\n')).slice(0, CATALOG_DIGEST_LENGTH);
}

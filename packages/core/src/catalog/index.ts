export { reconcile, sortedWorkbooks, compareIds } from './reconcile.js';
export { findStaleIds, removeWorkbooks } from './remove.js';
export { catalogDigest, CATALOG_DIGEST_LENGTH } from './digest.js';
export type { WorkbookCollection, ReconcileResult, ScannedScope } from './types.js';
export type { RemoveResult } from './remove.js';

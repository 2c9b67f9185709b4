export { DataContext } from './data-context.js';
export type { DataContextState, CurrentWorkbook } from './data-context.js';
export { parseWorkbookRef, resolveWorkbookRef, describeRef, UNRESOLVED } from './reference.js';
export type { WorkbookRef, ResolvedRef } from './reference.js';

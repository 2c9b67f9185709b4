// Types (re-exported from shared)
export type {
    Purpose,
    FinancialInstitution,
    Workflow,
    WorkbookType,
    Workbook,
    BudgetOptions,
    DataContextRecord,
    BudgetStore,
    BudgetStoreInput,
    CategoryRule,
    CategoryRuleSet,
} from './types/index.js';

export {
    BudgetStoreSchema,
    WorkbookSchema,
    ALL_KEY,
    PURPOSES,
    WB_TYPES,
    WB_TYPE_UNKNOWN,
    WORKBOOK_ID,
    WORKBOOK_FILETYPES,
} from './types/index.js';

// Errors
export {
    BudgetWorkbenchError,
    ConfigurationError,
    NotFoundError,
    KeyNotFoundError,
    StorageIOError,
    errorMessage,
} from './errors.js';
export type { KeyKind } from './errors.js';

// Storage gateways
export type {
    FileDescriptor,
    ScanResult,
    VerifyOptions,
    FolderGateway,
    StoreAck,
    SaveAck,
    WorkbookContentStore,
    ConfigStore,
} from './storage/types.js';

// Discovery
export { workbookId } from './discovery/workbook-id.js';
export type { WorkbookIdParts } from './discovery/workbook-id.js';
export { classifyWorkbook, buildCandidates, discoverWorkbooks } from './discovery/discover.js';
export type { DiscoveryContext, DiscoveryResult } from './discovery/discover.js';

// Catalog
export {
    reconcile,
    sortedWorkbooks,
    compareIds,
    findStaleIds,
    removeWorkbooks,
    catalogDigest,
    CATALOG_DIGEST_LENGTH,
} from './catalog/index.js';
export type { WorkbookCollection, ReconcileResult, ScannedScope, RemoveResult } from './catalog/index.js';

// Domain model
export { BudgetDomainModel, isPurpose } from './model/index.js';
export type {
    PurposeFolder,
    InitializeOptions,
    InitializeReport,
    ReconciliationWarning,
    SkippedFi,
} from './model/index.js';

// Data context
export { DataContext, parseWorkbookRef, resolveWorkbookRef, describeRef, UNRESOLVED } from './context/index.js';
export type { DataContextState, CurrentWorkbook, WorkbookRef, ResolvedRef } from './context/index.js';

// Categorizer
export { compileRules, compileRule, categorizeDescription, tallyByCategory, parseAmount } from './categorizer/index.js';
export type { CompiledRules, CategorizableRow, CategoryTotal, TallyResult } from './categorizer/index.js';

// Utils
export { normalizeDescription } from './utils/normalize.js';

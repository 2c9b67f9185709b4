// Schemas
export {
    PurposeSchema,
    FinancialInstitutionSchema,
    WorkflowSchema,
    WorkbookTypeSchema,
    WorkbookSchema,
    CategorizationColumnsSchema,
    BudgetOptionsSchema,
    DataContextRecordSchema,
    BudgetStoreSchema,
    CategoryRuleSchema,
    CategoryRuleSetSchema,
} from './schemas.js';

// Types
export type {
    Purpose,
    FinancialInstitution,
    Workflow,
    WorkbookType,
    Workbook,
    CategorizationColumns,
    BudgetOptions,
    DataContextRecord,
    BudgetStore,
    BudgetStoreInput,
    CategoryRule,
    CategoryRuleSet,
} from './schemas.js';

// Constants
export {
    ALL_KEY,
    PURPOSES,
    FI_TYPES,
    WORKBOOK_FILETYPES,
    WB_TYPES,
    WB_TYPE_UNKNOWN,
    WB_TYPE_VALUES,
    WORKBOOK_ID,
    STORE_FILES,
    DEFAULT_FALLBACK_CATEGORY,
    DEFAULT_COLUMNS,
} from './constants.js';

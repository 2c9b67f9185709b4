/**
 * Re-export record types from the shared package.
 * Core works on these records but doesn't define them.
 */
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
} from '@budget-workbench/shared';

export {
    BudgetStoreSchema,
    WorkbookSchema,
    ALL_KEY,
    PURPOSES,
    WB_TYPES,
    WB_TYPE_UNKNOWN,
    WORKBOOK_ID,
    WORKBOOK_FILETYPES,
} from '@budget-workbench/shared';

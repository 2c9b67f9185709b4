/**
 * Constants for Budget Workbench.
 */

/**
 * Sentinel accepted wherever a bulk operation over every FI, workflow or
 * workbook makes sense. Never a valid key for a configured entity.
 */
export const ALL_KEY = 'all';

/**
 * Roles a workbook can play relative to a workflow.
 * Order matters: discovery walks purposes in this order.
 */
export const PURPOSES = ['input', 'working', 'output'] as const;

/**
 * Kinds of financial institution accepted in configuration.
 */
export const FI_TYPES = ['bank', 'brokerage', 'organization', 'person'] as const;

/**
 * File extensions recognized as workbooks during discovery (lower-case, with dot).
 */
export const WORKBOOK_FILETYPES = ['.xlsx', '.xls', '.csv'] as const;

/**
 * Workbook classifications inferred from the filename stem.
 * First entry contained in the lower-cased stem wins.
 */
export const WB_TYPES = ['bdm_store', 'bdm_config', 'check_register', 'transactions', 'budget'] as const;

export const WB_TYPE_UNKNOWN = 'unknown';

export const WB_TYPE_VALUES = [...WB_TYPES, WB_TYPE_UNKNOWN] as const;

/**
 * Workbook id composition.
 * An id is `fi_key|wf_key|wf_purpose|wf_folder|wb_name`.
 */
export const WORKBOOK_ID = {
    SEPARATOR: '|',
} as const;

/**
 * Locations of the workspace configuration files, relative to the workspace root.
 */
export const STORE_FILES = {
    CONFIG_DIR: 'config',
    BUDGET_STORE: 'budget.yaml',
    CATEGORY_RULES: 'category-rules.yaml',
} as const;

/**
 * Category assigned when no categorization rule matches.
 */
export const DEFAULT_FALLBACK_CATEGORY = 'Uncategorized';

/**
 * Default spreadsheet column headers used by the categorization workflow.
 */
export const DEFAULT_COLUMNS = {
    DESCRIPTION: 'Description',
    AMOUNT: 'Amount',
    CATEGORY: 'Category',
} as const;

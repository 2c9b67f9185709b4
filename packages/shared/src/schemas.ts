/**
 * Zod schemas for Budget Workbench data structures.
 *
 * The configuration record (the "BDM store") is a YAML document on disk.
 * Field names stay snake_case so the record round-trips unchanged.
 */

import { z } from 'zod';
import {
    ALL_KEY,
    DEFAULT_COLUMNS,
    DEFAULT_FALLBACK_CATEGORY,
    FI_TYPES,
    PURPOSES,
    WB_TYPE_UNKNOWN,
    WB_TYPE_VALUES,
    WORKBOOK_ID,
} from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Key of a configured entity. Lower-case identifier, never the "all" sentinel.
 */
const entityKey = z
    .string()
    .regex(/^[a-z0-9][a-z0-9_-]*$/, 'Must be a lower-case identifier')
    .refine((key) => key !== ALL_KEY, `"${ALL_KEY}" is reserved and cannot be used as a key`);

/**
 * Relative folder segment as written in configuration, e.g. "data/new".
 * Null means the folder role is not used by the workflow.
 * The segment is part of every workbook id, so it cannot hold the id separator.
 */
const folderSegment = z
    .string()
    .refine((folder) => !folder.includes(WORKBOOK_ID.SEPARATOR), `Must not contain "${WORKBOOK_ID.SEPARATOR}"`)
    .nullable();

// ============================================================================
// Financial Institution & Workflow Schemas
// ============================================================================

export const PurposeSchema = z.enum(PURPOSES);

export type Purpose = z.infer<typeof PurposeSchema>;

/**
 * Financial institution, a configured source of transaction workbooks.
 */
export const FinancialInstitutionSchema = z.object({
    fi_key: entityKey,
    fi_name: z.string().min(1),
    fi_type: z.enum(FI_TYPES),
    fi_folder: z.string(),
});

export type FinancialInstitution = z.infer<typeof FinancialInstitutionSchema>;

/**
 * Purpose -> value map where each purpose may be absent.
 */
const purposeMap = <T extends z.ZodTypeAny>(value: T) =>
    z.object({
        input: value.optional(),
        working: value.optional(),
        output: value.optional(),
    });

/**
 * Workflow, a processing stage with input/working/output folder roles.
 *
 * `wf_folders` declares folder-role ids (e.g. "wf_input_folder") and their
 * relative folders; `wf_purpose_folder_map` points each purpose at one of
 * those ids.
 */
export const WorkflowSchema = z.object({
    wf_key: entityKey,
    wf_name: z.string().min(1),
    wf_folders: z.record(z.string().min(1), folderSegment),
    wf_purpose_folder_map: purposeMap(z.string().min(1).nullable()).default({}),
    wf_prefixes: purposeMap(z.string().nullable()).default({}),
});

export type Workflow = z.infer<typeof WorkflowSchema>;

// ============================================================================
// Workbook Schema
// ============================================================================

export const WorkbookTypeSchema = z.enum(WB_TYPE_VALUES);

export type WorkbookType = z.infer<typeof WorkbookTypeSchema>;

/**
 * Catalog entry for one spreadsheet file and its role metadata.
 * Content is never part of the record; the data context caches it.
 */
export const WorkbookSchema = z.object({
    wb_id: z.string().min(1),
    wb_name: z.string().min(1),
    wb_stem: z.string(),
    wb_filetype: z.string(),
    wb_type: WorkbookTypeSchema.default(WB_TYPE_UNKNOWN),
    wb_url: z.string().url(),
    fi_key: entityKey,
    wf_key: entityKey,
    wf_purpose: PurposeSchema,
    wf_folder_id: z.string().min(1),
    wf_folder: z.string().min(1),
    wb_loaded: z.boolean().default(false),
    wb_last_error: z.string().optional(),
});

export type Workbook = z.infer<typeof WorkbookSchema>;

// ============================================================================
// Configuration Record (BDM store)
// ============================================================================

export const CategorizationColumnsSchema = z.object({
    description: z.string().min(1).default(DEFAULT_COLUMNS.DESCRIPTION),
    amount: z.string().min(1).default(DEFAULT_COLUMNS.AMOUNT),
    category: z.string().min(1).default(DEFAULT_COLUMNS.CATEGORY),
});

export type CategorizationColumns = z.infer<typeof CategorizationColumnsSchema>;

export const BudgetOptionsSchema = z.object({
    create_missing_folders: z.boolean().default(true),
    raise_on_errors: z.boolean().default(false),
    columns: CategorizationColumnsSchema.default({}),
});

export type BudgetOptions = z.infer<typeof BudgetOptionsSchema>;

/**
 * Working-state defaults persisted alongside the catalog.
 */
export const DataContextRecordSchema = z.object({
    fi_key: z.string().nullable().default(null),
    wf_key: z.string().nullable().default(null),
    wf_purpose: PurposeSchema.nullable().default(null),
    /** Index, id, name or url of the current workbook */
    wb_ref: z.union([z.string(), z.number().int().nonnegative()]).nullable().default(null),
});

export type DataContextRecord = z.infer<typeof DataContextRecordSchema>;

export const BudgetStoreSchema = z.object({
    bdm_id: z.string().min(1).default('budget'),
    bdm_folder: z.string(),
    fi_collection: z.record(z.string(), FinancialInstitutionSchema),
    wf_collection: z.record(z.string(), WorkflowSchema),
    options: BudgetOptionsSchema.default({}),
    data_context: DataContextRecordSchema.default({}),
    workbooks: z.record(z.string(), z.array(WorkbookSchema)).default({}),
    last_modified: z.string().optional(),
});

/** Parsed configuration record, defaults applied. */
export type BudgetStore = z.infer<typeof BudgetStoreSchema>;

/** Configuration record as written by hand, before defaults. */
export type BudgetStoreInput = z.input<typeof BudgetStoreSchema>;

// ============================================================================
// Categorization Rules
// ============================================================================

export const CategoryRuleSchema = z.object({
    pattern: z.string().min(1),
    pattern_type: z.enum(['regex', 'substring']).default('regex'),
    category: z.string().min(1),
    note: z.string().optional(),
});

export type CategoryRule = z.infer<typeof CategoryRuleSchema>;

export const CategoryRuleSetSchema = z.object({
    fallback_category: z.string().min(1).default(DEFAULT_FALLBACK_CATEGORY),
    rules: z.array(CategoryRuleSchema).default([]),
});

export type CategoryRuleSet = z.infer<typeof CategoryRuleSetSchema>;

export { BudgetDomainModel, isPurpose } from './domain-model.js';
export type {
    PurposeFolder,
    InitializeOptions,
    InitializeReport,
    ReconciliationWarning,
    SkippedFi,
} from './types.js';

/**
 * Budget Workbench CLI - Core Types
 */

export interface GlobalOptions {
    workspace?: string;
    verbose: boolean;
    /** Override options.create_missing_folders */
    createMissingFolders?: boolean;
    /** Override options.raise_on_errors */
    raiseOnErrors?: boolean;
}

export interface InitOptions {
    workspace?: string;
    force: boolean;
}

export interface WorkbooksOptions extends GlobalOptions {
    /** FI key or "all"; defaults to the current FI */
    fi?: string;
}

export interface UseOptions extends GlobalOptions {
    fi?: string;
    wf?: string;
    purpose?: string;
    workbook?: string;
}

export interface CategorizeOptions extends GlobalOptions {
    dryRun: boolean;
}

export interface RemoveOptions extends GlobalOptions {
    /** Skip the confirmation prompt */
    yes: boolean;
}

export interface AddRuleOptions {
    workspace?: string;
    substring: boolean;
    note?: string;
}

export interface WorkspaceConfig {
    budgetStorePath: string;
    categoryRulesPath: string;
}

export interface Workspace {
    root: string;
    configDir: string;
    config: WorkspaceConfig;
}

/**
 * A CLI session: workspace, model and data context over the local
 * filesystem, initialized and ready for a command.
 */

import type { Workbook as ExcelWorkbook } from 'exceljs';
import type { Workbook } from '@budget-workbench/shared';
import {
    BudgetDomainModel,
    DataContext,
    NotFoundError,
    describeRef,
    parseWorkbookRef,
    type InitializeReport,
    type StoreAck,
} from '@budget-workbench/core';
import { detectWorkspaceRoot } from './workspace/detect.js';
import { resolveWorkspace } from './workspace/paths.js';
import { YamlConfigStore } from './workspace/config.js';
import { NodeFolderGateway } from './storage/folders.js';
import { ExcelContentStore } from './storage/workbooks.js';
import type { GlobalOptions, Workspace } from './types.js';

export interface Session {
    workspace: Workspace;
    model: BudgetDomainModel;
    context: DataContext<ExcelWorkbook>;
    report: InitializeReport;
    configStore: YamlConfigStore;
    gateway: NodeFolderGateway;
}

/**
 * Locate the workspace root from options or the current directory.
 *
 * @throws NotFoundError when no workspace is found
 */
export function findWorkspace(options: { workspace?: string }): Workspace {
    const root = options.workspace ?? detectWorkspaceRoot();
    if (!root) {
        throw new NotFoundError(
            'config/budget.yaml',
            'Workspace not found. Expected "config/budget.yaml" here or in a parent folder (run "budwb init").'
        );
    }
    return resolveWorkspace(root);
}

/**
 * Load configuration, build the model and initialize the data context.
 * Ctrl-C during initialization stops before the next FI.
 */
export async function openSession(options: GlobalOptions): Promise<Session> {
    const workspace = findWorkspace(options);
    const configStore = new YamlConfigStore();
    const record = await configStore.get(workspace.config.budgetStorePath);

    const model = new BudgetDomainModel(record);
    const context = new DataContext(model, new ExcelContentStore());

    const gateway = new NodeFolderGateway(workspace.root);
    const controller = new AbortController();
    const onInterrupt = () => controller.abort();
    process.once('SIGINT', onInterrupt);
    try {
        const report = await context.initialize(gateway, {
            createMissingFolders: options.createMissingFolders,
            raiseOnErrors: options.raiseOnErrors,
            signal: controller.signal,
        });
        return { workspace, model, context, report, configStore, gateway };
    } finally {
        process.removeListener('SIGINT', onInterrupt);
    }
}

/**
 * Write the catalog and the current selection back to budget.yaml.
 */
export function persistSession(session: Session): Promise<StoreAck> {
    const record = session.model.toRecord(session.context.toRecord());
    return session.configStore.put(record, session.workspace.config.budgetStorePath);
}

/**
 * Workbooks a command argument refers to in the current FI. Without an
 * argument, the current workbook.
 *
 * @throws NotFoundError when a single-workbook reference matches nothing
 */
export function resolveTargets(context: DataContext<ExcelWorkbook>, ref?: string): Targets {
    if (ref === undefined) {
        const current = context.currentWorkbook;
        if (!current) {
            throw new NotFoundError('current', 'No current workbook. Name one, or select it with "budwb use".');
        }
        ref = current.id;
    }
    const resolved = context.resolveReference(ref);
    if (resolved.isAll) {
        return { isAll: true, workbooks: context.activeWorkbooks() };
    }
    if (!resolved.workbook) {
        throw unmatchedRef(context, ref);
    }
    return { isAll: false, workbooks: [resolved.workbook] };
}

/**
 * Error for a workbook reference that matches nothing in the current FI.
 */
export function unmatchedRef(context: DataContext<ExcelWorkbook>, ref: string): NotFoundError {
    return new NotFoundError(
        ref,
        `No workbook matches '${describeRef(parseWorkbookRef(ref))}' in FI '${context.fiKey ?? '-'}'`
    );
}

export interface Targets {
    isAll: boolean;
    workbooks: Workbook[];
}

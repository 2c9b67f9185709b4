/**
 * Budget Domain Model (BDM): FI -> Workflow -> Purpose -> Workbook catalog.
 *
 * Built from a validated configuration record and kept in step with the
 * filesystem by initialize(), which verifies folders, scans them and
 * reconciles what it finds into each FI's workbook collection.
 *
 * There is no global instance. Construct a model per configuration record
 * and pass it to whatever needs it.
 *
 * ARCHITECTURAL NOTE: No console.* calls and no node:fs. Storage arrives
 * through a FolderGateway; diagnostics are returned in the report.
 */

import { ALL_KEY, PURPOSES, WORKBOOK_ID } from '../types/index.js';
import type {
    BudgetOptions,
    BudgetStore,
    DataContextRecord,
    FinancialInstitution,
    Purpose,
    Workbook,
    Workflow,
} from '../types/index.js';
import type { FileDescriptor, FolderGateway } from '../storage/types.js';
import type { ScannedScope, WorkbookCollection } from '../catalog/types.js';
import { reconcile, sortedWorkbooks } from '../catalog/reconcile.js';
import { findStaleIds, removeWorkbooks, type RemoveResult } from '../catalog/remove.js';
import { catalogDigest } from '../catalog/digest.js';
import { buildCandidates, discoverWorkbooks, type DiscoveryContext } from '../discovery/discover.js';
import { workbookId } from '../discovery/workbook-id.js';
import { ConfigurationError, KeyNotFoundError, NotFoundError, errorMessage, type KeyKind } from '../errors.js';
import type { InitializeOptions, InitializeReport, PurposeFolder } from './types.js';

export class BudgetDomainModel {
    readonly bdmId: string;
    /** Root folder as configured, e.g. "~/budget" */
    readonly folder: string;
    readonly options: BudgetOptions;
    /** Working-state defaults from the configuration record */
    readonly dataContextDefaults: DataContextRecord;

    private readonly fis: ReadonlyMap<string, FinancialInstitution>;
    private readonly workflows: ReadonlyMap<string, Workflow>;
    private readonly collections = new Map<string, WorkbookCollection>();
    /** Persisted entries not yet cataloged: their folder has not been verified this session */
    private readonly pending = new Map<string, Workbook[]>();
    private root: string | null = null;

    /**
     * @throws ConfigurationError when the record's shape is inconsistent
     */
    constructor(store: BudgetStore) {
        this.bdmId = store.bdm_id;
        this.folder = store.bdm_folder;
        this.options = store.options;
        this.dataContextDefaults = store.data_context;
        this.fis = buildFiCollection(store.fi_collection);
        this.workflows = buildWfCollection(store.wf_collection);

        for (const fiKey of this.fis.keys()) {
            this.collections.set(fiKey, new Map());
        }
        this.stagePersistedWorkbooks(store.workbooks);
    }

    // ========================================================================
    // Lookups
    // ========================================================================

    get initialized(): boolean {
        return this.root !== null;
    }

    /** Absolute root folder, known once initialize() has verified it */
    get rootPath(): string | null {
        return this.root;
    }

    fiKeys(): string[] {
        return [...this.fis.keys()];
    }

    workflowKeys(): string[] {
        return [...this.workflows.keys()];
    }

    fi(key: string): FinancialInstitution {
        const fi = this.fis.get(requireConcreteKey('fi', key));
        if (!fi) {
            throw new KeyNotFoundError('fi', key);
        }
        return fi;
    }

    workflow(key: string): Workflow {
        const wf = this.workflows.get(requireConcreteKey('workflow', key));
        if (!wf) {
            throw new KeyNotFoundError('workflow', key);
        }
        return wf;
    }

    /**
     * Expand a key or the "all" sentinel into concrete FI keys.
     */
    selectFiKeys(keyOrAll: string): string[] {
        return keyOrAll === ALL_KEY ? this.fiKeys() : [this.fi(keyOrAll).fi_key];
    }

    /**
     * Expand a key or the "all" sentinel into concrete workflow keys.
     */
    selectWorkflowKeys(keyOrAll: string): string[] {
        return keyOrAll === ALL_KEY ? this.workflowKeys() : [this.workflow(keyOrAll).wf_key];
    }

    /**
     * Folder role a workflow uses for a purpose, or null when the purpose
     * has no folder in that workflow.
     */
    purposeFolder(wfKey: string, purpose: string): PurposeFolder | null {
        const wf = this.workflow(wfKey);
        assertPurpose(purpose);
        const folderId = wf.wf_purpose_folder_map[purpose];
        if (!folderId) {
            return null;
        }
        const folder = wf.wf_folders[folderId];
        if (folder === undefined) {
            throw new ConfigurationError(
                `Workflow '${wfKey}' maps purpose '${purpose}' to undeclared folder id '${folderId}'`
            );
        }
        return folder === null ? null : { folderId, folder };
    }

    /**
     * Filename prefix a workflow applies to workbooks of a purpose.
     */
    purposePrefix(wfKey: string, purpose: string): string | null {
        const wf = this.workflow(wfKey);
        assertPurpose(purpose);
        return wf.wf_prefixes[purpose] ?? null;
    }

    /**
     * Filename a workflow gives the output it writes for an input workbook:
     * the input prefix is dropped and the output prefix prepended.
     */
    outputName(wfKey: string, name: string): string {
        const inputPrefix = this.purposePrefix(wfKey, 'input') ?? '';
        const outputPrefix = this.purposePrefix(wfKey, 'output') ?? '';
        const base = inputPrefix !== '' && name.startsWith(inputPrefix) ? name.slice(inputPrefix.length) : name;
        return `${outputPrefix}${base}`;
    }

    workbooks(fiKey: string): WorkbookCollection {
        return this.collections.get(this.fi(fiKey).fi_key) ?? new Map();
    }

    /**
     * Workbooks of an FI in display order (sorted by id).
     */
    sortedWorkbooks(fiKey: string): Workbook[] {
        return sortedWorkbooks(this.workbooks(fiKey));
    }

    workbook(fiKey: string, wbId: string): Workbook | undefined {
        return this.workbooks(fiKey).get(wbId);
    }

    workbookCount(): number {
        let count = 0;
        for (const collection of this.collections.values()) {
            count += collection.size;
        }
        return count;
    }

    // ========================================================================
    // Catalog mutation
    // ========================================================================

    /**
     * Explicitly remove catalog entries of one FI. Never called by a rescan.
     */
    removeWorkbooks(fiKey: string, ids: readonly string[]): RemoveResult {
        const key = this.fi(fiKey).fi_key;
        const result = removeWorkbooks(this.workbooks(key), ids);
        this.collections.set(key, result.updated);

        const staged = this.pending.get(key);
        if (staged) {
            const removed = new Set(ids);
            this.pending.set(key, staged.filter((wb) => !removed.has(wb.wb_id)));
        }
        return result;
    }

    /**
     * Catalog one file of a workflow folder, e.g. a workbook a command has
     * just written there. Returns the entry, the existing one when the file
     * is cataloged already.
     *
     * @throws ConfigurationError when the workflow has no folder for the purpose
     */
    catalogFile(fiKey: string, wfKey: string, purpose: string, file: FileDescriptor): Workbook {
        const key = this.fi(fiKey).fi_key;
        assertPurpose(purpose);
        const target = this.purposeFolder(wfKey, purpose);
        if (!target) {
            throw new ConfigurationError(`Workflow '${wfKey}' has no ${purpose} folder`);
        }
        const context: DiscoveryContext = {
            fiKey: key,
            wfKey: this.workflow(wfKey).wf_key,
            purpose,
            folderId: target.folderId,
            folder: target.folder,
        };
        const [candidate] = buildCandidates([file], context);
        const staged = this.pending.get(key) ?? [];
        const entry = staged.find((wb) => wb.wb_id === candidate.wb_id) ?? candidate;
        this.pending.set(key, staged.filter((wb) => wb !== entry));

        const { updated } = reconcile(this.workbooks(key), [entry]);
        this.collections.set(key, updated);
        return updated.get(entry.wb_id) ?? entry;
    }

    /**
     * Replace the load state of one cataloged entry. Ids and locations never
     * change here.
     */
    updateWorkbook(
        fiKey: string,
        wbId: string,
        patch: Partial<Pick<Workbook, 'wb_loaded' | 'wb_last_error' | 'wb_type'>>
    ): Workbook {
        const key = this.fi(fiKey).fi_key;
        const collection = this.workbooks(key);
        const existing = collection.get(wbId);
        if (!existing) {
            throw new NotFoundError(wbId, `Workbook '${wbId}' is not cataloged for FI '${key}'`);
        }
        const next: Workbook = { ...existing, ...patch };
        if (next.wb_last_error === undefined) {
            delete next.wb_last_error;
        }
        const updated = new Map(collection);
        updated.set(wbId, next);
        this.collections.set(key, updated);
        return next;
    }

    /**
     * Verify folders, scan them, and reconcile the findings into the catalog.
     *
     * Order: root folder, then for each FI its folder followed by each
     * (workflow, purpose) folder, scanned and reconciled one at a time.
     *
     * - Root failures and ConfigurationError always propagate.
     * - raiseOnErrors=false: a failing FI is recorded in `skippedFis` and the
     *   next FI is processed; a failing folder is recorded in `warnings` and
     *   the next folder is processed.
     * - raiseOnErrors=true: the first failure propagates.
     *
     * Safe to run again: reconciliation only adds what is missing.
     */
    async initialize(gateway: FolderGateway, options: InitializeOptions = {}): Promise<InitializeReport> {
        const create = options.createMissingFolders ?? this.options.create_missing_folders;
        const raise = options.raiseOnErrors ?? this.options.raise_on_errors;

        const rootPath = gateway.resolve(this.folder);
        await gateway.verify(rootPath, { create, raiseOnMissing: true });
        this.root = rootPath;

        const report: InitializeReport = {
            rootPath,
            fiCount: 0,
            workflowCount: this.workflows.size,
            workbookCount: 0,
            scannedFolderCount: 0,
            addedIds: [],
            staleIds: [],
            warnings: [],
            skippedFis: [],
            cancelled: false,
            digest: '',
        };

        for (const fiKey of this.fis.keys()) {
            if (options.signal?.aborted) {
                report.cancelled = true;
                break;
            }
            try {
                await this.initializeFi(fiKey, gateway, create, raise, report);
                report.fiCount++;
            } catch (err) {
                if (raise || err instanceof ConfigurationError) {
                    throw err;
                }
                report.skippedFis.push({ fiKey, reason: errorMessage(err) });
            }
        }

        report.workbookCount = this.workbookCount();
        report.digest = catalogDigest(this.collections.values());
        return report;
    }

    private async initializeFi(
        fiKey: string,
        gateway: FolderGateway,
        create: boolean,
        raise: boolean,
        report: InitializeReport
    ): Promise<void> {
        const fi = this.fi(fiKey);
        const fiPath = gateway.resolve(this.folder, fi.fi_folder);
        await gateway.verify(fiPath, { create, raiseOnMissing: true });

        for (const wf of this.workflows.values()) {
            for (const purpose of PURPOSES) {
                const target = this.purposeFolder(wf.wf_key, purpose);
                if (!target) {
                    continue;
                }
                const context: DiscoveryContext = {
                    fiKey,
                    wfKey: wf.wf_key,
                    purpose,
                    folderId: target.folderId,
                    folder: target.folder,
                };
                const warn = (reason: string, path?: string) =>
                    report.warnings.push({ fiKey, wfKey: wf.wf_key, purpose, folder: target.folder, path, reason });

                let path: string;
                try {
                    path = gateway.resolve(this.folder, fi.fi_folder, target.folder);
                    const exists = await gateway.verify(path, { create, raiseOnMissing: raise });
                    if (!exists) {
                        warn('Folder does not exist', path);
                        continue;
                    }
                } catch (err) {
                    if (raise || err instanceof ConfigurationError) {
                        throw err;
                    }
                    warn(errorMessage(err));
                    continue;
                }

                this.restorePending(context);

                const discovery = await discoverWorkbooks(gateway, path, context);
                if (discovery.diagnostic) {
                    warn(discovery.diagnostic, path);
                    continue;
                }

                const existing = this.workbooks(fiKey);
                const { updated, addedIds } = reconcile(existing, discovery.workbooks);
                const scope: ScannedScope = { wfKey: wf.wf_key, purpose, folder: target.folder };
                this.collections.set(fiKey, updated);

                report.scannedFolderCount++;
                report.addedIds.push(...addedIds);
                report.staleIds.push(...findStaleIds(updated, discovery.workbooks, [scope]));
            }
        }
    }

    /**
     * Catalog persisted entries of a scope whose folder was just verified.
     */
    private restorePending(context: DiscoveryContext): void {
        const staged = this.pending.get(context.fiKey);
        if (!staged || staged.length === 0) {
            return;
        }
        const inScope = (wb: Workbook) =>
            wb.wf_key === context.wfKey &&
            wb.wf_purpose === context.purpose &&
            wb.wf_folder === context.folder;

        const { updated } = reconcile(this.workbooks(context.fiKey), staged.filter(inScope));
        this.collections.set(context.fiKey, updated);
        this.pending.set(context.fiKey, staged.filter((wb) => !inScope(wb)));
    }

    private stagePersistedWorkbooks(persisted: Record<string, Workbook[]>): void {
        for (const [fiKey, list] of Object.entries(persisted)) {
            if (!this.fis.has(fiKey)) {
                throw new ConfigurationError(`Workbook metadata recorded for unknown FI '${fiKey}'`);
            }
            const seen = new Set<string>();
            const staged: Workbook[] = [];
            for (const wb of list) {
                if (wb.fi_key !== fiKey) {
                    throw new ConfigurationError(
                        `Workbook '${wb.wb_id}' is recorded under FI '${fiKey}' but belongs to '${wb.fi_key}'`
                    );
                }
                if (!this.workflows.has(wb.wf_key)) {
                    throw new ConfigurationError(`Workbook '${wb.wb_id}' references unknown workflow '${wb.wf_key}'`);
                }
                const expectedId = persistedWorkbookId(wb);
                if (wb.wb_id !== expectedId) {
                    throw new ConfigurationError(`Workbook id '${wb.wb_id}' does not match its location ('${expectedId}')`);
                }
                if (seen.has(wb.wb_id)) {
                    throw new ConfigurationError(`Duplicate workbook id '${wb.wb_id}' for FI '${fiKey}'`);
                }
                seen.add(wb.wb_id);
                staged.push({ ...wb, wb_loaded: false });
            }
            this.pending.set(fiKey, staged);
        }
    }

    // ========================================================================
    // Persistence
    // ========================================================================

    /**
     * Dehydrate the model into a configuration record. Workbook content is
     * never included and every entry is written as not loaded. Entries still
     * waiting for their folder to be verified are written back unchanged.
     */
    toRecord(dataContext: DataContextRecord = this.dataContextDefaults): BudgetStore {
        const workbooks: Record<string, Workbook[]> = {};
        for (const fiKey of this.fis.keys()) {
            const cataloged = this.sortedWorkbooks(fiKey);
            const catalogedIds = new Set(cataloged.map((wb) => wb.wb_id));
            const staged = (this.pending.get(fiKey) ?? []).filter((wb) => !catalogedIds.has(wb.wb_id));
            const entries = sortedWorkbooks(new Map([...cataloged, ...staged].map((wb) => [wb.wb_id, wb])));
            if (entries.length > 0) {
                workbooks[fiKey] = entries.map((wb) => ({ ...wb, wb_loaded: false }));
            }
        }

        return {
            bdm_id: this.bdmId,
            bdm_folder: this.folder,
            fi_collection: Object.fromEntries(this.fis),
            wf_collection: Object.fromEntries(this.workflows),
            options: this.options,
            data_context: { ...dataContext },
            workbooks,
            last_modified: new Date().toISOString(),
        };
    }
}

// ============================================================================
// Construction-time validation
// ============================================================================

function buildFiCollection(collection: Record<string, FinancialInstitution>): Map<string, FinancialInstitution> {
    const fis = new Map<string, FinancialInstitution>();
    for (const [key, fi] of Object.entries(collection)) {
        if (key !== fi.fi_key) {
            throw new ConfigurationError(`FI entry '${key}' has mismatched fi_key '${fi.fi_key}'`);
        }
        if (fi.fi_key === ALL_KEY) {
            throw new ConfigurationError(`"${ALL_KEY}" cannot be used as an FI key`);
        }
        if (fis.has(fi.fi_key)) {
            throw new ConfigurationError(`Duplicate FI key '${fi.fi_key}'`);
        }
        fis.set(fi.fi_key, fi);
    }
    return fis;
}

function buildWfCollection(collection: Record<string, Workflow>): Map<string, Workflow> {
    const workflows = new Map<string, Workflow>();
    for (const [key, wf] of Object.entries(collection)) {
        if (key !== wf.wf_key) {
            throw new ConfigurationError(`Workflow entry '${key}' has mismatched wf_key '${wf.wf_key}'`);
        }
        if (wf.wf_key === ALL_KEY) {
            throw new ConfigurationError(`"${ALL_KEY}" cannot be used as a workflow key`);
        }
        if (workflows.has(wf.wf_key)) {
            throw new ConfigurationError(`Duplicate workflow key '${wf.wf_key}'`);
        }
        for (const purpose of PURPOSES) {
            const folderId = wf.wf_purpose_folder_map[purpose];
            if (!folderId) {
                continue;
            }
            if (!Object.prototype.hasOwnProperty.call(wf.wf_folders, folderId)) {
                throw new ConfigurationError(
                    `Workflow '${wf.wf_key}' maps purpose '${purpose}' to undeclared folder id '${folderId}'`
                );
            }
            const folder = wf.wf_folders[folderId];
            if (folder !== null && folder.trim().length === 0) {
                throw new ConfigurationError(
                    `Workflow '${wf.wf_key}' folder '${folderId}' used for purpose '${purpose}' is empty`
                );
            }
            if (folder !== null && folder.includes(WORKBOOK_ID.SEPARATOR)) {
                throw new ConfigurationError(
                    `Workflow '${wf.wf_key}' folder '${folderId}' ('${folder}') contains '${WORKBOOK_ID.SEPARATOR}'`
                );
            }
        }
        workflows.set(wf.wf_key, wf);
    }
    return workflows;
}

function persistedWorkbookId(wb: Workbook): string {
    try {
        return workbookId({
            fiKey: wb.fi_key,
            wfKey: wb.wf_key,
            purpose: wb.wf_purpose,
            folder: wb.wf_folder,
            name: wb.wb_name,
        });
    } catch (err) {
        throw new ConfigurationError(`Workbook '${wb.wb_id}' has an invalid location: ${errorMessage(err)}`, {
            cause: err,
        });
    }
}

function requireConcreteKey(kind: KeyKind, key: string): string {
    if (key === ALL_KEY) {
        throw new KeyNotFoundError(kind, key, `"${ALL_KEY}" is not a concrete ${kind} key here`);
    }
    return key;
}

export function isPurpose(value: string): value is Purpose {
    return (PURPOSES as readonly string[]).includes(value);
}

function assertPurpose(value: string): asserts value is Purpose {
    if (!isPurpose(value)) {
        throw new KeyNotFoundError('purpose', value);
    }
}

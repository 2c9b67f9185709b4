/**
 * Data Context: the working state of a session.
 *
 * Tracks the current FI / workflow / purpose / workbook selection and a
 * lazy content cache over the model's workbooks. Content is opaque here;
 * it is whatever the WorkbookContentStore hands back.
 *
 * ARCHITECTURAL NOTE: No console.* calls and no node:fs.
 */

import type { DataContextRecord, Purpose, Workbook } from '../types/index.js';
import type { FolderGateway, SaveAck, WorkbookContentStore } from '../storage/types.js';
import { BudgetDomainModel, isPurpose } from '../model/domain-model.js';
import type { InitializeOptions, InitializeReport } from '../model/types.js';
import type { RemoveResult } from '../catalog/remove.js';
import { BudgetWorkbenchError, KeyNotFoundError, NotFoundError, errorMessage } from '../errors.js';
import {
    UNRESOLVED,
    parseWorkbookRef,
    resolveWorkbookRef,
    type ResolvedRef,
    type WorkbookRef,
} from './reference.js';

export type DataContextState = 'uninitialized' | 'initializing' | 'ready';

/**
 * Current workbook selection. Replaced as a whole, never edited in place.
 */
export interface CurrentWorkbook {
    readonly index: number;
    readonly id: string;
    readonly name: string;
}

export class DataContext<TContent> {
    readonly model: BudgetDomainModel;
    private readonly store: WorkbookContentStore<TContent>;

    private status: DataContextState = 'uninitialized';
    private fi: string | null = null;
    private wf: string | null = null;
    private wfPurpose: Purpose | null = null;
    private current: CurrentWorkbook | null = null;

    private readonly cache = new Map<string, TContent>();
    private readonly inflight = new Map<string, Promise<TContent>>();

    constructor(model: BudgetDomainModel, store: WorkbookContentStore<TContent>) {
        this.model = model;
        this.store = store;
    }

    get state(): DataContextState {
        return this.status;
    }

    get fiKey(): string | null {
        return this.fi;
    }

    get wfKey(): string | null {
        return this.wf;
    }

    get purpose(): Purpose | null {
        return this.wfPurpose;
    }

    /**
     * Current selection, or null. A selection whose workbook has left the
     * active collection reads as null; one whose position moved is
     * re-indexed.
     */
    get currentWorkbook(): CurrentWorkbook | null {
        return this.refreshSelection();
    }

    private refreshSelection(): CurrentWorkbook | null {
        const selected = this.current;
        if (!selected) {
            return null;
        }
        const ordered = this.activeWorkbooks();
        const index = ordered.findIndex((wb) => wb.wb_id === selected.id);
        if (index < 0) {
            this.current = null;
            return null;
        }
        if (index !== selected.index) {
            this.current = Object.freeze({ ...selected, index });
        }
        return this.current;
    }

    // ========================================================================
    // Lifecycle
    // ========================================================================

    /**
     * Initialize the model, then set selectors from the record's defaults.
     * Invalid defaults fall back to the first configured FI / workflow.
     */
    async initialize(gateway: FolderGateway, options: InitializeOptions = {}): Promise<InitializeReport> {
        if (this.status === 'initializing') {
            throw new BudgetWorkbenchError('Data context is already initializing');
        }
        this.status = 'initializing';
        const defaults = this.model.dataContextDefaults;
        this.applySelectorDefaults(defaults);

        let report: InitializeReport;
        try {
            report = await this.model.initialize(gateway, options);
        } catch (err) {
            this.status = 'uninitialized';
            throw err;
        }

        this.current = null;
        if (defaults.wb_ref !== null) {
            this.selectWorkbook(defaults.wb_ref);
        }
        this.status = 'ready';
        return report;
    }

    private applySelectorDefaults(defaults: DataContextRecord): void {
        const fiKeys = this.model.fiKeys();
        const wfKeys = this.model.workflowKeys();
        this.fi = defaults.fi_key !== null && fiKeys.includes(defaults.fi_key) ? defaults.fi_key : fiKeys[0] ?? null;
        this.wf = defaults.wf_key !== null && wfKeys.includes(defaults.wf_key) ? defaults.wf_key : wfKeys[0] ?? null;
        this.wfPurpose = defaults.wf_purpose;
    }

    // ========================================================================
    // Selectors
    // ========================================================================

    /**
     * Change the current FI. Clears the workbook selection when it does not
     * belong to the new FI's collection.
     */
    setFi(key: string): void {
        this.fi = this.model.fi(key).fi_key;
        this.refreshSelection();
    }

    setWorkflow(key: string): void {
        this.wf = this.model.workflow(key).wf_key;
    }

    setPurpose(purpose: string): void {
        if (!isPurpose(purpose)) {
            throw new KeyNotFoundError('purpose', purpose);
        }
        this.wfPurpose = purpose;
    }

    /**
     * Make a workbook current. Returns the resolution; "all" and unmatched
     * references leave the selection unchanged.
     */
    selectWorkbook(ref: WorkbookRef | string | number): ResolvedRef {
        const resolved = this.resolveReference(ref);
        if (resolved.workbook) {
            this.current = Object.freeze({
                index: resolved.index,
                id: resolved.workbook.wb_id,
                name: resolved.workbook.wb_name,
            });
        }
        return resolved;
    }

    // ========================================================================
    // Reference resolution
    // ========================================================================

    /**
     * Workbooks of the current FI in display order (sorted by id).
     */
    activeWorkbooks(): Workbook[] {
        return this.fi === null ? [] : this.model.sortedWorkbooks(this.fi);
    }

    /**
     * Resolve a reference against the active collection. Never throws.
     */
    resolveReference(ref: WorkbookRef | string | number): ResolvedRef {
        const parsed = typeof ref === 'object' ? ref : parseWorkbookRef(ref);
        if (parsed.kind !== 'all' && this.fi === null) {
            return UNRESOLVED;
        }
        return resolveWorkbookRef(parsed, this.activeWorkbooks());
    }

    /**
     * Workbooks a reference stands for: the whole active collection for
     * "all", one workbook, or none.
     */
    workbooksFor(ref: WorkbookRef | string | number): Workbook[] {
        const resolved = this.resolveReference(ref);
        if (resolved.isAll) {
            return this.activeWorkbooks();
        }
        return resolved.workbook ? [resolved.workbook] : [];
    }

    // ========================================================================
    // Content
    // ========================================================================

    isCached(workbook: Workbook): boolean {
        return this.cache.has(workbook.wb_id);
    }

    /**
     * Content of a workbook, loading it on first use. A loaded workbook
     * becomes the current one.
     *
     * @throws NotFoundError if the workbook is not in the active collection
     */
    async load(workbook: Workbook): Promise<TContent> {
        const member = this.requireMember(workbook);

        const cached = this.cache.get(member.wb_id);
        if (cached !== undefined) {
            this.selectWorkbook({ kind: 'id', id: member.wb_id });
            return cached;
        }

        let pending = this.inflight.get(member.wb_id);
        if (!pending) {
            pending = this.loadFromStore(member);
            this.inflight.set(member.wb_id, pending);
        }
        try {
            return await pending;
        } finally {
            this.inflight.delete(member.wb_id);
        }
    }

    private async loadFromStore(member: Workbook): Promise<TContent> {
        let content: TContent;
        try {
            content = await this.store.load(member);
        } catch (err) {
            this.updateEntry(member, { wb_loaded: false, wb_last_error: errorMessage(err) });
            throw err;
        }
        this.cache.set(member.wb_id, content);
        this.updateEntry(member, { wb_loaded: true, wb_last_error: undefined });
        this.selectWorkbook({ kind: 'id', id: member.wb_id });
        return content;
    }

    /**
     * Persist the cached content of a workbook.
     *
     * @throws NotFoundError if the workbook has no cached content
     */
    async save(workbook: Workbook): Promise<SaveAck> {
        const content = this.cache.get(workbook.wb_id);
        if (content === undefined) {
            throw new NotFoundError(workbook.wb_id, `Workbook '${workbook.wb_name}' has no loaded content to save`);
        }
        return this.store.save(this.requireMember(workbook), content);
    }

    /**
     * Write the cached content of a workbook to another cataloged workbook,
     * such as a workflow's output. The content moves with it: the source
     * reads as not loaded and the target becomes current.
     *
     * @throws NotFoundError if the source has no cached content or either
     * workbook is outside the active collection
     */
    async saveAs(source: Workbook, target: Workbook): Promise<SaveAck> {
        const member = this.requireMember(source);
        const destination = this.requireMember(target);
        const content = this.cache.get(member.wb_id);
        if (content === undefined) {
            throw new NotFoundError(member.wb_id, `Workbook '${member.wb_name}' has no loaded content to save`);
        }
        if (destination.wb_id === member.wb_id) {
            return this.store.save(member, content);
        }

        const ack = await this.store.save(destination, content);
        this.cache.delete(member.wb_id);
        this.updateEntry(member, { wb_loaded: false });
        this.cache.set(destination.wb_id, content);
        this.updateEntry(destination, { wb_loaded: true, wb_last_error: undefined });
        this.selectWorkbook({ kind: 'id', id: destination.wb_id });
        return ack;
    }

    /**
     * Replace the cached content of a loaded workbook, e.g. after editing a
     * copy. The change reaches storage on the next save().
     */
    putContent(workbook: Workbook, content: TContent): void {
        const member = this.requireMember(workbook);
        if (!this.cache.has(member.wb_id)) {
            throw new NotFoundError(member.wb_id, `Workbook '${member.wb_name}' is not loaded`);
        }
        this.cache.set(member.wb_id, content);
    }

    /**
     * Drop cached content. The catalog entry stays.
     */
    unload(workbook: Workbook): boolean {
        const dropped = this.cache.delete(workbook.wb_id);
        const member = this.model.workbook(workbook.fi_key, workbook.wb_id);
        if (member) {
            this.updateEntry(member, { wb_loaded: false });
        }
        return dropped;
    }

    /**
     * Explicitly remove a workbook from the catalog. Drops its cached
     * content and clears the selection when it pointed there.
     */
    removeWorkbook(ref: WorkbookRef | string | number): RemoveResult | null {
        const resolved = this.resolveReference(ref);
        const target = resolved.workbook;
        if (!target) {
            return null;
        }
        this.cache.delete(target.wb_id);
        if (this.current?.id === target.wb_id) {
            this.current = null;
        }
        return this.model.removeWorkbooks(target.fi_key, [target.wb_id]);
    }

    // ========================================================================
    // Persistence
    // ========================================================================

    /**
     * Selectors as a configuration sub-record. The workbook is stored by id.
     */
    toRecord(): DataContextRecord {
        return {
            fi_key: this.fi,
            wf_key: this.wf,
            wf_purpose: this.wfPurpose,
            wb_ref: this.currentWorkbook?.id ?? null,
        };
    }

    private requireMember(workbook: Workbook): Workbook {
        const member = this.fi === null ? undefined : this.model.workbook(this.fi, workbook.wb_id);
        if (!member) {
            throw new NotFoundError(
                workbook.wb_id,
                `Workbook '${workbook.wb_name}' is not in the active collection${this.fi ? ` of FI '${this.fi}'` : ''}`
            );
        }
        return member;
    }

    private updateEntry(member: Workbook, patch: Partial<Pick<Workbook, 'wb_loaded' | 'wb_last_error'>>): void {
        this.model.updateWorkbook(member.fi_key, member.wb_id, patch);
    }
}

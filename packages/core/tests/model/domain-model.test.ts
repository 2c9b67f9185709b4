import { describe, it, expect, beforeEach } from 'vitest';
import { BudgetDomainModel } from '../../src/model/domain-model.js';
import { BudgetStoreSchema } from '../../src/types/index.js';
import type { BudgetStore } from '../../src/types/index.js';
import { ConfigurationError, KeyNotFoundError, NotFoundError } from '../../src/errors.js';
import type { ScanResult } from '../../src/storage/types.js';
import { MemoryFolderGateway, makeStore } from '../helpers/memory-storage.js';

const NEW = '/budget/boa/data/new';
const idOf = (name: string) => `boa|categorization|input|data/new|${name}`;

describe('BudgetDomainModel construction', () => {
    it('indexes FIs and workflows by key', () => {
        const model = new BudgetDomainModel(makeStore());
        expect(model.fiKeys()).toEqual(['boa', 'merrill']);
        expect(model.workflowKeys()).toEqual(['categorization']);
        expect(model.fi('boa').fi_name).toBe('Bank of America');
        expect(model.initialized).toBe(false);
    });

    it('rejects a record key that differs from the entity key', () => {
        const store = makeStore();
        const bad: BudgetStore = { ...store, fi_collection: { chase: store.fi_collection.boa } };
        expect(() => new BudgetDomainModel(bad)).toThrow("FI entry 'chase' has mismatched fi_key 'boa'");
    });

    it('rejects the "all" sentinel as a key', () => {
        const store = makeStore();
        const bad: BudgetStore = {
            ...store,
            fi_collection: { all: { ...store.fi_collection.boa, fi_key: 'all' } },
        };
        expect(() => new BudgetDomainModel(bad)).toThrow(ConfigurationError);
    });

    it('rejects a purpose mapped to an undeclared folder id', () => {
        const store = makeStore({
            wf_collection: {
                intake: {
                    wf_key: 'intake',
                    wf_name: 'Intake',
                    wf_folders: { wf_input_folder: 'data/new' },
                    wf_purpose_folder_map: { input: 'wf_missing_folder' },
                },
            },
        });
        expect(() => new BudgetDomainModel(store)).toThrow(
            "Workflow 'intake' maps purpose 'input' to undeclared folder id 'wf_missing_folder'"
        );
    });

    it('rejects an empty folder for a mapped purpose', () => {
        const store = makeStore({
            wf_collection: {
                intake: {
                    wf_key: 'intake',
                    wf_name: 'Intake',
                    wf_folders: { wf_input_folder: ' ' },
                    wf_purpose_folder_map: { input: 'wf_input_folder' },
                },
            },
        });
        expect(() => new BudgetDomainModel(store)).toThrow(ConfigurationError);
    });

    it('rejects a mapped folder holding the workbook id separator', () => {
        const store = makeStore();
        const wf = store.wf_collection.categorization;
        const bad: BudgetStore = {
            ...store,
            wf_collection: {
                categorization: { ...wf, wf_folders: { ...wf.wf_folders, wf_input_folder: 'data|new' } },
            },
        };
        expect(() => new BudgetDomainModel(bad)).toThrow(
            "Workflow 'categorization' folder 'wf_input_folder' ('data|new') contains '|'"
        );
    });
});

describe('BudgetDomainModel lookups', () => {
    const model = new BudgetDomainModel(makeStore());

    it('throws KeyNotFoundError for unknown keys', () => {
        expect(() => model.fi('chase')).toThrow(KeyNotFoundError);
        expect(() => model.workflow('budgeting')).toThrow("Unknown workflow key: 'budgeting'");
    });

    it('does not treat "all" as a concrete key', () => {
        expect(() => model.fi('all')).toThrow(KeyNotFoundError);
        expect(() => model.workbooks('all')).toThrow(KeyNotFoundError);
    });

    it('expands "all" where a selection is expected', () => {
        expect(model.selectFiKeys('all')).toEqual(['boa', 'merrill']);
        expect(model.selectFiKeys('merrill')).toEqual(['merrill']);
        expect(model.selectWorkflowKeys('all')).toEqual(['categorization']);
    });

    it('maps purposes to folder roles', () => {
        expect(model.purposeFolder('categorization', 'input')).toEqual({
            folderId: 'wf_input_folder',
            folder: 'data/new',
        });
        expect(model.purposeFolder('categorization', 'working')).toBeNull();
        expect(() => model.purposeFolder('categorization', 'archive')).toThrow("Unknown purpose key: 'archive'");
    });

    it('returns configured prefixes', () => {
        expect(model.purposePrefix('categorization', 'output')).toBe('categorized_');
        expect(model.purposePrefix('categorization', 'input')).toBeNull();
    });

    it('names output workbooks with the output prefix', () => {
        expect(model.outputName('categorization', 'register.xlsx')).toBe('categorized_register.xlsx');
    });

    it('drops the input prefix from output names', () => {
        const store = makeStore();
        const wf = store.wf_collection.categorization;
        const prefixed = new BudgetDomainModel({
            ...store,
            wf_collection: { categorization: { ...wf, wf_prefixes: { input: 'raw_', output: 'categorized_' } } },
        });
        expect(prefixed.outputName('categorization', 'raw_jan.xlsx')).toBe('categorized_jan.xlsx');
        expect(prefixed.outputName('categorization', 'feb.xlsx')).toBe('categorized_feb.xlsx');
    });
});

describe('BudgetDomainModel.initialize', () => {
    let gateway: MemoryFolderGateway;

    beforeEach(() => {
        gateway = new MemoryFolderGateway().addFile(NEW, 'B.xlsx').addFile(NEW, 'A.xlsx');
    });

    it('catalogs the workbooks of each mapped folder', async () => {
        const model = new BudgetDomainModel(makeStore());
        const report = await model.initialize(gateway);

        expect(report.addedIds).toEqual([idOf('A.xlsx'), idOf('B.xlsx')]);
        expect(report).toMatchObject({
            rootPath: '/budget',
            fiCount: 2,
            workflowCount: 1,
            workbookCount: 2,
            scannedFolderCount: 4,
            staleIds: [],
            warnings: [],
            skippedFis: [],
            cancelled: false,
        });
        expect(model.sortedWorkbooks('boa').map((wb) => [wb.wb_name, wb.wf_purpose, wb.wf_folder])).toEqual([
            ['A.xlsx', 'input', 'data/new'],
            ['B.xlsx', 'input', 'data/new'],
        ]);
        expect(model.workbooks('merrill').size).toBe(0);
        expect(model.rootPath).toBe('/budget');
    });

    it('creates missing folders when asked to', async () => {
        await new BudgetDomainModel(makeStore()).initialize(gateway, { createMissingFolders: true });
        expect(gateway.created).toEqual([
            '/budget/boa/data/categorized',
            '/budget/merrill',
            '/budget/merrill/data/new',
            '/budget/merrill/data/categorized',
        ]);
    });

    it('is idempotent', async () => {
        const model = new BudgetDomainModel(makeStore());
        const first = await model.initialize(gateway);
        const second = await model.initialize(gateway);

        expect(second.addedIds).toEqual([]);
        expect(second.workbookCount).toBe(2);
        expect(second.digest).toBe(first.digest);
    });

    it('adds new files and keeps vanished ones, reporting them as stale', async () => {
        const model = new BudgetDomainModel(makeStore());
        await model.initialize(gateway);

        gateway.addFile(NEW, 'C.csv').removeFile(NEW, 'A.xlsx');
        const report = await model.initialize(gateway);

        expect(report.addedIds).toEqual([idOf('C.csv')]);
        expect(report.staleIds).toEqual([idOf('A.xlsx')]);
        expect(model.sortedWorkbooks('boa').map((wb) => wb.wb_name)).toEqual(['A.xlsx', 'B.xlsx', 'C.csv']);
    });

    it('keeps a loaded entry untouched on rescan', async () => {
        const model = new BudgetDomainModel(makeStore());
        await model.initialize(gateway);
        model.updateWorkbook('boa', idOf('A.xlsx'), { wb_loaded: true, wb_type: 'budget' });

        await model.initialize(gateway);

        expect(model.workbook('boa', idOf('A.xlsx'))).toMatchObject({ wb_loaded: true, wb_type: 'budget' });
    });

    it('skips unreachable FIs and folders without creation', async () => {
        const model = new BudgetDomainModel(makeStore());
        const report = await model.initialize(gateway, { createMissingFolders: false });

        expect(report.fiCount).toBe(1);
        expect(report.skippedFis).toEqual([{ fiKey: 'merrill', reason: 'Folder does not exist: /budget/merrill' }]);
        expect(report.warnings).toEqual([
            {
                fiKey: 'boa',
                wfKey: 'categorization',
                purpose: 'output',
                folder: 'data/categorized',
                path: '/budget/boa/data/categorized',
                reason: 'Folder does not exist',
            },
        ]);
        expect(report.workbookCount).toBe(2);
        expect(gateway.created).toEqual([]);
    });

    it('propagates the first failure when raising', async () => {
        const model = new BudgetDomainModel(makeStore());
        await expect(
            model.initialize(gateway, { createMissingFolders: false, raiseOnErrors: true })
        ).rejects.toThrow('Folder does not exist: /budget/boa/data/categorized');
    });

    it('takes defaults from the store options', async () => {
        const store = makeStore({ options: { create_missing_folders: false, raise_on_errors: true } });
        await expect(new BudgetDomainModel(store).initialize(gateway)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('fails when the root folder is missing, whatever the error policy', async () => {
        const model = new BudgetDomainModel(makeStore({ bdm_folder: '/elsewhere' }));
        await expect(model.initialize(gateway, { createMissingFolders: false })).rejects.toThrow(
            'Folder does not exist: /elsewhere'
        );
        expect(model.initialized).toBe(false);
    });

    it('records an unreadable folder and continues with its siblings', async () => {
        gateway.unreadable.add(NEW);
        const report = await new BudgetDomainModel(makeStore()).initialize(gateway);

        expect(report.warnings).toEqual([
            {
                fiKey: 'boa',
                wfKey: 'categorization',
                purpose: 'input',
                folder: 'data/new',
                path: NEW,
                reason: `Cannot read folder: ${NEW}`,
            },
        ]);
        expect(report.scannedFolderCount).toBe(3);
        expect(report.workbookCount).toBe(0);
    });

    it('records a folder that cannot be verified', async () => {
        gateway.broken.add('/budget/boa/data/categorized');
        const report = await new BudgetDomainModel(makeStore()).initialize(gateway);

        expect(report.warnings.map((w) => w.reason)).toEqual(['Permission denied: /budget/boa/data/categorized']);
        expect(report.fiCount).toBe(2);
    });

    it('always propagates configuration errors', async () => {
        const store = makeStore();
        const bad: BudgetStore = {
            ...store,
            fi_collection: { ...store.fi_collection, boa: { ...store.fi_collection.boa, fi_folder: '' } },
        };
        await expect(new BudgetDomainModel(bad).initialize(gateway)).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('does nothing past the root when cancelled up front', async () => {
        const controller = new AbortController();
        controller.abort();
        const report = await new BudgetDomainModel(makeStore()).initialize(gateway, { signal: controller.signal });

        expect(report.cancelled).toBe(true);
        expect(report.fiCount).toBe(0);
        expect(gateway.scanned).toEqual([]);
    });

    it('stops between FIs when cancelled mid-run', async () => {
        const controller = new AbortController();
        class AbortingGateway extends MemoryFolderGateway {
            override async scan(path: string): Promise<ScanResult> {
                controller.abort();
                return super.scan(path);
            }
        }
        const aborting = new AbortingGateway().addFile(NEW, 'A.xlsx');
        const model = new BudgetDomainModel(makeStore());
        const report = await model.initialize(aborting, { signal: controller.signal });

        expect(report).toMatchObject({ cancelled: true, fiCount: 1, workbookCount: 1 });
        expect(aborting.scanned).toEqual([NEW, '/budget/boa/data/categorized']);
    });
});

describe('BudgetDomainModel persistence', () => {
    async function initializedModel(): Promise<BudgetDomainModel> {
        const model = new BudgetDomainModel(makeStore());
        await model.initialize(new MemoryFolderGateway().addFile(NEW, 'A.xlsx').addFile(NEW, 'B.xlsx'));
        return model;
    }

    function roundTrip(record: BudgetStore): BudgetStore {
        return BudgetStoreSchema.parse(JSON.parse(JSON.stringify(record)));
    }

    it('writes workbook metadata per FI, never as loaded', async () => {
        const model = await initializedModel();
        model.updateWorkbook('boa', idOf('A.xlsx'), { wb_loaded: true });

        const record = model.toRecord();

        expect(Object.keys(record.workbooks)).toEqual(['boa']);
        expect(record.workbooks.boa?.map((wb) => [wb.wb_name, wb.wb_loaded])).toEqual([
            ['A.xlsx', false],
            ['B.xlsx', false],
        ]);
        expect(record.fi_collection).toEqual(makeStore().fi_collection);
    });

    it('restores persisted entries once their folder is verified', async () => {
        const model = new BudgetDomainModel(roundTrip((await initializedModel()).toRecord()));
        expect(model.workbookCount()).toBe(0);

        const report = await model.initialize(new MemoryFolderGateway().addFile(NEW, 'B.xlsx'));

        expect(report.addedIds).toEqual([]);
        expect(report.staleIds).toEqual([idOf('A.xlsx')]);
        expect(model.sortedWorkbooks('boa').map((wb) => wb.wb_name)).toEqual(['A.xlsx', 'B.xlsx']);
    });

    it('writes back entries whose folder was not verified yet', async () => {
        const model = new BudgetDomainModel(roundTrip((await initializedModel()).toRecord()));
        expect(model.toRecord().workbooks.boa).toHaveLength(2);
    });

    it('catalogs a persisted entry once when its file is written again', async () => {
        const model = new BudgetDomainModel(roundTrip((await initializedModel()).toRecord()));

        const entry = model.catalogFile('boa', 'categorization', 'input', {
            name: 'A.xlsx',
            stem: 'A',
            extension: '.xlsx',
            url: `file://${NEW}/A.xlsx`,
        });

        expect(entry.wb_id).toBe(idOf('A.xlsx'));
        expect(model.workbookCount()).toBe(1);
        expect(model.toRecord().workbooks.boa?.map((wb) => wb.wb_name)).toEqual(['A.xlsx', 'B.xlsx']);
    });

    it('rejects persisted entries whose id does not match their location', async () => {
        const record = (await initializedModel()).toRecord();
        const [first] = record.workbooks.boa ?? [];
        const tampered: BudgetStore = { ...record, workbooks: { boa: [{ ...first, wb_id: 'boa|x' }] } };
        expect(() => new BudgetDomainModel(tampered)).toThrow(ConfigurationError);
    });

    it('rejects persisted entries for an unknown FI', async () => {
        const record = (await initializedModel()).toRecord();
        const moved: BudgetStore = { ...record, workbooks: { chase: record.workbooks.boa ?? [] } };
        expect(() => new BudgetDomainModel(moved)).toThrow("Workbook metadata recorded for unknown FI 'chase'");
    });
});

describe('BudgetDomainModel.removeWorkbooks', () => {
    it('removes entries explicitly', async () => {
        const gateway = new MemoryFolderGateway().addFile(NEW, 'A.xlsx').addFile(NEW, 'B.xlsx');
        const model = new BudgetDomainModel(makeStore());
        await model.initialize(gateway);

        const result = model.removeWorkbooks('boa', [idOf('A.xlsx')]);

        expect(result.removed.map((wb) => wb.wb_name)).toEqual(['A.xlsx']);
        expect(model.sortedWorkbooks('boa').map((wb) => wb.wb_name)).toEqual(['B.xlsx']);
    });

    it('catalogs a written file once', async () => {
        const gateway = new MemoryFolderGateway().addFile(NEW, 'A.xlsx');
        const model = new BudgetDomainModel(makeStore());
        await model.initialize(gateway);
        const file = {
            name: 'categorized_A.xlsx',
            stem: 'categorized_A',
            extension: '.xlsx',
            url: 'file:///budget/boa/data/categorized/categorized_A.xlsx',
        };

        const entry = model.catalogFile('boa', 'categorization', 'output', file);
        const again = model.catalogFile('boa', 'categorization', 'output', file);

        expect(entry).toMatchObject({
            wb_id: 'boa|categorization|output|data/categorized|categorized_A.xlsx',
            wf_purpose: 'output',
            wf_folder_id: 'wf_output_folder',
            wf_folder: 'data/categorized',
            wb_loaded: false,
        });
        expect(again).toBe(entry);
        expect(model.workbookCount()).toBe(2);
        expect(() => model.catalogFile('boa', 'categorization', 'working', file)).toThrow(
            "Workflow 'categorization' has no working folder"
        );
    });

        it('reports an update of an uncataloged entry', () => {
        const model = new BudgetDomainModel(makeStore());
        expect(() => model.updateWorkbook('boa', idOf('A.xlsx'), { wb_loaded: true })).toThrow(NotFoundError);
    });
});

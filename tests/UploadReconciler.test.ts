import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { TimesheetLine } from '../src/types';
import {
    ConstraintError,
    HistoryError,
    LineUploadError,
    MissingRecordError,
    TooManyRecordsError,
} from '../src/upload/errors';
import { Ledger } from '../src/upload/Ledger';
import {
    PROJECT_MODEL,
    TASK_MODEL,
    TIMESHEET_MODEL,
    UploadReconciler,
} from '../src/upload/UploadReconciler';
import type { UploadOptions } from '../src/upload/UploadReconciler';
import { InMemoryRemoteClient } from './helpers/InMemoryRemoteClient';
import { createLine } from './helpers/records';

describe('UploadReconciler', () => {
    let dir: string;
    let ledgerFile: string;
    let client: InMemoryRemoteClient;
    let reports: string[];
    const ledgers: Ledger[] = [];

    const openLedger = (readOnly = false): Ledger => {
        const ledger = Ledger.open(ledgerFile, { readOnly });
        ledgers.push(ledger);
        return ledger;
    };

    const reconciler = (options: UploadOptions = {}) =>
        new UploadReconciler(client, { reporter: message => reports.push(message), ...options });

    /** The cause a failing line was rejected with */
    const rejection = async (promise: Promise<unknown>): Promise<unknown> => {
        const error = await promise.then(
            () => undefined,
            (reason: unknown) => reason
        );
        expect(error).toBeInstanceOf(LineUploadError);
        return error instanceof LineUploadError ? error.cause : undefined;
    };

    beforeEach(async () => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'upload-'));
        ledgerFile = path.join(dir, 'history.json');
        reports = [];
        jest.spyOn(console, 'error').mockImplementation(() => undefined);

        client = new InMemoryRemoteClient()
            .seed(PROJECT_MODEL, 1, { name: 'Internal' })
            .seed(PROJECT_MODEL, 2, { name: 'Website' })
            .seed(TASK_MODEL, 10, { name: 'Maintenance', project_id: 1 })
            .seed(TASK_MODEL, 11, { name: 'Design', project_id: 2 })
            .seed(TASK_MODEL, 12, { name: 'Design review', project_id: 2 })
            .seed(TASK_MODEL, 13, { name: 'Orphan', project_id: false });
        await client.authenticate();
    });

    afterEach(() => {
        ledgers.splice(0).forEach(ledger => ledger.close());
        fs.rmSync(dir, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    const line = (overrides: Partial<TimesheetLine> = {}): TimesheetLine =>
        createLine({ project: 'Internal', task: 'Maintenance', ...overrides });

    describe('new lines', () => {
        it('should create the timesheet record and remember it in the ledger', async () => {
            const ledger = openLedger();

            const summary = await reconciler({ ledger }).uploadLines([line({ sourceIds: new Set([1, 2]) })]);

            expect(summary).toEqual({ created: 1, skipped: 0, deleted: 0 });
            expect(client.records(TIMESHEET_MODEL)).toEqual([
                {
                    id: 100,
                    date: '2024-01-02',
                    project_id: [1, 'Internal'],
                    task_id: [10, 'Maintenance'],
                    name: 'Work',
                    unit_amount: 1,
                },
            ]);
            expect(reports).toEqual(['Created new record in account.analytic.line with id=100']);
            expect(ledger.lookup(TIMESHEET_MODEL, 1)).toBe(100);
            expect(ledger.refsOf(TIMESHEET_MODEL, 100)).toEqual(new Set([1, 2]));
        });

        it('should upload without a ledger after warning', async () => {
            const summary = await reconciler().uploadLines([line()]);

            expect(summary.created).toBe(1);
            expect(console.error).toHaveBeenCalledWith(
                '[timesheet-bridge]',
                'WARNING:',
                'Performing upload without a ledger file!'
            );
        });

        it('should take the project from the task when the line has none', async () => {
            await reconciler().uploadLine(line({ project: undefined, task: 10 }));

            expect(client.records(TIMESHEET_MODEL)[0]).toMatchObject({ project_id: [1, 'Internal'], task_id: [10, 'Maintenance'] });
        });

        it('should resolve each remote record once per run', async () => {
            const nameSearch = jest.spyOn(client, 'nameSearch');

            await reconciler().uploadLines([
                line({ sourceIds: new Set([1]) }),
                line({ sourceIds: new Set([2]) }),
            ]);

            expect(nameSearch).toHaveBeenCalledTimes(2);
            expect(nameSearch).toHaveBeenCalledWith(PROJECT_MODEL, 'Internal', { limit: 10 });
            expect(nameSearch).toHaveBeenCalledWith(TASK_MODEL, 'Maintenance', { limit: 10 });
        });
    });

    describe('ledger reconciliation', () => {
        it('should skip lines already uploaded', async () => {
            await reconciler({ ledger: openLedger() }).uploadLines([line({ sourceIds: new Set([1, 2]) })]);
            const create = jest.spyOn(client, 'create');

            const summary = await reconciler({ ledger: ledgers[0] }).uploadLines([line({ sourceIds: new Set([2, 1]) })]);

            expect(summary).toEqual({ created: 0, skipped: 1, deleted: 0 });
            expect(create).not.toHaveBeenCalled();
        });

        it('should abort on a partial overlap without overwrite', async () => {
            const ledger = openLedger();
            await reconciler({ ledger }).uploadLines([line({ sourceIds: new Set([1, 2]) })]);
            const create = jest.spyOn(client, 'create');

            const cause = await rejection(reconciler({ ledger }).uploadLines([line({ sourceIds: new Set([1]) })]));

            expect(cause).toBeInstanceOf(HistoryError);
            expect(cause).toEqual(expect.objectContaining({
                message: 'Stored records "account.analytic.line" refs mismatch: stored={1, 2} vs current={1}',
            }));
            expect(create).not.toHaveBeenCalled();
        });

        it('should replace conflicting records when overwriting', async () => {
            const ledger = openLedger();
            await reconciler({ ledger }).uploadLines([line({ sourceIds: new Set([1, 2]) })]);
            reports = [];
            const unlink = jest.spyOn(client, 'unlink');

            const summary = await reconciler({ ledger, overwriteConflicts: true }).uploadLines([
                line({ sourceIds: new Set([1]), unitAmount: 0.5 }),
            ]);

            expect(summary).toEqual({ created: 1, skipped: 0, deleted: 1 });
            expect(unlink).toHaveBeenCalledWith(TIMESHEET_MODEL, [100]);
            expect(reports).toEqual([
                'Deleted records in account.analytic.line with ids={100}',
                'Created new record in account.analytic.line with id=101',
            ]);
            expect(client.records(TIMESHEET_MODEL).map(record => record.id)).toEqual([101]);
            expect(ledger.lookup(TIMESHEET_MODEL, 1)).toBe(101);
            expect(ledger.lookup(TIMESHEET_MODEL, 2)).toBeUndefined();
            expect(ledger.remoteIds(TIMESHEET_MODEL)).toEqual([101]);
        });

        it('should reject lines without source ids', async () => {
            const cause = await rejection(reconciler({ ledger: openLedger() }).uploadLine(line({ sourceIds: new Set() })));

            expect(cause).toBeInstanceOf(ConstraintError);
        });

        it('should stop at the first failing line', async () => {
            const ledger = openLedger();

            await rejection(reconciler({ ledger }).uploadLines([
                line({ sourceIds: new Set([1]) }),
                line({ project: 'Nowhere', sourceIds: new Set([2]) }),
                line({ sourceIds: new Set([3]) }),
            ]));

            expect(client.records(TIMESHEET_MODEL)).toHaveLength(1);
            expect(ledger.lookup(TIMESHEET_MODEL, 1)).toBe(100);
            expect(ledger.lookup(TIMESHEET_MODEL, 3)).toBeUndefined();
        });
    });

    describe('dry run', () => {
        it('should resolve everything but change nothing', async () => {
            const writable = openLedger();
            await reconciler({ ledger: writable }).uploadLines([line({ sourceIds: new Set([1, 2]) })]);
            writable.close();
            const before = fs.readFileSync(ledgerFile, 'utf8');
            reports = [];

            const create = jest.spyOn(client, 'create');
            const unlink = jest.spyOn(client, 'unlink');
            const read = jest.spyOn(client, 'read');

            const summary = await reconciler({ ledger: openLedger(true), dryRun: true, overwriteConflicts: true })
                .uploadLines([line({ sourceIds: new Set([1]) })]);

            expect(summary).toEqual({ created: 1, skipped: 0, deleted: 0 });
            expect(create).not.toHaveBeenCalled();
            expect(unlink).not.toHaveBeenCalled();
            expect(read).toHaveBeenCalled();
            expect(reports).toEqual([
                '[DRY RUN] Would create new record in account.analytic.line with values ' +
                '{"date":"2024-01-02","project_id":1,"task_id":10,"name":"Work","unit_amount":1}',
            ]);
            expect(fs.readFileSync(ledgerFile, 'utf8')).toBe(before);
        });

        it('should hand a placeholder task id downstream', async () => {
            await reconciler({ dryRun: true, allowTaskCreation: true }).uploadLine(line({ task: 'New task' }));

            expect(reports).toEqual([
                '[DRY RUN] Would create new record in project.task with values {"name":"New task","project_id":1}',
                '[DRY RUN] Would create new record in account.analytic.line with values ' +
                '{"date":"2024-01-02","project_id":1,"task_id":-1,"name":"Work","unit_amount":1}',
            ]);
            expect(client.records(TASK_MODEL)).toHaveLength(4);
        });
    });

    describe('task creation', () => {
        it('should create missing tasks under the line project', async () => {
            const ledger = openLedger();

            await reconciler({ ledger, allowTaskCreation: true }).uploadLine(line({ task: 'New task' }));

            expect(client.records(TASK_MODEL).find(task => task.id === 100)).toEqual({
                id: 100,
                name: 'New task',
                project_id: [1, 'Internal'],
            });
            expect(client.records(TIMESHEET_MODEL)[0]).toMatchObject({ id: 101, task_id: [100, 'New task'] });
            expect(ledger.remoteIds(TASK_MODEL)).toEqual([100]);
            expect(ledger.refsOf(TASK_MODEL, 100)).toEqual(new Set());
        });

        it('should refuse to create tasks unless enabled', async () => {
            const cause = await rejection(reconciler().uploadLine(line({ task: 'New task' })));

            expect(cause).toBeInstanceOf(ConstraintError);
            expect(cause).toEqual(expect.objectContaining({
                message: 'Task "New task" does not exist and task creation is not enabled',
            }));
        });

        it('should refuse to create a task without a project', async () => {
            const cause = await rejection(
                reconciler({ allowTaskCreation: true }).uploadLine(line({ project: undefined, task: 'New task' }))
            );

            expect(cause).toEqual(expect.objectContaining({ message: 'Cannot create a new task without a project' }));
        });
    });

    describe('resolution errors', () => {
        const causeMessage = async (overrides: Partial<TimesheetLine>) => {
            const cause = await rejection(reconciler().uploadLine(line(overrides)));
            return cause instanceof Error ? cause.message : undefined;
        };

        it('should report missing projects', async () => {
            const cause = await rejection(reconciler().uploadLine(line({ project: 'Nowhere' })));

            expect(cause).toBeInstanceOf(MissingRecordError);
            expect(cause).toEqual(expect.objectContaining({
                message: 'No results found in "project.project" with name: Nowhere',
            }));
        });

        it('should report ambiguous names', async () => {
            const cause = await rejection(reconciler().uploadLine(line({ project: 'Website', task: 'Design' })));

            expect(cause).toBeInstanceOf(TooManyRecordsError);
        });

        it('should report unknown task ids', async () => {
            expect(await causeMessage({ task: 999 })).toBe('No task found with id 999');
        });

        it('should report a task belonging to another project', async () => {
            expect(await causeMessage({ project: 'Website' })).toBe("Task's project and specified project mismatch");
        });

        it('should report a task without project when the line has none', async () => {
            expect(await causeMessage({ project: undefined, task: 13 })).toBe('Task id=13 has no project');
        });

        it('should report lines missing project and task', async () => {
            expect(await causeMessage({ project: undefined, task: undefined })).toBe('Line has neither a project nor a task');
            expect(await causeMessage({ task: undefined })).toBe('Line has no task');
        });

        it('should describe the failing line', async () => {
            const error = await reconciler().uploadLine(line({ project: 'Nowhere' })).catch((reason: unknown) => reason);

            expect(error).toBeInstanceOf(LineUploadError);
            expect(error instanceof Error ? error.message : '').toBe(
                'Error while trying to upload line: ' +
                '{"date":"2024-01-02","project":"Nowhere","task":"Maintenance","name":"Work","unitAmount":1,"sourceIds":[1]}\n' +
                'MissingRecordError: No results found in "project.project" with name: Nowhere'
            );
        });
    });
});

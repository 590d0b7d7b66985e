import type { RemoteClient, RemoteRecord, RemoteValue } from '../remote/RemoteClient';
import type { TimesheetLine } from '../types';
import { Logger } from '../utils/Logger';
import {
    ConstraintError,
    HistoryError,
    LineUploadError,
    MissingRecordError,
    UploadError,
} from './errors';
import type { Ledger } from './Ledger';
import { RecordResolver } from './RecordResolver';

export const TIMESHEET_MODEL = 'account.analytic.line';
export const PROJECT_MODEL = 'project.project';
export const TASK_MODEL = 'project.task';

/** Id handed downstream in place of records a dry run does not create */
export const DRY_RUN_ID = -1;

// Only ask for the fields we use: some servers fail to serialize html fields
const PROJECT_FIELDS = ['id', 'name'] as const;
const TASK_FIELDS = ['id', 'name', 'project_id'] as const;

export interface UploadOptions {
    /** Ledger used to skip already uploaded lines; without one every line is uploaded */
    ledger?: Ledger;
    /** Create tasks referenced by name that do not exist yet */
    allowTaskCreation?: boolean;
    /** Resolve everything but never create or delete remote records */
    dryRun?: boolean;
    /** Replace remote records whose source ids only partially match a line */
    overwriteConflicts?: boolean;
    /** Receives one message per remote mutation (or intended mutation in a dry run) */
    reporter?: (message: string) => void;
}

export type UploadStatus = 'created' | 'skipped';

export interface UploadResult {
    status: UploadStatus;
    /** Id of the created timesheet line, DRY_RUN_ID in a dry run */
    remoteId?: number;
    /** Conflicting records deleted before the upload */
    deletedIds: number[];
}

export interface UploadSummary {
    created: number;
    skipped: number;
    deleted: number;
}

interface ResolvedTarget {
    projectId: number;
    taskId: number;
}

/**
 * Uploads timesheet lines, using the ledger to decide whether each one is new,
 * already uploaded, or conflicting with a previous upload.
 *
 * Processing is fail-fast: the first failing line aborts the run, leaving
 * everything uploaded before it recorded in the ledger.
 */
export class UploadReconciler {
    private client: RemoteClient;
    private resolver: RecordResolver;
    private ledger?: Ledger;
    private allowTaskCreation: boolean;
    private dryRun: boolean;
    private overwriteConflicts: boolean;
    private report: (message: string) => void;

    constructor(client: RemoteClient, options: UploadOptions = {}) {
        this.client = client;
        this.resolver = new RecordResolver(client);
        this.ledger = options.ledger;
        this.allowTaskCreation = options.allowTaskCreation ?? false;
        this.dryRun = options.dryRun ?? false;
        this.overwriteConflicts = options.overwriteConflicts ?? false;
        this.report = options.reporter ?? ((message) => console.log(message));
    }

    /**
     * Upload lines in order, stopping at the first error
     */
    async uploadLines(lines: Iterable<TimesheetLine>): Promise<UploadSummary> {
        if (!this.ledger) {
            Logger.warn(`${this.dryRun ? '[DRY RUN] Would perform' : 'Performing'} upload without a ledger file!`);
        }

        const summary: UploadSummary = { created: 0, skipped: 0, deleted: 0 };
        for (const line of lines) {
            const result = await this.uploadLine(line);
            summary[result.status]++;
            summary.deleted += result.deletedIds.length;
        }

        Logger.info(
            `Upload finished: ${summary.created} created, ${summary.skipped} skipped, ${summary.deleted} deleted`
        );
        return summary;
    }

    /**
     * Reconcile and upload a single line. UploadErrors come back wrapped in LineUploadError.
     */
    async uploadLine(line: TimesheetLine): Promise<UploadResult> {
        try {
            return await this.reconcile(line);
        } catch (error) {
            if (error instanceof UploadError) {
                throw new LineUploadError(line, error);
            }
            throw error;
        }
    }

    private async reconcile(line: TimesheetLine): Promise<UploadResult> {
        let deletedIds: number[] = [];

        if (this.ledger) {
            const decision = await this.checkLedger(line, this.ledger);
            if (decision === 'skip') {
                Logger.debug(`Line for sources ${Array.from(line.sourceIds).join(', ')} already uploaded, skipping`);
                return { status: 'skipped', deletedIds };
            }
            deletedIds = decision;
        }

        const { projectId, taskId } = await this.resolveTarget(line);
        const remoteId = await this.createRecord(
            TIMESHEET_MODEL,
            {
                date: line.date,
                project_id: projectId,
                task_id: taskId,
                name: line.name,
                unit_amount: line.unitAmount,
            },
            line.sourceIds
        );
        return { status: 'created', remoteId, deletedIds };
    }

    /**
     * 'skip' for lines already uploaded, otherwise the ids deleted to make room for it
     */
    private async checkLedger(line: TimesheetLine, ledger: Ledger): Promise<'skip' | number[]> {
        if (line.sourceIds.size === 0) {
            throw new ConstraintError('Timesheet line without source ids!');
        }

        const stored = ledger.matchRefs(TIMESHEET_MODEL, line.sourceIds);
        if (stored.size === 0) {
            return [];
        }
        if (sameIds(stored, line.sourceIds)) {
            return 'skip';
        }
        if (!this.overwriteConflicts) {
            throw new HistoryError(
                `Stored records "${TIMESHEET_MODEL}" refs mismatch: ` +
                `stored=${formatIds(stored)} vs current=${formatIds(line.sourceIds)}`
            );
        }

        const conflictIds = Array.from(ledger.remoteIdsFor(TIMESHEET_MODEL, stored));
        Logger.warn(
            `${this.dryRun ? '[DRY RUN] Would delete' : 'Deleting'} conflicting "${TIMESHEET_MODEL}" ` +
            `records with ids=${formatIds(conflictIds)}`
        );
        if (this.dryRun) {
            return [];
        }
        await this.deleteRecords(TIMESHEET_MODEL, conflictIds);
        return conflictIds;
    }

    private async resolveTarget(line: TimesheetLine): Promise<ResolvedTarget> {
        let project = line.project !== undefined
            ? await this.resolver.findOne(PROJECT_MODEL, line.project, PROJECT_FIELDS)
            : undefined;

        // TODO: restrict the task search to the line's project when one is given
        let task: RemoteRecord | undefined;
        let createTask = false;
        if (line.task !== undefined) {
            try {
                task = await this.resolver.findOne(TASK_MODEL, line.task, TASK_FIELDS);
            } catch (error) {
                if (!(error instanceof MissingRecordError)) {
                    throw error;
                }
                if (typeof line.task !== 'string') {
                    throw new ConstraintError(`No task found with id ${line.task}`, { cause: error });
                }
                if (!this.allowTaskCreation) {
                    throw new ConstraintError(`Task "${line.task}" does not exist and task creation is not enabled`, { cause: error });
                }
                createTask = true;
            }
        }

        if (!project) {
            if (createTask) {
                throw new ConstraintError('Cannot create a new task without a project');
            }
            if (!task) {
                throw new ConstraintError('Line has neither a project nor a task');
            }
            const taskProjectId = many2oneId(task.project_id);
            if (taskProjectId === undefined) {
                throw new ConstraintError(`Task id=${String(task.id)} has no project`);
            }
            project = await this.resolver.findOne(PROJECT_MODEL, taskProjectId, PROJECT_FIELDS);
        } else if (task && many2oneId(task.project_id) !== recordId(project, PROJECT_MODEL)) {
            throw new ConstraintError("Task's project and specified project mismatch");
        }

        const projectId = recordId(project, PROJECT_MODEL);

        if (createTask && typeof line.task === 'string') {
            const newTaskId = await this.createRecord(TASK_MODEL, { name: line.task, project_id: projectId }, []);
            if (newTaskId === DRY_RUN_ID) {
                return { projectId, taskId: DRY_RUN_ID };
            }
            task = await this.resolver.findOne(TASK_MODEL, newTaskId, TASK_FIELDS);
        }

        if (!task) {
            throw new ConstraintError('Line has no task');
        }
        return { projectId, taskId: recordId(task, TASK_MODEL) };
    }

    /**
     * Create a remote record and note it in the ledger. Dry runs only report.
     */
    private async createRecord(model: string, values: RemoteRecord, refs: Iterable<number>): Promise<number> {
        if (this.dryRun) {
            this.report(`[DRY RUN] Would create new record in ${model} with values ${JSON.stringify(values)}`);
            return DRY_RUN_ID;
        }

        const newId = await this.client.create(model, values);
        this.report(`Created new record in ${model} with id=${newId}`);
        this.ledger?.transaction(writer => writer.addRecord(model, newId, refs));
        return newId;
    }

    private async deleteRecords(model: string, ids: number[]): Promise<void> {
        if (!(await this.client.unlink(model, ids))) {
            throw new UploadError(`Failed deleting records for "${model}" (ids=${formatIds(ids)})`);
        }
        this.report(`Deleted records in ${model} with ids=${formatIds(ids)}`);
        this.ledger?.transaction(writer => writer.removeRecords(model, ids));
    }
}

function sameIds(a: ReadonlySet<number>, b: ReadonlySet<number>): boolean {
    return a.size === b.size && Array.from(a).every(id => b.has(id));
}

function formatIds(ids: Iterable<number>): string {
    return `{${Array.from(ids).sort((x, y) => x - y).join(', ')}}`;
}

/**
 * Id of a many2one value ([id, display name]), undefined when empty
 */
function many2oneId(value: RemoteValue | undefined): number | undefined {
    if (Array.isArray(value) && typeof value[0] === 'number') {
        return value[0];
    }
    return undefined;
}

function recordId(record: RemoteRecord, model: string): number {
    const id = record.id;
    if (typeof id !== 'number') {
        throw new UploadError(`Record of "${model}" without a numeric id: ${JSON.stringify(record)}`);
    }
    return id;
}

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Logger } from '../utils/Logger';
import { HistoryError, InconsistentHistoryError, LedgerLockedError } from './errors';

/**
 * Persistent record of what was uploaded and why
 *
 * File layout (JSON):
 * {
 *   "_version": 1,
 *   "_refs": [["account.analytic.line", 12, 345]],      (model, source id, remote id)
 *   "account.analytic.line": { "345": [12, 13] }        remote id → source ids
 * }
 *
 * "_refs" is the reverse index of the model sections and must always agree with them.
 */

export const LEDGER_VERSION = 1;
const VERSION_KEY = '_version';
const REFS_KEY = '_refs';

const RefsSchema = z.array(z.tuple([z.string(), z.number().int(), z.number().int()]));
const ModelSectionSchema = z.record(z.string().regex(/^-?\d+$/), z.array(z.number().int()));
const LedgerFileSchema = z.record(z.string(), z.unknown());

export interface LedgerOptions {
    /** Never write: no lock, no file creation, transactions refused */
    readOnly?: boolean;
}

/**
 * Mutations allowed inside a ledger transaction
 */
export interface LedgerWriter {
    addRecord(model: string, remoteId: number, refs: Iterable<number>): void;
    removeRecords(model: string, remoteIds: Iterable<number>): Set<number>;
}

export class Ledger implements LedgerWriter {
    readonly filePath: string;
    readonly readOnly: boolean;
    private models = new Map<string, Map<number, Set<number>>>();
    private refs = new Map<string, Map<number, number>>();
    private lockPath: string | null = null;
    private inTransaction = false;
    private closed = false;

    private constructor(filePath: string, readOnly: boolean) {
        this.filePath = filePath;
        this.readOnly = readOnly;
    }

    /**
     * Open (or create) a ledger file, holding it exclusively until close()
     */
    static open(filePath: string, options: LedgerOptions = {}): Ledger {
        const ledger = new Ledger(path.resolve(filePath), options.readOnly ?? false);
        if (!ledger.readOnly) {
            ledger.acquireLock();
        }
        try {
            ledger.load();
        } catch (error) {
            ledger.close();
            throw error;
        }
        return ledger;
    }

    // ========================================================================
    // Queries
    // ========================================================================

    /**
     * Remote id a source record was uploaded as, if any
     */
    lookup(model: string, ref: number): number | undefined {
        return this.refs.get(model)?.get(ref);
    }

    /**
     * Source ids stored for a remote record
     */
    refsOf(model: string, remoteId: number): Set<number> {
        const section = this.models.get(model);
        if (!section) {
            throw new InconsistentHistoryError(`Missing "${model}" section`);
        }
        const refs = section.get(remoteId);
        if (!refs) {
            throw new InconsistentHistoryError(`Missing referenced record id=${remoteId} in "${model}" section`);
        }
        return new Set(refs);
    }

    /**
     * Union of the source ids stored under every remote record the given refs resolve to
     */
    matchRefs(model: string, refs: Iterable<number>): Set<number> {
        const stored = new Set<number>();
        for (const ref of refs) {
            const remoteId = this.lookup(model, ref);
            if (remoteId === undefined) {
                continue;
            }
            const recordRefs = this.refsOf(model, remoteId);
            if (!recordRefs.has(ref)) {
                throw new InconsistentHistoryError(
                    `Reference ${ref} points to "${model}" id=${remoteId}, which does not list it`
                );
            }
            recordRefs.forEach(r => stored.add(r));
        }
        return stored;
    }

    /**
     * Remote ids the given refs were uploaded as; every ref must be known
     */
    remoteIdsFor(model: string, refs: Iterable<number>): Set<number> {
        const ids = new Set<number>();
        for (const ref of refs) {
            const remoteId = this.lookup(model, ref);
            if (remoteId === undefined) {
                throw new InconsistentHistoryError(`Missing reference ${ref} for "${model}"`);
            }
            ids.add(remoteId);
        }
        return ids;
    }

    /**
     * Remote ids recorded for a model
     */
    remoteIds(model: string): number[] {
        return Array.from(this.models.get(model)?.keys() ?? []);
    }

    // ========================================================================
    // Mutations
    // ========================================================================

    /**
     * Run mutations and flush afterwards, also when fn throws
     */
    transaction<T>(fn: (writer: LedgerWriter) => T): T {
        this.assertWritable();
        if (this.inTransaction) {
            throw new Error('Ledger transactions cannot be nested');
        }
        this.inTransaction = true;
        try {
            return fn(this);
        } finally {
            this.inTransaction = false;
            this.flush();
        }
    }

    addRecord(model: string, remoteId: number, refs: Iterable<number>): void {
        this.assertInTransaction();
        const refList = Array.from(refs);
        const modelRefs = this.refsSection(model);

        for (const ref of refList) {
            const existing = modelRefs.get(ref);
            if (existing !== undefined && existing !== remoteId) {
                throw new HistoryError(
                    `Reference ${ref} is already recorded for "${model}" id=${existing}, cannot record it for id=${remoteId}`
                );
            }
        }

        const section = this.modelSection(model);
        const recordRefs = section.get(remoteId) ?? new Set<number>();
        refList.forEach(ref => {
            recordRefs.add(ref);
            modelRefs.set(ref, remoteId);
        });
        section.set(remoteId, recordRefs);
    }

    /**
     * Forget remote records, returning the source ids they held
     */
    removeRecords(model: string, remoteIds: Iterable<number>): Set<number> {
        this.assertInTransaction();
        const removed = new Set<number>();
        const section = this.models.get(model);
        const modelRefs = this.refs.get(model);

        for (const remoteId of remoteIds) {
            const recordRefs = section?.get(remoteId);
            if (!recordRefs) {
                continue;
            }
            section?.delete(remoteId);
            recordRefs.forEach(ref => {
                removed.add(ref);
                modelRefs?.delete(ref);
            });
        }
        return removed;
    }

    // ========================================================================
    // Persistence
    // ========================================================================

    /**
     * Write to a temporary file, fsync it, then move it over the ledger
     */
    flush(): void {
        this.assertWritable();
        const content = JSON.stringify(this.toJSON(), null, 2);
        const tempPath = `${this.filePath}.tmp`;

        const fd = fs.openSync(tempPath, 'w');
        try {
            fs.writeSync(fd, content);
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
        fs.renameSync(tempPath, this.filePath);
        Logger.debug(`Ledger flushed to ${this.filePath}`);
    }

    /**
     * Release the lock. Safe to call more than once.
     */
    close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        if (this.lockPath) {
            fs.rmSync(this.lockPath, { force: true });
            this.lockPath = null;
        }
    }

    toJSON(): Record<string, unknown> {
        const data: Record<string, unknown> = { [VERSION_KEY]: LEDGER_VERSION };
        const refs: Array<[string, number, number]> = [];
        for (const [model, modelRefs] of this.refs) {
            for (const [ref, remoteId] of modelRefs) {
                refs.push([model, ref, remoteId]);
            }
        }
        data[REFS_KEY] = refs;

        for (const [model, section] of this.models) {
            const serialized: Record<string, number[]> = {};
            for (const [remoteId, recordRefs] of section) {
                serialized[String(remoteId)] = Array.from(recordRefs);
            }
            data[model] = serialized;
        }
        return data;
    }

    /**
     * Check both regions agree with each other
     */
    verify(): void {
        for (const [model, modelRefs] of this.refs) {
            for (const [ref, remoteId] of modelRefs) {
                if (!this.models.get(model)?.get(remoteId)?.has(ref)) {
                    throw new InconsistentHistoryError(
                        `Reference ${ref} points to "${model}" id=${remoteId}, which does not list it`
                    );
                }
            }
        }
        for (const [model, section] of this.models) {
            for (const [remoteId, recordRefs] of section) {
                for (const ref of recordRefs) {
                    if (this.lookup(model, ref) !== remoteId) {
                        throw new InconsistentHistoryError(
                            `"${model}" id=${remoteId} lists reference ${ref} missing from the reverse index`
                        );
                    }
                }
            }
        }
    }

    // ========================================================================
    // Internals
    // ========================================================================

    private acquireLock(): void {
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        const lockPath = `${this.filePath}.lock`;
        if (!Ledger.createLockFile(lockPath)) {
            const holder = Ledger.readLockHolder(lockPath);
            if (holder === undefined || isProcessAlive(holder)) {
                throw new LedgerLockedError(lockPath);
            }
            Logger.warn(`Removing stale lock ${lockPath} left by process ${holder}`);
            fs.rmSync(lockPath, { force: true });
            if (!Ledger.createLockFile(lockPath)) {
                throw new LedgerLockedError(lockPath);
            }
        }
        this.lockPath = lockPath;
    }

    /**
     * Create the lock file holding our pid, false when it already exists
     */
    private static createLockFile(lockPath: string): boolean {
        try {
            const fd = fs.openSync(lockPath, 'wx');
            fs.writeSync(fd, String(process.pid));
            fs.closeSync(fd);
            return true;
        } catch (error) {
            if (errorCode(error) === 'EEXIST') {
                return false;
            }
            throw error;
        }
    }

    private static readLockHolder(lockPath: string): number | undefined {
        const content = fs.readFileSync(lockPath, 'utf8').trim();
        return /^\d+$/.test(content) ? Number(content) : undefined;
    }

    private load(): void {
        if (!fs.existsSync(this.filePath)) {
            Logger.info(`Ledger ${this.filePath} does not exist yet`);
            if (!this.readOnly) {
                this.flush();
            }
            return;
        }

        const raw = fs.readFileSync(this.filePath, 'utf8');
        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            throw new InconsistentHistoryError(
                `Ledger ${this.filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
            );
        }

        const file = this.parseSection(LedgerFileSchema, json, 'file');
        const version = file[VERSION_KEY];
        if (version !== undefined && version !== LEDGER_VERSION) {
            throw new InconsistentHistoryError(`Unsupported ledger version ${String(version)}`);
        }
        if (file[REFS_KEY] === undefined) {
            throw new InconsistentHistoryError(`Missing "${REFS_KEY}" section`);
        }

        for (const [model, ref, remoteId] of this.parseSection(RefsSchema, file[REFS_KEY], REFS_KEY)) {
            this.refsSection(model).set(ref, remoteId);
        }
        for (const [key, value] of Object.entries(file)) {
            if (key === VERSION_KEY || key === REFS_KEY) {
                continue;
            }
            const section = this.modelSection(key);
            for (const [remoteId, refs] of Object.entries(this.parseSection(ModelSectionSchema, value, key))) {
                section.set(Number(remoteId), new Set(refs));
            }
        }

        this.verify();
    }

    private parseSection<T>(schema: z.ZodType<T>, value: unknown, section: string): T {
        const parsed = schema.safeParse(value);
        if (!parsed.success) {
            throw new InconsistentHistoryError(`Malformed ledger section "${section}": ${parsed.error.message}`);
        }
        return parsed.data;
    }

    private modelSection(model: string): Map<number, Set<number>> {
        let section = this.models.get(model);
        if (!section) {
            section = new Map();
            this.models.set(model, section);
        }
        return section;
    }

    private refsSection(model: string): Map<number, number> {
        let section = this.refs.get(model);
        if (!section) {
            section = new Map();
            this.refs.set(model, section);
        }
        return section;
    }

    private assertWritable(): void {
        if (this.readOnly) {
            throw new Error(`Ledger ${this.filePath} was opened read-only`);
        }
        if (this.closed) {
            throw new Error(`Ledger ${this.filePath} is closed`);
        }
    }

    private assertInTransaction(): void {
        if (!this.inTransaction) {
            throw new Error('Ledger mutations must happen inside transaction()');
        }
    }
}

/**
 * errno code of a Node system error, whatever realm created it
 */
function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (error) {
        // EPERM: alive, owned by another user
        return errorCode(error) !== 'ESRCH';
    }
}

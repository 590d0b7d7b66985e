import type { TimesheetLine } from '../types';

/**
 * Umbrella for everything that can go wrong while reconciling and uploading lines
 */
export class UploadError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'UploadError';
    }
}

export class MissingRecordError extends UploadError {
    constructor(model: string, field: string, value: string | number) {
        super(`No results found in "${model}" with ${field}: ${value}`);
        this.name = 'MissingRecordError';
    }
}

export class TooManyRecordsError extends UploadError {
    constructor(model: string, field: string, value: string | number) {
        super(`More than one result in "${model}" matching ${field}: ${value}`);
        this.name = 'TooManyRecordsError';
    }
}

/**
 * A structural contradiction between a line and the remote records it refers to
 */
export class ConstraintError extends UploadError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ConstraintError';
    }
}

/**
 * The ledger disagrees with what is being uploaded
 */
export class HistoryError extends UploadError {
    constructor(message: string) {
        super(message);
        this.name = 'HistoryError';
    }
}

/**
 * The ledger's own cross references are broken
 */
export class InconsistentHistoryError extends HistoryError {
    constructor(message: string) {
        super(message);
        this.name = 'InconsistentHistoryError';
    }
}

export class LedgerLockedError extends Error {
    constructor(lockPath: string) {
        super(`Ledger is locked by another run (remove "${lockPath}" if no run is in progress)`);
        this.name = 'LedgerLockedError';
    }
}

/**
 * Wraps an UploadError with the line that caused it
 */
export class LineUploadError extends UploadError {
    readonly line: TimesheetLine;

    constructor(line: TimesheetLine, cause: UploadError) {
        super(`Error while trying to upload line: ${describeLine(line)}\n${cause.name}: ${cause.message}`, { cause });
        this.name = 'LineUploadError';
        this.line = line;
    }
}

export function describeLine(line: TimesheetLine): string {
    return JSON.stringify({ ...line, sourceIds: Array.from(line.sourceIds) });
}

/**
 * Core types for timesheet-bridge
 */

/**
 * A client owning projects in the time tracker
 */
export interface SourceClient {
    name: string;
}

/**
 * A project in the time tracker
 */
export interface SourceProject {
    name: string;
    /** Projects without a client are allowed */
    client?: SourceClient;
}

/**
 * A raw time-tracking record, consumed read-only
 */
export interface SourceRecord {
    /** Unique identity of the record in its source */
    id: number;
    /** Start datetime */
    start: Date;
    /** Stop datetime, never before start */
    stop: Date;
    /** Duration in seconds, authoritative over stop - start */
    duration: number;
    /** Free text description */
    description: string;
    project?: SourceProject;
    tags: string[];
}

/**
 * Reference to a remote record, either by name or by numeric id
 */
export type RecordRef = string | number;

/**
 * A converted, upload-ready accounting entry
 */
export interface TimesheetLine {
    /** YYYY-MM-DD */
    date: string;
    project?: RecordRef;
    task?: RecordRef;
    /** Display name / description */
    name: string;
    /** Quantity in hours */
    unitAmount: number;
    /** Identities of the source records that produced this line */
    sourceIds: Set<number>;
}

/**
 * Fields a list of timesheet lines can be grouped by when merging
 */
export const MERGE_KEYS = ['date', 'project', 'task', 'name'] as const;

export type MergeKey = (typeof MERGE_KEYS)[number];

/**
 * Run-scoped options handed to every rule when a chain is built
 */
export interface RuleOptions {
    /** Take the date from the middle of the record instead of its start */
    datetimeMiddle?: boolean;
    /** Hours after midnight still counted towards the previous day */
    nightlyCutoff?: number;
}

/**
 * Tool settings, merged from defaults, the config file and CLI flags
 */
export interface BridgeSettings {
    /** Folder holding the monthly markdown record files */
    sourceFolder: string;
    /** Hours in a work day, used for the duration summary */
    hoursPerWorkday: number;
    /** Default merge keys */
    mergeKeys?: MergeKey[];
    /** Ledger file for incremental uploads */
    historyFile?: string;
    odoo: {
        /** Used when neither the url nor --username carry one */
        username?: string;
    };
}

/**
 * Default settings
 */
export const DEFAULT_SETTINGS: BridgeSettings = {
    sourceFolder: 'TimeTracking',
    hoursPerWorkday: 7.6,
    odoo: {},
};

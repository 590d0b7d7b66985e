import { readdir, readFile } from 'fs/promises';
import * as path from 'path';
import type { SourceRecord } from '../types';
import { Logger } from '../utils/Logger';
import { TableParser } from './TableParser';

/**
 * Which records to fetch. Empty lists mean "no filter".
 */
export interface RecordFilter {
    /** Inclusive lower bound on the start time */
    since?: Date;
    /** Exclusive upper bound on the start time */
    until?: Date;
    clients?: string[];
    projectsInclude?: string[];
    projectsExclude?: string[];
    /** Keep records carrying at least one of these tags */
    tagsInclude?: string[];
    /** Drop records carrying any of these tags */
    tagsExclude?: string[];
}

/**
 * Upstream provider of time-tracking records.
 * Implementations return records sorted by start time, ascending.
 */
export interface RecordSource {
    fetch(filter?: RecordFilter): Promise<SourceRecord[]>;
}

export class SourceError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'SourceError';
    }
}

/**
 * Apply a filter and sort by start time (ties broken by id)
 */
export function filterRecords(records: readonly SourceRecord[], filter: RecordFilter = {}): SourceRecord[] {
    const { since, until, clients, projectsInclude, projectsExclude, tagsInclude, tagsExclude } = filter;
    const has = (list: string[] | undefined): list is string[] => list !== undefined && list.length > 0;

    return records
        .filter(record => {
            if (since && record.start < since) return false;
            if (until && record.start >= until) return false;

            const project = record.project?.name;
            const client = record.project?.client?.name;
            if (has(clients) && (client === undefined || !clients.includes(client))) return false;
            if (has(projectsInclude) && (project === undefined || !projectsInclude.includes(project))) return false;
            if (has(projectsExclude) && project !== undefined && projectsExclude.includes(project)) return false;
            if (has(tagsInclude) && !record.tags.some(tag => tagsInclude.includes(tag))) return false;
            if (has(tagsExclude) && record.tags.some(tag => tagsExclude.includes(tag))) return false;
            return true;
        })
        .sort((a, b) => a.start.getTime() - b.start.getTime() || a.id - b.id);
}

/**
 * Reads records from the markdown tables of a folder, one file per month (YYYY-MM.md)
 */
export class MarkdownRecordSource implements RecordSource {
    private static MONTH_FILE_REGEX = /^(\d{4}-\d{2})\.md$/;
    private folder: string;

    constructor(folder: string) {
        this.folder = folder;
    }

    async fetch(filter: RecordFilter = {}): Promise<SourceRecord[]> {
        const files = await this.listMonthFiles(filter);
        const records: SourceRecord[] = [];
        const seen = new Map<number, string>();

        for (const file of files) {
            const content = await readFile(path.join(this.folder, file), 'utf8');
            const parsed = TableParser.parseFile(content);
            Logger.debug(`MarkdownRecordSource: parsed ${parsed.length} records from ${file}`);

            for (const record of parsed) {
                const previous = seen.get(record.id);
                if (previous !== undefined) {
                    throw new SourceError(`Record id ${record.id} appears in both ${previous} and ${file}`);
                }
                seen.set(record.id, file);
                records.push(record);
            }
        }

        return filterRecords(records, filter);
    }

    /**
     * Month files that can hold records in the filter's window.
     * A record may start in the last hours of the previous month file, so one extra month is read before since.
     */
    private async listMonthFiles(filter: RecordFilter): Promise<string[]> {
        let names: string[];
        try {
            names = await readdir(this.folder);
        } catch (error) {
            throw new SourceError(`Cannot read source folder "${this.folder}"`, { cause: error });
        }

        const firstMonth = filter.since
            ? monthString(new Date(filter.since.getFullYear(), filter.since.getMonth() - 1, 1))
            : undefined;
        const lastMonth = filter.until ? monthString(filter.until) : undefined;

        return names
            .filter(name => {
                const month = name.match(MarkdownRecordSource.MONTH_FILE_REGEX)?.[1];
                if (!month) return false;
                if (firstMonth && month < firstMonth) return false;
                if (lastMonth && month > lastMonth) return false;
                return true;
            })
            .sort();
    }
}

/**
 * Get the month string (YYYY-MM) for a given date
 */
function monthString(date: Date): string {
    return `${date.getFullYear()}-${(date.getMonth() + 1).toString().padStart(2, '0')}`;
}

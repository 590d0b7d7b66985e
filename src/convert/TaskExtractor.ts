import type { SourceRecord } from '../types';
import { ExtractionError } from './errors';

/**
 * Task reference carried at the start of a description
 */
export interface ExtractedTask {
    taskId: number;
    shortName?: string;
    /** Description without the task prefix */
    rest: string;
}

/**
 * Extracts task info from descriptions formatted like "[1234: short name] description"
 *
 * Both "[1234] description" and "[1234: short name] description" are accepted.
 */
export class TaskExtractor {
    private static TASK_PREFIX_REGEX = /^\[(?<id>\d+)(?::\s*(?<short>.*?))?\]\s*(?<rest>.*)/;

    /**
     * Throws ExtractionError when the description has no task prefix
     */
    static extract(record: SourceRecord): ExtractedTask {
        const groups = record.description.match(this.TASK_PREFIX_REGEX)?.groups;
        if (!groups) {
            throw new ExtractionError(record.id, record.description);
        }

        return {
            taskId: Number(groups.id),
            shortName: groups.short || undefined,
            rest: groups.rest,
        };
    }
}

import { MERGE_KEYS } from '../types';
import type { MergeKey, TimesheetLine } from '../types';

/**
 * Groups timesheet lines sharing the same key fields into a single line,
 * summing hours and joining source identities.
 */
export class MergeAggregator {
    static readonly DEFAULT_KEYS: readonly MergeKey[] = MERGE_KEYS;

    /**
     * Merge lines by key tuple. Buckets keep the order in which they were first seen.
     */
    static merge(lines: readonly TimesheetLine[], keys: readonly MergeKey[] = this.DEFAULT_KEYS): TimesheetLine[] {
        const buckets = new Map<string, TimesheetLine>();

        for (const line of lines) {
            const key = this.bucketKey(line, keys);
            const bucket = buckets.get(key);
            if (!bucket) {
                buckets.set(key, { ...line, sourceIds: new Set(line.sourceIds) });
                continue;
            }
            bucket.unitAmount += line.unitAmount;
            line.sourceIds.forEach(id => bucket.sourceIds.add(id));
        }

        return Array.from(buckets.values());
    }

    /**
     * Absent fields count as null; JSON keeps 42 and "42" apart
     */
    private static bucketKey(line: TimesheetLine, keys: readonly MergeKey[]): string {
        return JSON.stringify(keys.map(k => line[k] ?? null));
    }
}

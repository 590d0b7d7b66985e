import type { MergeKey, RuleOptions, SourceRecord, TimesheetLine } from '../types';
import { Logger } from '../utils/Logger';
import { NoMatchError } from './errors';
import { MergeAggregator } from './MergeAggregator';
import type { Rule, RuleFactory } from './Rule';

/**
 * A registered rule factory with its effective priority
 */
export interface ChainEntry {
    priority: number;
    factory: RuleFactory;
}

export interface ConvertOptions {
    /** Throw NoMatchError for unmatched records instead of dropping them (default true) */
    mustMatch?: boolean;
    /** Merge the resulting lines (default false) */
    merge?: boolean;
    mergeKeys?: readonly MergeKey[];
    /** Options every rule of the run is built with */
    ruleOptions?: RuleOptions;
}

/**
 * Named, priority-ordered set of rules resolving each source record to one timesheet line.
 * Higher priorities are tried first and the first matching rule wins.
 */
export class ConversionChain {
    /** Step used to push a colliding priority below an existing one */
    static readonly PRIORITY_NUDGE = 0.00001;

    readonly name: string;
    private rules = new Map<number, RuleFactory>();

    constructor(name: string) {
        this.name = name;
    }

    /**
     * Register a rule factory. A priority already taken is lowered
     * (0.00001 per registered rule) instead of failing.
     * Returns the effective priority.
     */
    register(priority: number, factory: RuleFactory): number {
        if (typeof priority !== 'number' || !Number.isFinite(priority)) {
            throw new TypeError(`Rule priority must be a finite number, got ${String(priority)}`);
        }

        let effective = priority;
        while (this.rules.has(effective)) {
            effective -= ConversionChain.PRIORITY_NUDGE * this.size;
        }
        if (effective !== priority) {
            Logger.warn(
                `Duplicate priority ${priority} in chain "${this.name}",`,
                `rule will be added with the lower priority ${effective}`
            );
        }

        this.rules.set(effective, factory);
        return effective;
    }

    /**
     * Registered entries, highest priority first
     */
    entries(): ChainEntry[] {
        return Array.from(this.rules, ([priority, factory]) => ({ priority, factory }))
            .sort((a, b) => b.priority - a.priority);
    }

    get size(): number {
        return this.rules.size;
    }

    /**
     * Instantiate every rule for one run, highest priority first
     */
    build(options: RuleOptions = {}): Rule[] {
        return this.entries().map(entry => entry.factory(options));
    }

    /**
     * Convert a single record with already built rules
     */
    convertOne(record: SourceRecord, rules: readonly Rule[], mustMatch?: true): TimesheetLine;
    convertOne(record: SourceRecord, rules: readonly Rule[], mustMatch?: boolean): TimesheetLine | undefined;
    convertOne(record: SourceRecord, rules: readonly Rule[], mustMatch = true): TimesheetLine | undefined {
        for (const rule of rules) {
            if (rule.matches(record)) {
                Logger.debug(`Record #${record.id} matched rule "${rule.name}" of chain "${this.name}"`);
                return rule.convert(record);
            }
        }
        if (mustMatch) {
            throw new NoMatchError(this.name, record.id);
        }
        Logger.debug(`Record #${record.id} matched no rule of chain "${this.name}", skipping`);
        return undefined;
    }

    /**
     * Convert records in their given order, dropping unmatched ones when allowed
     */
    convertMany(records: readonly SourceRecord[], options: ConvertOptions = {}): TimesheetLine[] {
        const { mustMatch = true, merge = false, mergeKeys, ruleOptions } = options;
        const rules = this.build(ruleOptions);

        const lines: TimesheetLine[] = [];
        for (const record of records) {
            const line = this.convertOne(record, rules, mustMatch);
            if (line) {
                lines.push(line);
            }
        }

        return merge ? MergeAggregator.merge(lines, mergeKeys) : lines;
    }

    toString(): string {
        return `ConversionChain(${this.name})`;
    }
}

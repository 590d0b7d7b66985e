import type { RuleOptions, SourceRecord, TimesheetLine } from '../types';

/**
 * A single matcher + transform unit of a conversion chain
 */
export interface Rule {
    readonly name: string;
    matches(record: SourceRecord): boolean;
    convert(record: SourceRecord): TimesheetLine;
}

/**
 * Builds a rule for one conversion run
 */
export type RuleFactory = (options: RuleOptions) => Rule;

/**
 * What a refined rule adds on top of its base
 */
export interface RuleRefinement {
    name: string;
    /** Extra condition, checked only when the base rule matches */
    matches?: (record: SourceRecord) => boolean;
    /** Override applied to the line produced by the base rule */
    convert?: (record: SourceRecord, line: TimesheetLine) => TimesheetLine;
}

/**
 * Compose a rule from a more general one: matchers are conjoined,
 * the base transform runs first and the refinement overrides its result.
 */
export function refineRule(base: Rule, refinement: RuleRefinement): Rule {
    const extraMatch = refinement.matches;
    const override = refinement.convert;

    return {
        name: refinement.name,
        matches: (record) => base.matches(record) && (extraMatch ? extraMatch(record) : true),
        convert: (record) => {
            const line = base.convert(record);
            return override ? override(record, line) : line;
        },
    };
}

/**
 * Factory-level counterpart of refineRule, so rule sets can be declared once
 * and instantiated per run with that run's options.
 */
export function refineFactory(base: RuleFactory, refinement: RuleRefinement): RuleFactory {
    return (options) => refineRule(base(options), refinement);
}

/**
 * Calendar date of a record, honouring the datetimeMiddle and nightlyCutoff options
 */
export function extractDate(record: SourceRecord, options: RuleOptions): string {
    let timestamp = record.start.getTime();
    if (options.datetimeMiddle) {
        timestamp += (record.duration * 1000) / 2;
    }
    if (options.nightlyCutoff !== undefined) {
        timestamp -= options.nightlyCutoff * 3600 * 1000;
    }
    return formatDate(new Date(timestamp));
}

/**
 * Format a Date to YYYY-MM-DD in local time
 */
export function formatDate(date: Date): string {
    const year = date.getFullYear();
    const month = (date.getMonth() + 1).toString().padStart(2, '0');
    const day = date.getDate().toString().padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * The rule every other rule refines: accepts anything and fills in
 * date, project, name, quantity and source identity.
 */
export const simpleRule: RuleFactory = (options) => ({
    name: 'simple',
    matches: () => true,
    convert: (record) => {
        const line: TimesheetLine = {
            date: extractDate(record, options),
            name: record.description,
            unitAmount: record.duration / 3600,
            sourceIds: new Set([record.id]),
        };
        if (record.project) {
            line.project = record.project.name;
        }
        return line;
    },
});

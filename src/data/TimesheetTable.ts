import type { TimesheetLine } from '../types';
import { TableParser } from './TableParser';

export const TIMESHEET_HEADERS = ['Date', 'Project', 'Task', 'Name', 'Hours', 'Sources'];

/**
 * Render converted lines as a markdown table, in line order
 */
export function renderTimesheetTable(lines: readonly TimesheetLine[]): string {
    const rows = lines.map(line => [
        line.date,
        line.project === undefined ? '' : String(line.project),
        line.task === undefined ? '' : String(line.task),
        line.name,
        formatHours(line.unitAmount),
        Array.from(line.sourceIds).sort((a, b) => a - b).join(', '),
    ]);
    return TableParser.stringifyTable(TIMESHEET_HEADERS, rows);
}

/**
 * Hours with at most two decimals, trailing zeros dropped
 */
export function formatHours(hours: number): string {
    return String(Math.round(hours * 100) / 100);
}

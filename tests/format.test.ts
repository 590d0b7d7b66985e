import { formatHours, renderTimesheetTable } from '../src/data/TimesheetTable';
import { durationSummary, formatDuration } from '../src/utils/format';
import { createLine } from './helpers/records';

describe('formatDuration', () => {
    it('should only show the units needed', () => {
        expect(formatDuration(0)).toBe('0s');
        expect(formatDuration(5)).toBe('5s');
        expect(formatDuration(65)).toBe('1m 05s');
        expect(formatDuration(3725)).toBe('1h 02m 05s');
        expect(formatDuration(36 * 3600)).toBe('36h 00m 00s');
    });

    it('should round to whole seconds', () => {
        expect(formatDuration(59.6)).toBe('1m 00s');
        expect(formatDuration(4.4)).toBe('4s');
    });
});

describe('durationSummary', () => {
    it('should express the total in work days', () => {
        expect(durationSummary('time entries', 7.6 * 3600 * 1.5, 7.6)).toBe(
            'Total duration of time entries: 11h 24m 00s / ~1.50 work days (at 7.6 hrs/day), 3h 48m 00s more to round up'
        );
    });

    it('should need nothing more on whole days', () => {
        expect(durationSummary('timesheet lines', 8 * 3600, 8)).toBe(
            'Total duration of timesheet lines: 8h 00m 00s / ~1.00 work days (at 8 hrs/day), 0s more to round up'
        );
    });
});

describe('renderTimesheetTable', () => {
    it('should render one row per line with sorted sources', () => {
        const table = renderTimesheetTable([
            createLine({ project: undefined, task: 42, name: 'fix bug', unitAmount: 1.25, sourceIds: new Set([3, 1]) }),
        ]);
        const [header, , row] = table.trimEnd().split('\n');

        expect(header).toMatch(/^\| Date\s+\| Project\s+\| Task\s+\| Name\s+\| Hours\s+\| Sources\s+\|$/);
        expect(row.split('|').map(cell => cell.trim())).toEqual(['', '2024-01-02', '', '42', 'fix bug', '1.25', '1, 3', '']);
    });

    it('should format hours with at most two decimals', () => {
        expect(formatHours(1)).toBe('1');
        expect(formatHours(1 / 3)).toBe('0.33');
        expect(formatHours(0.5)).toBe('0.5');
    });
});

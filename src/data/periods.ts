export type PeriodPreset = 'last-month' | 'this-month' | 'last-week' | 'this-week';

export const PERIOD_PRESETS: readonly PeriodPreset[] = ['last-month', 'this-month', 'last-week', 'this-week'];

export interface Period {
    since: Date;
    until: Date;
}

/**
 * Resolve a preset to a half-open [since, until) window in local time.
 * Weeks start on Monday.
 */
export function resolvePeriod(preset: PeriodPreset, now: Date = new Date()): Period {
    const monthStart = new Date(now.getFullYear(), now.getMonth(), 1);
    // getDay() is 0 for Sunday
    const daysSinceMonday = (now.getDay() + 6) % 7;
    const weekStart = new Date(now.getFullYear(), now.getMonth(), now.getDate() - daysSinceMonday);

    switch (preset) {
        case 'last-month':
            return { since: addMonths(monthStart, -1), until: monthStart };
        case 'this-month':
            return { since: monthStart, until: addMonths(monthStart, 1) };
        case 'last-week':
            return { since: addDays(weekStart, -7), until: weekStart };
        case 'this-week':
            return { since: weekStart, until: addDays(weekStart, 7) };
    }
}

/**
 * Parse "YYYY-MM-DD" or "YYYY-MM-DD HH:mm" as local time
 */
export function parseDateArg(value: string): Date | null {
    const match = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2}))?$/);
    if (!match) {
        return null;
    }
    const [, year, month, day, hours, minutes] = match;
    const date = new Date(Number(year), Number(month) - 1, Number(day), Number(hours ?? 0), Number(minutes ?? 0));
    return date.getMonth() === Number(month) - 1 ? date : null;
}

function addMonths(date: Date, months: number): Date {
    return new Date(date.getFullYear(), date.getMonth() + months, 1);
}

function addDays(date: Date, days: number): Date {
    return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

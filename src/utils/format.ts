/**
 * Format a duration in seconds as "5s", "1m 05s" or "1h 02m 05s"
 */
export function formatDuration(seconds: number): string {
    const total = Math.max(0, Math.round(seconds));
    const h = Math.floor(total / 3600);
    const m = Math.floor(total / 60) % 60;
    const s = total % 60;
    const pad = (n: number) => n.toString().padStart(2, '0');

    if (total >= 3600) {
        return `${h}h ${pad(m)}m ${pad(s)}s`;
    }
    if (total >= 60) {
        return `${m}m ${pad(s)}s`;
    }
    return `${s}s`;
}

/**
 * One-line total with its equivalent in work days and the time left to reach the next whole day
 */
export function durationSummary(label: string, seconds: number, hoursPerWorkday: number): string {
    const workDays = seconds / 3600 / hoursPerWorkday;
    const toRoundUp = (Math.ceil(workDays) - workDays) * 3600 * hoursPerWorkday;
    return (
        `Total duration of ${label}: ${formatDuration(seconds)} ` +
        `/ ~${workDays.toFixed(2)} work days (at ${hoursPerWorkday} hrs/day), ` +
        `${formatDuration(toRoundUp)} more to round up`
    );
}

/**
 * Verbosity-aware logger writing to stderr
 * Keeps stdout free for listings so output can be piped
 */
export class Logger {
    private static verbosity = 0;
    private static prefix = '[timesheet-bridge]';

    /**
     * 0: warnings, 1: info, 2: debug, 3 and above: everything
     */
    static setVerbosity(verbosity: number): void {
        this.verbosity = Math.max(0, verbosity);
        this.debug('Verbosity set to', this.verbosity);
    }

    static debug(...args: unknown[]): void {
        if (this.verbosity >= 2) {
            console.error(this.prefix, 'DEBUG:', ...args);
        }
    }

    static info(...args: unknown[]): void {
        if (this.verbosity >= 1) {
            console.error(this.prefix, 'INFO:', ...args);
        }
    }

    static warn(...args: unknown[]): void {
        console.error(this.prefix, 'WARNING:', ...args);
    }

    static error(...args: unknown[]): void {
        // Always log errors
        console.error(this.prefix, 'ERROR:', ...args);
    }
}

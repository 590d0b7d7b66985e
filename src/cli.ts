import { Command, Option } from 'commander';
import { createInterface } from 'readline/promises';
import { Writable } from 'stream';
import { loadConfig, parseMergeKeys, parseRuleOptions, splitList, ConfigError } from './config';
import type { ChainRegistry } from './convert/ChainRegistry';
import { MarkdownRecordSource } from './data/RecordSource';
import type { RecordFilter } from './data/RecordSource';
import { parseDateArg, PERIOD_PRESETS, resolvePeriod } from './data/periods';
import type { PeriodPreset } from './data/periods';
import { TableParser } from './data/TableParser';
import { renderTimesheetTable } from './data/TimesheetTable';
import { resolveCredentials } from './remote/credentials';
import { OdooJsonRpcClient } from './remote/OdooJsonRpcClient';
import type { OdooConnection } from './remote/OdooJsonRpcClient';
import type { RemoteClient } from './remote/RemoteClient';
import { createDefaultRegistry } from './rules';
import type { BridgeSettings, SourceRecord, TimesheetLine } from './types';
import { Ledger } from './upload/Ledger';
import { UploadReconciler } from './upload/UploadReconciler';
import type { UploadSummary } from './upload/UploadReconciler';
import { durationSummary } from './utils/format';
import { Logger } from './utils/Logger';

export interface SharedCliOptions {
    verbose: number;
    dryRun?: boolean;
    config?: string;
    source?: string;
    since?: string;
    until?: string;
    lastMonth?: boolean;
    thisMonth?: boolean;
    lastWeek?: boolean;
    thisWeek?: boolean;
    clients?: string;
    projects?: string;
    projectsExclude?: string;
    tags?: string;
    tagsExclude?: string;
}

export interface ConvertCliOptions extends SharedCliOptions {
    convertOptions?: string[];
    skipUnmatched?: boolean;
    merge?: boolean;
    mergeKeys?: string;
}

export interface UploadCliOptions extends ConvertCliOptions {
    username?: string;
    password?: string;
    createTasks?: boolean;
    force?: boolean;
}

/**
 * Everything the commands touch outside of the local files
 */
export interface CliContext {
    /** Listings and upload reports (stdout) */
    print: (text: string) => void;
    registry: ChainRegistry;
    now: () => Date;
    connect: (connection: OdooConnection) => RemoteClient;
    prompt: (question: string) => Promise<string>;
    promptSecret: (question: string) => Promise<string>;
}

const PRESET_ATTRIBUTES: Record<PeriodPreset, keyof SharedCliOptions> = {
    'last-month': 'lastMonth',
    'this-month': 'thisMonth',
    'last-week': 'lastWeek',
    'this-week': 'thisWeek',
};

export function defaultContext(): CliContext {
    return {
        print: text => console.log(text),
        registry: createDefaultRegistry(),
        now: () => new Date(),
        connect: connection => new OdooJsonRpcClient(connection),
        prompt: promptLine,
        promptSecret: promptHidden,
    };
}

// ============================================================================
// Commands
// ============================================================================

export async function runFetch(options: SharedCliOptions, context: CliContext): Promise<SourceRecord[]> {
    setupLogging(options, 1);
    const settings = await loadConfig(options.config);
    const records = await fetchRecords(options, settings, context);

    context.print(TableParser.generateTable(records).trimEnd());
    context.print(durationSummary('time entries', totalSeconds(records), settings.hoursPerWorkday));
    return records;
}

export async function runConvert(chainName: string, options: ConvertCliOptions, context: CliContext): Promise<TimesheetLine[]> {
    setupLogging(options, 0);
    const settings = await loadConfig(options.config);
    const lines = await convertRecords(chainName, options, settings, context);

    context.print(renderTimesheetTable(lines).trimEnd());
    context.print(
        durationSummary('timesheet lines', lines.reduce((sum, line) => sum + line.unitAmount * 3600, 0), settings.hoursPerWorkday)
    );
    return lines;
}

export async function runUpload(
    chainName: string,
    url: string,
    database: string,
    history: string | undefined,
    options: UploadCliOptions,
    context: CliContext
): Promise<UploadSummary> {
    setupLogging(options, 0);
    const settings = await loadConfig(options.config);
    const credentials = await resolveCredentials(url, {
        username: options.username ?? settings.odoo.username,
        password: options.password,
        prompt: context.prompt,
        promptSecret: context.promptSecret,
    });
    const lines = await convertRecords(chainName, options, settings, context);

    const client = context.connect({ ...credentials, database });
    await client.authenticate();

    const dryRun = options.dryRun ?? false;
    const historyFile = history ?? settings.historyFile;
    const ledger = historyFile ? Ledger.open(historyFile, { readOnly: dryRun }) : undefined;
    try {
        const reconciler = new UploadReconciler(client, {
            ledger,
            allowTaskCreation: options.createTasks,
            dryRun,
            overwriteConflicts: options.force,
            reporter: context.print,
        });
        return await reconciler.uploadLines(lines);
    } finally {
        ledger?.close();
    }
}

async function fetchRecords(options: SharedCliOptions, settings: BridgeSettings, context: CliContext): Promise<SourceRecord[]> {
    const folder = options.source ?? settings.sourceFolder;
    const filter = buildFilter(options, context.now());
    Logger.debug(`Fetching records from ${folder}`);

    const records = await new MarkdownRecordSource(folder).fetch(filter);
    Logger.info(`Fetched ${records.length} time entries`);
    return records;
}

async function convertRecords(
    chainName: string,
    options: ConvertCliOptions,
    settings: BridgeSettings,
    context: CliContext
): Promise<TimesheetLine[]> {
    const chain = context.registry.get(chainName);
    const ruleOptions = parseRuleOptions(options.convertOptions ?? []);
    const mergeKeys = options.mergeKeys !== undefined ? parseMergeKeys(options.mergeKeys) : settings.mergeKeys;
    if (options.mergeKeys !== undefined && !options.merge) {
        Logger.warn('--merge-keys has no effect without --merge');
    }

    const records = await fetchRecords(options, settings, context);
    const lines = chain.convertMany(records, {
        mustMatch: !options.skipUnmatched,
        merge: options.merge ?? false,
        mergeKeys,
        ruleOptions,
    });

    Logger.info(`Converted ${records.length} entries to ${lines.length} timesheet lines`);
    return lines;
}

// ============================================================================
// Option handling
// ============================================================================

/**
 * Window and list filters from the CLI; --since/--until override a preset's bounds
 */
export function buildFilter(options: SharedCliOptions, now: Date): RecordFilter {
    const preset = PERIOD_PRESETS.find(name => options[PRESET_ATTRIBUTES[name]] === true);
    const period = preset ? resolvePeriod(preset, now) : undefined;

    const list = (value: string | undefined) => (value === undefined ? undefined : splitList(value));
    return {
        since: options.since !== undefined ? parseDateOption('--since', options.since) : period?.since,
        until: options.until !== undefined ? parseDateOption('--until', options.until) : period?.until,
        clients: list(options.clients),
        projectsInclude: list(options.projects),
        projectsExclude: list(options.projectsExclude),
        tagsInclude: list(options.tags),
        tagsExclude: list(options.tagsExclude),
    };
}

function parseDateOption(flag: string, value: string): Date {
    const date = parseDateArg(value);
    if (!date) {
        throw new ConfigError(`${flag} expects YYYY-MM-DD or "YYYY-MM-DD HH:mm", got "${value}"`);
    }
    return date;
}

function setupLogging(options: SharedCliOptions, modeDefault: number): void {
    Logger.setVerbosity(modeDefault + options.verbose);
}

function totalSeconds(records: readonly SourceRecord[]): number {
    return records.reduce((sum, record) => sum + record.duration, 0);
}

async function promptLine(question: string): Promise<string> {
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    try {
        return await rl.question(question);
    } finally {
        rl.close();
    }
}

/**
 * Like promptLine, but typed characters are not echoed
 */
async function promptHidden(question: string): Promise<string> {
    process.stderr.write(question);
    const muted = new Writable({ write: (_chunk, _encoding, callback) => callback() });
    const rl = createInterface({ input: process.stdin, output: muted, terminal: Boolean(process.stdin.isTTY) });
    try {
        return await rl.question('');
    } finally {
        rl.close();
        process.stderr.write('\n');
    }
}

/**
 * Error message followed by its causes, skipping causes the message already quotes
 */
export function describeError(error: unknown): string {
    const parts: string[] = [];
    let current: unknown = error;
    while (current !== undefined) {
        if (!(current instanceof Error)) {
            parts.push(String(current));
            break;
        }
        const message = current.message;
        if (!parts.some(part => part.includes(message))) {
            parts.push(`${current.name}: ${message}`);
        }
        current = current.cause;
    }
    return parts.join('\n  caused by ');
}

// ============================================================================
// Program
// ============================================================================

function increaseVerbosity(_value: string, previous: number): number {
    return previous + 1;
}

function withSharedOptions(command: Command): Command {
    command
        .option('-v, --verbose', 'increase verbosity (repeatable)', increaseVerbosity, 0)
        .option('-n, --dry-run', 'do not change anything remotely or on disk')
        .option('--config <file>', 'JSON config file (default: ./timesheet-bridge.json when present)')
        .option('--source <folder>', 'folder holding the monthly record files')
        .option('--since <date>', 'only records starting at or after this date')
        .option('--until <date>', 'only records starting before this date');

    for (const preset of PERIOD_PRESETS) {
        const others = PERIOD_PRESETS.filter(name => name !== preset).map(name => PRESET_ATTRIBUTES[name]);
        command.addOption(new Option(`--${preset}`, `only records of ${preset.replace('-', ' ')}`).conflicts(others));
    }

    return command
        .option('-c, --clients <names>', 'comma-separated clients to include')
        .option('--projects <names>', 'comma-separated projects to include')
        .option('--projects-exclude <names>', 'comma-separated projects to exclude')
        .option('--tags <names>', 'keep records with any of these comma-separated tags')
        .option('--tags-exclude <names>', 'drop records with any of these comma-separated tags');
}

function withConvertOptions(command: Command): Command {
    return withSharedOptions(command)
        .option('--convert-options <pairs...>', 'converter options as key=value (datetimeMiddle, nightlyCutoff)')
        .option('--skip-unmatched', 'drop records no rule matches instead of failing')
        .option('-m, --merge', 'merge lines sharing the merge keys')
        .option('--merge-keys <keys>', 'comma-separated merge keys (date, project, task, name)');
}

export function buildProgram(context: CliContext = defaultContext()): Command {
    const program = new Command()
        .name('timesheet-bridge')
        .description('Convert time-tracking records into Odoo timesheet lines and upload them')
        .version('0.1.0');

    withSharedOptions(program.command('fetch'))
        .description('list the source records and their total duration')
        .action(async (options: SharedCliOptions) => {
            await runFetch(options, context);
        });

    withConvertOptions(program.command('convert'))
        .description('convert the source records with a conversion chain')
        .argument('<chain>', `conversion chain (${context.registry.names().join(', ')})`)
        .action(async (chain: string, options: ConvertCliOptions) => {
            await runConvert(chain, options, context);
        });

    withConvertOptions(program.command('upload'))
        .description('convert the source records and upload them to an Odoo server')
        .argument('<chain>', `conversion chain (${context.registry.names().join(', ')})`)
        .argument('<url>', 'server url, may embed user:password@')
        .argument('<database>', 'Odoo database name')
        .argument('[history]', 'ledger file tracking uploaded records')
        .option('-u, --username <user>', 'Odoo username')
        .option('-p, --password <password>', 'Odoo password or API key (default: $ODOO_PASSWORD, else prompted)')
        .option('--create-tasks', 'create tasks referenced by name that do not exist')
        .option('--force', 'replace previously uploaded lines that conflict')
        .action(async (chain: string, url: string, database: string, history: string | undefined, options: UploadCliOptions) => {
            await runUpload(chain, url, database, history, options, context);
        });

    return program;
}

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { DEFAULT_SETTINGS, MERGE_KEYS } from './types';
import type { BridgeSettings, MergeKey, RuleOptions } from './types';
import { Logger } from './utils/Logger';

export const DEFAULT_CONFIG_FILE = 'timesheet-bridge.json';

export class ConfigError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ConfigError';
    }
}

const MergeKeySchema = z.enum(MERGE_KEYS);

const ConfigFileSchema = z.object({
    sourceFolder: z.string().min(1).optional(),
    hoursPerWorkday: z.number().positive().optional(),
    mergeKeys: z.array(MergeKeySchema).nonempty().optional(),
    historyFile: z.string().min(1).optional(),
    odoo: z.object({
        username: z.string().min(1).optional(),
    }).strict().optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

const booleanOption = z.enum(['true', 'false', '1', '0']).transform(value => value === 'true' || value === '1');

const RuleOptionsSchema = z.object({
    datetimeMiddle: booleanOption.optional(),
    nightlyCutoff: z.coerce.number().finite().min(0).max(24).optional(),
}).strict();

/**
 * Settings from DEFAULT_SETTINGS overridden by the config file.
 * An explicitly given file must exist; the default one is optional.
 */
export async function loadConfig(configPath?: string): Promise<BridgeSettings> {
    const filePath = configPath ?? DEFAULT_CONFIG_FILE;
    if (!configPath && !existsSync(filePath)) {
        Logger.debug(`No ${DEFAULT_CONFIG_FILE} found, using default settings`);
        return mergeSettings({});
    }

    let raw: string;
    try {
        raw = await readFile(filePath, 'utf8');
    } catch (error) {
        throw new ConfigError(`Cannot read config file "${filePath}"`, { cause: error });
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new ConfigError(`Config file "${filePath}" is not valid JSON`, { cause: error });
    }

    Logger.debug(`Loaded config from ${filePath}`);
    return mergeSettings(parseConfig(json, filePath));
}

export function parseConfig(json: unknown, source = 'config'): ConfigFile {
    const parsed = ConfigFileSchema.safeParse(json);
    if (!parsed.success) {
        throw new ConfigError(`Invalid ${source}: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

export function mergeSettings(file: ConfigFile): BridgeSettings {
    return {
        ...DEFAULT_SETTINGS,
        ...file,
        odoo: { ...DEFAULT_SETTINGS.odoo, ...file.odoo },
    };
}

/**
 * Parse "key=value" converter options into RuleOptions
 */
export function parseRuleOptions(pairs: readonly string[]): RuleOptions {
    const raw: Record<string, string> = {};
    for (const pair of pairs) {
        const separator = pair.indexOf('=');
        if (separator <= 0) {
            throw new ConfigError(`Converter option "${pair}" is not in key=value form`);
        }
        raw[pair.slice(0, separator).trim()] = pair.slice(separator + 1).trim();
    }

    const parsed = RuleOptionsSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`Invalid converter options: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

/**
 * Parse a comma-separated list of merge keys
 */
export function parseMergeKeys(value: string): MergeKey[] {
    const keys = splitList(value);
    if (keys.length === 0) {
        throw new ConfigError('Merge keys cannot be empty');
    }
    return keys.map(key => {
        const parsed = MergeKeySchema.safeParse(key);
        if (!parsed.success) {
            throw new ConfigError(`Unknown merge key "${key}", expected one of: ${MERGE_KEYS.join(', ')}`);
        }
        return parsed.data;
    });
}

/**
 * Split a comma-separated CLI list, dropping empty items
 */
export function splitList(value: string): string[] {
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

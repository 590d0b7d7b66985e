import { ConfigError } from '../config';

export const PASSWORD_ENV_VAR = 'ODOO_PASSWORD';

export interface Credentials {
    /** Server url without user info */
    url: string;
    username: string;
    password: string;
}

export interface CredentialSources {
    username?: string;
    password?: string;
    /** Asks the user for a missing username */
    prompt?: (question: string) => Promise<string>;
    /** Asks for a missing password without echoing it */
    promptSecret?: (question: string) => Promise<string>;
    env?: NodeJS.ProcessEnv;
}

/**
 * Combine the user info embedded in a url with explicit options.
 * Values given in both places must agree.
 */
export async function resolveCredentials(url: string, sources: CredentialSources = {}): Promise<Credentials> {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch (error) {
        throw new ConfigError(`Invalid server url "${url}"`, { cause: error });
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        throw new ConfigError(`Unsupported protocol "${parsed.protocol}" in server url`);
    }

    const urlUsername = parsed.username ? decodeURIComponent(parsed.username) : undefined;
    const urlPassword = parsed.password ? decodeURIComponent(parsed.password) : undefined;

    if (sources.username && urlUsername && sources.username !== urlUsername) {
        throw new ConfigError('Passed two different usernames in url and options');
    }
    if (sources.password && urlPassword && sources.password !== urlPassword) {
        throw new ConfigError('Passed two different passwords in url and options');
    }

    let username = sources.username || urlUsername;
    if (!username && sources.prompt) {
        username = (await sources.prompt('Odoo DB username: ')).trim();
    }
    if (!username) {
        throw new ConfigError('No username given');
    }

    let password = sources.password || urlPassword || (sources.env ?? process.env)[PASSWORD_ENV_VAR];
    if (!password && sources.promptSecret) {
        password = await sources.promptSecret(`Odoo DB password for ${username}: `);
    }
    if (!password) {
        throw new ConfigError(`No password given, pass it in the url, with --password or in ${PASSWORD_ENV_VAR}`);
    }

    parsed.username = '';
    parsed.password = '';
    return { url: parsed.toString().replace(/\/+$/, ''), username, password };
}

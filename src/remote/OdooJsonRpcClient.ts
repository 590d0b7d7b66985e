import { z } from 'zod';
import { Logger } from '../utils/Logger';
import { AuthenticationError, NotAuthenticatedError, RemoteCallError } from './errors';
import type {
    Domain,
    NamePair,
    NameSearchOptions,
    RemoteClient,
    RemoteRecord,
    RemoteValue,
    SearchReadOptions,
} from './RemoteClient';

// ============================================================================
// Wire types
// ============================================================================

interface JsonRpcRequest {
    jsonrpc: '2.0';
    method: 'call';
    params: {
        service: 'common' | 'object';
        method: string;
        args: RemoteValue[];
    };
    id: number;
}

const RemoteValueSchema: z.ZodType<RemoteValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(RemoteValueSchema),
        z.record(z.string(), RemoteValueSchema),
    ])
);

const RemoteRecordsSchema = z.array(z.record(z.string(), RemoteValueSchema));
const NamePairsSchema = z.array(z.tuple([z.number().int(), z.string()]));

const JsonRpcResponseSchema = z.object({
    jsonrpc: z.literal('2.0'),
    id: z.union([z.number(), z.string(), z.null()]).optional(),
    result: RemoteValueSchema.optional(),
    error: z
        .object({
            code: z.number(),
            message: z.string(),
            data: z
                .object({
                    name: z.string().optional(),
                    message: z.string().optional(),
                })
                .passthrough()
                .optional(),
        })
        .optional(),
});

// ============================================================================
// Transport
// ============================================================================

export interface FetchResponse {
    ok: boolean;
    status: number;
    statusText: string;
    json(): Promise<unknown>;
}

export type FetchFn = (
    url: string,
    init: { method: 'POST'; headers: Record<string, string>; body: string; signal: AbortSignal }
) => Promise<FetchResponse>;

export interface OdooConnection {
    /** Server base url, without credentials */
    url: string;
    database: string;
    username: string;
    /** Password or API key */
    password: string;
}

export interface OdooJsonRpcOptions {
    /** Defaults to the global fetch */
    fetch?: FetchFn;
    /** Request timeout in milliseconds (default 30000) */
    timeout?: number;
}

/**
 * RemoteClient talking to an Odoo server through its /jsonrpc endpoint
 */
export class OdooJsonRpcClient implements RemoteClient {
    private readonly connection: OdooConnection;
    private readonly fetchFn: FetchFn;
    private readonly timeout: number;
    private requestCounter = 0;
    private uid: number | null = null;

    constructor(connection: OdooConnection, options: OdooJsonRpcOptions = {}) {
        this.connection = { ...connection, url: connection.url.replace(/\/+$/, '') };
        this.fetchFn = options.fetch ?? fetch;
        this.timeout = options.timeout ?? 30000;
    }

    get isAuthenticated(): boolean {
        return this.uid !== null;
    }

    async authenticate(): Promise<number> {
        const { database, username, password } = this.connection;
        Logger.info(`Authenticating to ${this.connection.url} (db=${database}, user=${username})`);

        const result = await this.call('common', 'authenticate', [database, username, password, {}]);
        if (typeof result !== 'number' || !Number.isInteger(result)) {
            throw new AuthenticationError(`Failed authenticating to ${this.connection.url} as "${username}"`);
        }
        this.uid = result;
        return result;
    }

    async searchRead(model: string, domain: Domain, options: SearchReadOptions = {}): Promise<RemoteRecord[]> {
        const kwargs: RemoteRecord = {};
        if (options.fields !== undefined) kwargs.fields = [...options.fields];
        if (options.limit !== undefined) kwargs.limit = options.limit;
        if (options.offset !== undefined) kwargs.offset = options.offset;
        if (options.order !== undefined) kwargs.order = options.order;

        const result = await this.execute(model, 'search_read', [domain], kwargs);
        return this.validate(RemoteRecordsSchema, result, model, 'search_read');
    }

    async read(model: string, ids: number | readonly number[], fields?: readonly string[]): Promise<RemoteRecord[]> {
        const kwargs: RemoteRecord = fields !== undefined ? { fields: [...fields] } : {};
        const result = await this.execute(model, 'read', [this.idList(ids)], kwargs);
        return this.validate(RemoteRecordsSchema, result, model, 'read');
    }

    async nameSearch(model: string, name: string, options: NameSearchOptions = {}): Promise<NamePair[]> {
        const kwargs: RemoteRecord = {};
        if (options.limit !== undefined) kwargs.limit = options.limit;
        if (options.operator !== undefined) kwargs.operator = options.operator;

        const result = await this.execute(model, 'name_search', [name], kwargs);
        return this.validate(NamePairsSchema, result, model, 'name_search');
    }

    async nameGet(model: string, ids: number | readonly number[]): Promise<NamePair[]> {
        const result = await this.execute(model, 'name_get', [this.idList(ids)]);
        return this.validate(NamePairsSchema, result, model, 'name_get');
    }

    async create(model: string, values: RemoteRecord): Promise<number> {
        const result = await this.execute(model, 'create', [values]);
        return this.validate(z.number().int(), result, model, 'create');
    }

    async write(model: string, ids: number | readonly number[], values: RemoteRecord): Promise<boolean> {
        const result = await this.execute(model, 'write', [this.idList(ids), values]);
        return this.validate(z.boolean(), result, model, 'write');
    }

    async unlink(model: string, ids: number | readonly number[]): Promise<boolean> {
        const result = await this.execute(model, 'unlink', [this.idList(ids)]);
        return this.validate(z.boolean(), result, model, 'unlink');
    }

    // ========================================================================
    // Internals
    // ========================================================================

    private idList(ids: number | readonly number[]): number[] {
        return typeof ids === 'number' ? [ids] : [...ids];
    }

    private async execute(model: string, method: string, args: RemoteValue[], kwargs: RemoteRecord = {}): Promise<RemoteValue | undefined> {
        if (this.uid === null) {
            throw new NotAuthenticatedError();
        }
        const { database, password } = this.connection;
        Logger.debug(`execute_kw ${model}.${method}`, JSON.stringify(args));
        return this.call('object', 'execute_kw', [database, this.uid, password, model, method, args, kwargs], model, method);
    }

    private validate<T>(schema: z.ZodType<T>, value: RemoteValue | undefined, model: string, method: string): T {
        const parsed = schema.safeParse(value);
        if (!parsed.success) {
            throw new RemoteCallError(method, `unexpected result ${JSON.stringify(value)}`, model, { cause: parsed.error });
        }
        return parsed.data;
    }

    private async call(
        service: 'common' | 'object',
        method: string,
        args: RemoteValue[],
        model?: string,
        modelMethod?: string
    ): Promise<RemoteValue | undefined> {
        const request: JsonRpcRequest = {
            jsonrpc: '2.0',
            method: 'call',
            params: { service, method, args },
            id: ++this.requestCounter,
        };
        const label = modelMethod ?? method;

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeout);

        let body: unknown;
        try {
            const response = await this.fetchFn(`${this.connection.url}/jsonrpc`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(request),
                signal: controller.signal,
            });
            if (!response.ok) {
                throw new RemoteCallError(label, `HTTP error: ${response.status} ${response.statusText}`, model);
            }
            body = await response.json();
        } catch (error) {
            if (error instanceof RemoteCallError) {
                throw error;
            }
            const reason = controller.signal.aborted
                ? `request timed out after ${this.timeout}ms`
                : `transport error: ${error instanceof Error ? error.message : String(error)}`;
            throw new RemoteCallError(label, reason, model, { cause: error });
        } finally {
            clearTimeout(timeoutId);
        }

        const parsed = JsonRpcResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new RemoteCallError(label, 'malformed JSON-RPC response', model, { cause: parsed.error });
        }
        if (parsed.data.error) {
            const { message, data } = parsed.data.error;
            throw new RemoteCallError(label, data?.message ?? message, model);
        }
        return parsed.data.result;
    }
}

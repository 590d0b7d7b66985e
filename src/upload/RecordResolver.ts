import type { RemoteClient, RemoteRecord } from '../remote/RemoteClient';
import type { RecordRef } from '../types';
import { Logger } from '../utils/Logger';
import { MissingRecordError, TooManyRecordsError } from './errors';

/**
 * Exactly one result, or MissingRecordError / TooManyRecordsError
 */
export function ensureOne<T>(results: readonly T[], model: string, field: string, value: string | number): T {
    if (results.length === 0) {
        throw new MissingRecordError(model, field, value);
    }
    if (results.length > 1) {
        throw new TooManyRecordsError(model, field, value);
    }
    return results[0];
}

/**
 * Resolves remote records by name or id, memoizing results for the lifetime
 * of the resolver. Meant to live for a single run: the remote store is not
 * expected to change underneath it.
 */
export class RecordResolver {
    private client: RemoteClient;
    private cache = new Map<string, RemoteRecord>();

    constructor(client: RemoteClient) {
        this.client = client;
    }

    async nameSearchOne(model: string, name: string): Promise<number> {
        const results = await this.client.nameSearch(model, name, { limit: 10 });
        return ensureOne(results, model, 'name', name)[0];
    }

    async readOne(model: string, id: number, fields?: readonly string[]): Promise<RemoteRecord> {
        const results = await this.client.read(model, id, fields);
        return ensureOne(results, model, 'id', id);
    }

    /**
     * Find a record by name (name_search) or by id (read)
     */
    async findOne(model: string, nameOrId: RecordRef, fields?: readonly string[]): Promise<RemoteRecord> {
        const key = JSON.stringify([model, nameOrId, fields ?? null]);
        const cached = this.cache.get(key);
        if (cached) {
            Logger.debug(`Resolver cache hit for ${model} ${JSON.stringify(nameOrId)}`);
            return cached;
        }

        const id = typeof nameOrId === 'string'
            ? await this.nameSearchOne(model, nameOrId)
            : nameOrId;
        const record = await this.readOne(model, id, fields);

        this.cache.set(key, record);
        return record;
    }
}

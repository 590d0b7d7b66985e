/**
 * Session-based client of the remote record store
 *
 * Records are plain field → value mappings. Many2one fields come back as
 * [id, display name] pairs, or false when empty.
 */

export type RemoteValue =
    | string
    | number
    | boolean
    | null
    | RemoteValue[]
    | { [field: string]: RemoteValue };

export type RemoteRecord = { [field: string]: RemoteValue };

/** A search domain, e.g. [['project_id', '=', 12]] */
export type Domain = Array<string | [string, string, RemoteValue]>;

/** (id, display name) pair returned by name_search / name_get */
export type NamePair = [number, string];

export interface SearchReadOptions {
    fields?: readonly string[];
    limit?: number;
    offset?: number;
    order?: string;
}

export interface NameSearchOptions {
    limit?: number;
    operator?: string;
}

export interface RemoteClient {
    /** Open a session, returning the user id */
    authenticate(): Promise<number>;
    readonly isAuthenticated: boolean;

    searchRead(model: string, domain: Domain, options?: SearchReadOptions): Promise<RemoteRecord[]>;
    read(model: string, ids: number | readonly number[], fields?: readonly string[]): Promise<RemoteRecord[]>;
    nameSearch(model: string, name: string, options?: NameSearchOptions): Promise<NamePair[]>;
    nameGet(model: string, ids: number | readonly number[]): Promise<NamePair[]>;
    /** Returns the id of the new record */
    create(model: string, values: RemoteRecord): Promise<number>;
    write(model: string, ids: number | readonly number[], values: RemoteRecord): Promise<boolean>;
    unlink(model: string, ids: number | readonly number[]): Promise<boolean>;
}

/**
 * Base connector interface for inventory integrations
 */

/**
 * Outcome of an existence lookup. A failed query is reported as 'error',
 * never folded into 'absent'.
 */
export type ExistenceResult =
    | { state: 'found'; count: number }
    | { state: 'absent' }
    | { state: 'error'; status: number | null; message: string };

export type CreateResult =
    | { ok: true; status: number; id?: number }
    | { ok: false; status: number | null; body: string };

export interface InventoryConnector {
    testConnection(): Promise<{ success: boolean; message: string }>;
    vlanExists(vid: number, siteId?: number): Promise<ExistenceResult>;
    createVlan(vid: number, name: string, siteId?: number): Promise<CreateResult>;
    prefixExists(network: string): Promise<ExistenceResult>;
    createPrefix(network: string, siteId?: number): Promise<CreateResult>;
}

/**
 * Base class for inventory connectors
 */
export abstract class BaseConnector implements InventoryConnector {
    protected name: string;
    protected type: 'netbox' | 'other';

    constructor(name: string, type: BaseConnector['type']) {
        this.name = name;
        this.type = type;
    }

    abstract testConnection(): Promise<{ success: boolean; message: string }>;

    /**
     * Look up VLANs by VID, optionally scoped to a site
     */
    abstract vlanExists(vid: number, siteId?: number): Promise<ExistenceResult>;

    abstract createVlan(vid: number, name: string, siteId?: number): Promise<CreateResult>;

    /**
     * Look up prefixes by exact CIDR
     */
    abstract prefixExists(network: string): Promise<ExistenceResult>;

    abstract createPrefix(network: string, siteId?: number): Promise<CreateResult>;

    /**
     * Get connector name
     */
    getName(): string {
        return this.name;
    }

    /**
     * Get connector type
     */
    getType(): BaseConnector['type'] {
        return this.type;
    }
}

import { vi, type Mock } from 'vitest';
import type { CreateResult, ExistenceResult, InventoryConnector } from '../connectors/base.js';
import type { SnmpTarget, WalkEntry, Walker } from '../engine/walker.js';

export const TEST_TARGET: SnmpTarget = {
    host: '192.0.2.1',
    community: 'public',
    port: 161,
    timeoutMs: 5000,
    retries: 1,
};

export function row(root: string, suffix: string, value: string): WalkEntry {
    return { oid: `${root}.${suffix}`, oidSuffix: suffix, value };
}

/**
 * Walker answering from canned tables keyed by OID root. An Error in place of
 * a table makes that walk fail.
 */
export class FakeWalker implements Walker {
    readonly calls: Array<{ oidRoot: string; target: SnmpTarget }> = [];
    private tables: Record<string, WalkEntry[] | Error>;

    constructor(tables: Record<string, WalkEntry[] | Error>) {
        this.tables = tables;
    }

    async walk(oidRoot: string, target: SnmpTarget): Promise<WalkEntry[]> {
        this.calls.push({ oidRoot, target });
        const table = this.tables[oidRoot];
        if (table instanceof Error) {
            throw table;
        }
        return table ?? [];
    }
}

export interface FakeInventory extends InventoryConnector {
    testConnection: Mock<InventoryConnector['testConnection']>;
    vlanExists: Mock<InventoryConnector['vlanExists']>;
    createVlan: Mock<InventoryConnector['createVlan']>;
    prefixExists: Mock<InventoryConnector['prefixExists']>;
    createPrefix: Mock<InventoryConnector['createPrefix']>;
}

/**
 * Inventory where nothing exists and every create succeeds, unless a test
 * overrides a method's behaviour.
 */
export function createFakeInventory(): FakeInventory {
    return {
        testConnection: vi.fn(async () => ({ success: true, message: 'Connected to NetBox v4.1.3' })),
        vlanExists: vi.fn(async (_vid: number, _siteId?: number): Promise<ExistenceResult> => ({ state: 'absent' })),
        createVlan: vi.fn(async (_vid: number, _name: string, _siteId?: number): Promise<CreateResult> => ({ ok: true, status: 201 })),
        prefixExists: vi.fn(async (_network: string): Promise<ExistenceResult> => ({ state: 'absent' })),
        createPrefix: vi.fn(async (_network: string, _siteId?: number): Promise<CreateResult> => ({ ok: true, status: 201 })),
    };
}

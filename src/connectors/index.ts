/**
 * Inventory Connectors Index
 *
 * Export the inventory connectors and the factory used by the entry points
 */

export { BaseConnector, type InventoryConnector, type ExistenceResult, type CreateResult } from './base.js';
export { NetBoxConnector, type NetBoxConnectorOptions } from './netbox.js';

import { NetBoxConnector } from './netbox.js';
import type { NetBoxConfig } from '../config/index.js';

/**
 * Create the inventory connector from configuration
 */
export function createInventoryConnector(config: NetBoxConfig): NetBoxConnector {
    return new NetBoxConnector({
        url: config.url,
        token: config.token,
        tlsVerify: config.tlsVerify,
        timeoutMs: config.timeoutMs,
    });
}

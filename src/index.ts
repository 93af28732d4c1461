/**
 * netbox-snmp-sync - HTTP API server
 *
 * Re-runs the device-to-NetBox sync on an interval and exposes status and
 * manual triggers over REST.
 */

import 'dotenv/config';
import { loadConfig, type AppConfig } from './config/index.js';
import { createInventoryConnector } from './connectors/index.js';
import { createSyncService } from './services/sync-service.js';
import { createApp } from './app.js';
import { ConfigError } from './utils/errors.js';

async function main() {
    console.log('[Server] Initializing...');

    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`[Server] ${error.message}`);
            process.exitCode = 1;
            return;
        }
        throw error;
    }

    const inventory = createInventoryConnector(config.netbox);
    const syncService = createSyncService(config, inventory);

    const connection = await inventory.testConnection();
    if (connection.success) {
        console.log(`[Server] ${connection.message}`);
    } else {
        console.warn(`[Server] ${inventory.getName()} is not reachable yet: ${connection.message}`);
    }

    const app = createApp({ syncService, inventory, target: config.device.host });
    const { port, host } = config.server;

    if (config.sync.enabled) {
        console.log(`[Server] Starting auto-sync (interval: ${Math.round(config.sync.intervalMs / 60000)} minutes)`);
        syncService.start();
    } else {
        console.log('[Server] Auto-sync disabled. Use POST /api/v1/sync/start to enable.');
    }

    const server = app.listen(port, host, () => {
        console.log(`[Server] ✓ API server running at http://${host}:${port}`);
        console.log(`[Server] ✓ Sync Status: http://${host}:${port}/api/v1/sync/status`);
        console.log('[Server] MCP server: npm run dev:mcp');
    });

    // Graceful shutdown
    process.on('SIGTERM', () => {
        console.log('[Server] Shutting down...');
        syncService.stop();
        server.close(() => process.exit(0));
    });
}

main().catch((error) => {
    console.error('[Server] Fatal error:', error);
    process.exitCode = 1;
});

import express, { type Express } from 'express';
import cors from 'cors';
import { createSyncRouter } from './routes/sync.js';
import type { SyncService } from './services/sync-service.js';
import type { InventoryConnector } from './connectors/base.js';
import { VERSION } from './config/index.js';

export interface AppDependencies {
    syncService: SyncService;
    inventory: InventoryConnector;
    target: string;
}

export function createApp({ syncService, inventory, target }: AppDependencies): Express {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json());

    // Health check
    app.get('/health', (req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    // API routes
    app.use('/api/v1/sync', createSyncRouter(syncService));

    // API status
    app.get('/api/v1/status', async (req, res) => {
        const status = syncService.getStatus();
        const config = syncService.getConfig();
        const netbox = await inventory.testConnection();

        res.json({
            name: 'netbox-snmp-sync',
            version: VERSION,
            description: 'SNMP VLAN and prefix discovery synchronised into NetBox',
            device: target,
            netbox,
            sync: {
                enabled: config.enabled,
                intervalMinutes: Math.round(config.intervalMs / 60000),
                status: status.status,
                lastSync: status.lastSync?.toISOString() || null,
                nextSync: status.nextSync?.toISOString() || null,
                lastResult: status.lastResult ? {
                    success: status.lastResult.success,
                    vlansFound: status.lastResult.discovery?.vlans.length ?? 0,
                    prefixesFound: status.lastResult.discovery?.subnets.length ?? 0,
                    totals: status.lastResult.report?.totals ?? null,
                    error: status.lastResult.error,
                } : null,
            },
        });
    });

    return app;
}

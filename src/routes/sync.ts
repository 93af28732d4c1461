/**
 * Sync API Routes
 *
 * Endpoints for triggering and scheduling device-to-NetBox sync runs
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { MIN_INTERVAL_MS } from '../config/index.js';
import type { SyncConfig, SyncService } from '../services/sync-service.js';
import { SyncError } from '../utils/errors.js';

const configPatchSchema = z.object({
    enabled: z.boolean().optional(),
    intervalMs: z.coerce.number().int().min(MIN_INTERVAL_MS, 'Interval must be at least 30000ms (30 seconds)').optional(),
    intervalMinutes: z.coerce.number().int().min(1, 'Interval must be at least 1 minute').optional(),
});

const triggerSchema = z.object({
    dryRun: z.boolean().optional(),
});

function firstIssue(error: z.ZodError): string {
    const issue = error.issues[0];
    return issue ? issue.message : 'Invalid request body';
}

export function createSyncRouter(syncService: SyncService): Router {
    const router = Router();

    /**
     * GET /api/v1/sync/status
     * Status of the last and next sync run
     */
    router.get('/status', (req: Request, res: Response) => {
        const status = syncService.getStatus();
        const config = syncService.getConfig();

        res.json({
            enabled: config.enabled,
            scheduled: syncService.isScheduled(),
            running: syncService.isRunning(),
            intervalMs: config.intervalMs,
            intervalHuman: `${Math.round(config.intervalMs / 1000 / 60)} minutes`,
            status: status.status,
            lastSync: status.lastSync?.toISOString() || null,
            nextSync: status.nextSync?.toISOString() || null,
            error: status.error,
            lastResult: status.lastResult,
        });
    });

    /**
     * GET /api/v1/sync/config
     * Get current sync configuration
     */
    router.get('/config', (req: Request, res: Response) => {
        res.json(syncService.getConfig());
    });

    /**
     * PATCH /api/v1/sync/config
     * Update sync configuration
     */
    router.patch('/config', (req: Request, res: Response) => {
        const parsed = configPatchSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            res.status(400).json({ error: firstIssue(parsed.error) });
            return;
        }

        try {
            const updates: Partial<SyncConfig> = {};
            if (parsed.data.enabled !== undefined) {
                updates.enabled = parsed.data.enabled;
            }
            if (parsed.data.intervalMs !== undefined) {
                updates.intervalMs = parsed.data.intervalMs;
            }
            // Also accept intervalMinutes for convenience
            if (parsed.data.intervalMinutes !== undefined) {
                updates.intervalMs = parsed.data.intervalMinutes * 60 * 1000;
            }

            syncService.setConfig(updates);

            // If enabled state changed, start/stop the timer
            if (updates.enabled !== undefined) {
                if (updates.enabled) {
                    syncService.start({ immediate: false });
                } else {
                    syncService.stop();
                }
            }

            res.json({
                success: true,
                config: syncService.getConfig(),
            });
        } catch (error) {
            res.status(500).json({
                error: error instanceof Error ? error.message : 'Failed to update config',
            });
        }
    });

    /**
     * POST /api/v1/sync/trigger
     * Run a sync now (or join the one in progress)
     */
    router.post('/trigger', async (req: Request, res: Response) => {
        const parsed = triggerSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            res.status(400).json({ error: firstIssue(parsed.error) });
            return;
        }

        try {
            const result = await syncService.runOnce({ dryRun: parsed.data.dryRun });
            res.json({
                success: result.success,
                result,
            });
        } catch (error) {
            res.status(500).json({
                error: error instanceof Error ? error.message : 'Sync failed',
            });
        }
    });

    /**
     * POST /api/v1/sync/discover
     * Walk the device and return the facts, without touching NetBox
     */
    router.post('/discover', async (req: Request, res: Response) => {
        try {
            const discovery = await syncService.discover();
            res.json({
                target: discovery.target,
                discoveredAt: discovery.discoveredAt.toISOString(),
                vlanCount: discovery.vlans.length,
                subnetCount: discovery.subnets.length,
                vlans: discovery.vlans,
                subnets: discovery.subnets,
            });
        } catch (error) {
            if (error instanceof SyncError) {
                res.status(502).json({ error: error.message, code: error.code });
                return;
            }
            res.status(500).json({
                error: error instanceof Error ? error.message : 'Discovery failed',
            });
        }
    });

    /**
     * POST /api/v1/sync/start
     * Start automatic sync timer
     */
    router.post('/start', (req: Request, res: Response) => {
        try {
            syncService.setConfig({ enabled: true });
            syncService.start({ immediate: false });
            res.json({
                success: true,
                message: 'Sync timer started',
                config: syncService.getConfig(),
            });
        } catch (error) {
            res.status(500).json({
                error: error instanceof Error ? error.message : 'Failed to start sync',
            });
        }
    });

    /**
     * POST /api/v1/sync/stop
     * Stop automatic sync timer
     */
    router.post('/stop', (req: Request, res: Response) => {
        try {
            syncService.stop();
            syncService.setConfig({ enabled: false });
            res.json({
                success: true,
                message: 'Sync timer stopped',
                config: syncService.getConfig(),
            });
        } catch (error) {
            res.status(500).json({
                error: error instanceof Error ? error.message : 'Failed to stop sync',
            });
        }
    });

    return router;
}

/**
 * Sync Service
 *
 * One sync run = discovery on the device + reconciliation into the inventory.
 * Runs are serialised so no fact is ever looked up and created by two passes
 * at once. A request joins a pending run of the same mode (dry or real);
 * otherwise it is queued behind the pending ones. The service also owns the
 * interval timer and the status of the last run.
 */

import { discoverDevice, type DiscoveryResult } from '../engine/discovery.js';
import { Reconciler, type ReconcileReport } from '../engine/reconciler.js';
import { SnmpWalker, type SnmpTarget, type Walker } from '../engine/walker.js';
import type { InventoryConnector } from '../connectors/base.js';
import { createInventoryConnector } from '../connectors/index.js';
import { MIN_INTERVAL_MS, type AppConfig, type SyncScheduleConfig } from '../config/index.js';
import { SyncError, errorMessage } from '../utils/errors.js';
import { formatDiscovery } from '../utils/format.js';
import { generateId } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Sync');

export type SyncState = 'idle' | 'syncing' | 'success' | 'error';

export interface SyncRunError {
    code: string;
    message: string;
}

export interface SyncRunResult {
    id: string;
    dryRun: boolean;
    success: boolean;
    startedAt: Date;
    finishedAt: Date;
    discovery: DiscoveryResult | null;
    report: ReconcileReport | null;
    error: SyncRunError | null;
}

export interface SyncStatus {
    status: SyncState;
    lastSync: Date | null;
    nextSync: Date | null;
    lastResult: SyncRunResult | null;
    error: string | null;
}

export type SyncConfig = SyncScheduleConfig;

export interface SyncServiceOptions {
    target: SnmpTarget;
    siteId?: number;
    walker: Walker;
    inventory: InventoryConnector;
    schedule?: Partial<SyncConfig>;
}

export interface RunOptions {
    dryRun?: boolean;
}

interface PendingRun {
    dryRun: boolean;
    promise: Promise<SyncRunResult>;
}

function toRunError(error: unknown): SyncRunError {
    if (error instanceof SyncError) {
        return { code: error.code, message: error.message };
    }
    return { code: 'UNEXPECTED', message: errorMessage(error) };
}

export class SyncService {
    private target: SnmpTarget;
    private siteId: number | undefined;
    private walker: Walker;
    private inventory: InventoryConnector;
    private config: SyncConfig;
    private state: SyncStatus = {
        status: 'idle',
        lastSync: null,
        nextSync: null,
        lastResult: null,
        error: null,
    };
    /** In flight first, then at most one queued run of the other mode */
    private pending: PendingRun[] = [];
    private timer: ReturnType<typeof setInterval> | null = null;

    constructor(options: SyncServiceOptions) {
        this.target = options.target;
        this.siteId = options.siteId;
        this.walker = options.walker;
        this.inventory = options.inventory;
        this.config = {
            enabled: options.schedule?.enabled ?? false,
            intervalMs: options.schedule?.intervalMs ?? 10 * 60 * 1000,
        };
    }

    getConfig(): SyncConfig {
        return { ...this.config };
    }

    /**
     * Update the schedule. A running timer picks up a new interval at once.
     */
    setConfig(updates: Partial<SyncConfig>): void {
        if (updates.intervalMs !== undefined && updates.intervalMs < MIN_INTERVAL_MS) {
            throw new RangeError(`Interval must be at least ${MIN_INTERVAL_MS}ms`);
        }

        const intervalChanged = updates.intervalMs !== undefined && updates.intervalMs !== this.config.intervalMs;
        this.config = { ...this.config, ...updates };

        if (intervalChanged && this.timer) {
            this.start({ immediate: false });
        }
    }

    getStatus(): SyncStatus {
        return { ...this.state };
    }

    isRunning(): boolean {
        return this.pending.length > 0;
    }

    isScheduled(): boolean {
        return this.timer !== null;
    }

    /**
     * Walk the device and extract facts without touching the inventory
     */
    async discover(): Promise<DiscoveryResult> {
        return discoverDevice(this.walker, this.target);
    }

    /**
     * Run one sync pass. Joins a pending pass of the same mode, or starts
     * once the pending passes have finished.
     */
    runOnce(options: RunOptions = {}): Promise<SyncRunResult> {
        const dryRun = options.dryRun ?? false;

        const joinable = this.pending.find(run => run.dryRun === dryRun);
        if (joinable) {
            logger.info(`${dryRun ? 'Dry run' : 'Sync'} already pending, joining it`);
            return joinable.promise;
        }

        const start = () => this.execute(dryRun);
        const previous = this.pending[this.pending.length - 1];
        if (previous) {
            logger.info(`${dryRun ? 'Dry run' : 'Sync'} queued behind the pass in progress`);
        }

        const run: PendingRun = {
            dryRun,
            promise: (previous ? previous.promise.then(start, start) : start()).finally(() => {
                this.pending = this.pending.filter(other => other !== run);
            }),
        };
        this.pending.push(run);
        return run.promise;
    }

    /**
     * Start the interval timer, optionally running a pass right away
     */
    start(options: { immediate?: boolean } = {}): void {
        this.stopTimer();

        this.timer = setInterval(() => this.tick(), this.config.intervalMs);
        this.state.nextSync = new Date(Date.now() + this.config.intervalMs);
        logger.info(`Sync timer started (every ${Math.round(this.config.intervalMs / 60000)} minute(s))`);

        if (options.immediate ?? true) {
            this.tick();
        }
    }

    stop(): void {
        if (this.stopTimer()) {
            logger.info('Sync timer stopped');
        }
        this.state.nextSync = null;
    }

    private stopTimer(): boolean {
        if (!this.timer) return false;
        clearInterval(this.timer);
        this.timer = null;
        return true;
    }

    private tick(): void {
        this.state.nextSync = new Date(Date.now() + this.config.intervalMs);
        this.runOnce().catch((error) => {
            logger.error(`Scheduled sync crashed: ${errorMessage(error)}`);
        });
    }

    private async execute(dryRun: boolean): Promise<SyncRunResult> {
        const startedAt = new Date();
        const id = generateId();
        this.state.status = 'syncing';
        this.state.error = null;

        logger.info(`Sync ${id.slice(0, 8)} started for ${this.target.host}${dryRun ? ' (dry run)' : ''}`);

        let discovery: DiscoveryResult | null = null;
        let report: ReconcileReport | null = null;
        let runError: SyncRunError | null = null;

        try {
            discovery = await discoverDevice(this.walker, this.target);
            for (const line of formatDiscovery(discovery)) {
                logger.info(line);
            }
            const reconciler = new Reconciler(this.inventory, { siteId: this.siteId, dryRun });
            report = await reconciler.reconcile(discovery);
        } catch (error) {
            runError = toRunError(error);
            logger.error(`Sync ${id.slice(0, 8)} aborted: ${runError.message}`);
        }

        const finishedAt = new Date();
        const success = runError === null && report !== null && report.totals.failed === 0;
        const result: SyncRunResult = {
            id,
            dryRun,
            success,
            startedAt,
            finishedAt,
            discovery,
            report,
            error: runError,
        };

        if (report) {
            const { created, skipped, planned, failed } = report.totals;
            logger.info(
                `Sync ${id.slice(0, 8)} finished in ${finishedAt.getTime() - startedAt.getTime()}ms: ` +
                `${created} created, ${skipped} skipped, ${planned} planned, ${failed} failed`,
            );
        }

        this.state.status = success ? 'success' : 'error';
        this.state.lastSync = finishedAt;
        this.state.lastResult = result;
        this.state.error = runError?.message ?? (success ? null : 'One or more facts failed to reconcile');

        return result;
    }
}

/**
 * Wire the production walker and inventory connector from configuration.
 * Entry points that also talk to the inventory pass their own connector in.
 */
export function createSyncService(
    config: AppConfig,
    inventory: InventoryConnector = createInventoryConnector(config.netbox),
    walker: Walker = new SnmpWalker(),
): SyncService {
    if (config.netbox.siteId === undefined) {
        logger.warn('NETBOX_SITE_ID is not set; VLANs are looked up and created without a site');
    }

    return new SyncService({
        target: { ...config.device },
        siteId: config.netbox.siteId,
        walker,
        inventory,
        schedule: config.sync,
    });
}

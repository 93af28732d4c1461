/**
 * Reconciler
 *
 * Create-if-absent for every discovered fact, one fact at a time, in
 * discovery order. Each fact ends in exactly one outcome and a failure on one
 * fact never stops the rest.
 *
 *   Discovered -> found   -> skipped
 *              -> error   -> failed (lookup)
 *              -> absent  -> created | failed (create) | planned (dry run)
 */

import type { CreateResult, ExistenceResult, InventoryConnector } from '../connectors/base.js';
import type { Subnet, VlanInterface } from './extractor.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Reconciler');

export type FactOutcome =
    | { status: 'created'; id?: number }
    | { status: 'skipped'; reason: 'exists' | 'unparsable' }
    | { status: 'planned' }
    | { status: 'failed'; stage: 'lookup' | 'create'; httpStatus: number | null; message: string };

export interface VlanOutcome {
    vlan: VlanInterface;
    outcome: FactOutcome;
}

export interface PrefixOutcome {
    subnet: Subnet;
    outcome: FactOutcome;
}

export interface ReconcileTotals {
    created: number;
    skipped: number;
    planned: number;
    failed: number;
}

export interface ReconcileReport {
    vlans: VlanOutcome[];
    prefixes: PrefixOutcome[];
    totals: ReconcileTotals;
}

export interface ReconcilerOptions {
    siteId?: number;
    /** Look up every fact but create nothing */
    dryRun?: boolean;
}

export function summarizeOutcomes(outcomes: readonly FactOutcome[]): ReconcileTotals {
    const totals: ReconcileTotals = { created: 0, skipped: 0, planned: 0, failed: 0 };
    for (const outcome of outcomes) {
        totals[outcome.status]++;
    }
    return totals;
}

export class Reconciler {
    private inventory: InventoryConnector;
    private siteId: number | undefined;
    private dryRun: boolean;

    constructor(inventory: InventoryConnector, options: ReconcilerOptions = {}) {
        this.inventory = inventory;
        this.siteId = options.siteId;
        this.dryRun = options.dryRun ?? false;
    }

    async reconcile(facts: { vlans: readonly VlanInterface[]; subnets: readonly Subnet[] }): Promise<ReconcileReport> {
        const vlans = await this.reconcileVlans(facts.vlans);
        const prefixes = await this.reconcilePrefixes(facts.subnets);

        return {
            vlans,
            prefixes,
            totals: summarizeOutcomes([...vlans, ...prefixes].map(r => r.outcome)),
        };
    }

    async reconcileVlans(vlans: readonly VlanInterface[]): Promise<VlanOutcome[]> {
        const results: VlanOutcome[] = [];
        for (const vlan of vlans) {
            results.push({ vlan, outcome: await this.reconcileVlan(vlan) });
        }
        return results;
    }

    async reconcilePrefixes(subnets: readonly Subnet[]): Promise<PrefixOutcome[]> {
        const results: PrefixOutcome[] = [];
        for (const subnet of subnets) {
            results.push({ subnet, outcome: await this.reconcilePrefix(subnet) });
        }
        return results;
    }

    private async reconcileVlan(vlan: VlanInterface): Promise<FactOutcome> {
        const { vid } = vlan;
        if (vid === null) {
            logger.warn(`Interface ${vlan.name} carries no VLAN id, skipping`);
            return { status: 'skipped', reason: 'unparsable' };
        }

        return this.ensure(
            `VLAN ${vid} (${vlan.name})`,
            () => this.inventory.vlanExists(vid, this.siteId),
            () => this.inventory.createVlan(vid, vlan.name, this.siteId),
        );
    }

    private async reconcilePrefix(subnet: Subnet): Promise<FactOutcome> {
        return this.ensure(
            `Prefix ${subnet.network}`,
            () => this.inventory.prefixExists(subnet.network),
            () => this.inventory.createPrefix(subnet.network, this.siteId),
        );
    }

    private async ensure(
        label: string,
        lookup: () => Promise<ExistenceResult>,
        create: () => Promise<CreateResult>,
    ): Promise<FactOutcome> {
        const existing = await lookup();

        switch (existing.state) {
            case 'found':
                logger.info(`${label} already exists, skipping`);
                return { status: 'skipped', reason: 'exists' };

            case 'error':
                logger.error(`✗ ${label} lookup failed, not creating: ${existing.message}`);
                return { status: 'failed', stage: 'lookup', httpStatus: existing.status, message: existing.message };

            case 'absent':
                break;
        }

        if (this.dryRun) {
            logger.info(`${label} is missing, would be created (dry run)`);
            return { status: 'planned' };
        }

        const result = await create();
        if (!result.ok) {
            logger.error(`✗ Failed to create ${label}: ${result.status ?? 'no response'} - ${result.body}`);
            return { status: 'failed', stage: 'create', httpStatus: result.status, message: result.body };
        }

        logger.info(`✓ ${label} created`);
        return result.id === undefined ? { status: 'created' } : { status: 'created', id: result.id };
    }
}

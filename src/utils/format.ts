/**
 * Human-readable rendering of discovery results and sync reports.
 * Console output only; the JSON run result is the machine-readable form.
 */

import type { DiscoveryResult } from '../engine/discovery.js';
import type { FactOutcome, ReconcileReport } from '../engine/reconciler.js';
import type { SyncRunResult } from '../services/sync-service.js';

export function formatDiscovery(discovery: DiscoveryResult): string[] {
    return [
        `VLAN interfaces on ${discovery.target}: ${discovery.vlans.length}`,
        ...discovery.vlans.map(v => `  ${v.name}${v.vid === null ? '' : `  (vid ${v.vid})`}`),
        `Prefixes on ${discovery.target}: ${discovery.subnets.length}`,
        ...discovery.subnets.map(s => `  ${s.network}`),
    ];
}

export function describeOutcome(outcome: FactOutcome): string {
    switch (outcome.status) {
        case 'created':
            return outcome.id === undefined ? 'created' : `created (id ${outcome.id})`;
        case 'skipped':
            return outcome.reason === 'exists' ? 'already present' : 'skipped, no VLAN id';
        case 'planned':
            return 'missing, would be created';
        case 'failed':
            return `FAILED (${outcome.stage}): ${outcome.httpStatus ?? 'no response'} - ${outcome.message}`;
    }
}

export function formatReport(report: ReconcileReport): string[] {
    const { created, skipped, planned, failed } = report.totals;
    return [
        'VLANs:',
        ...report.vlans.map(({ vlan, outcome }) => `  VLAN ${vlan.vid ?? '-'} ${vlan.name}: ${describeOutcome(outcome)}`),
        'Prefixes:',
        ...report.prefixes.map(({ subnet, outcome }) => `  ${subnet.network}: ${describeOutcome(outcome)}`),
        `Totals: ${created} created, ${skipped} skipped, ${planned} planned, ${failed} failed`,
    ];
}

export function formatRunResult(result: SyncRunResult): string[] {
    const lines: string[] = [];
    if (result.report) {
        lines.push(...formatReport(result.report));
    }
    if (result.error) {
        lines.push(`Sync aborted [${result.error.code}]: ${result.error.message}`);
    }
    return lines;
}

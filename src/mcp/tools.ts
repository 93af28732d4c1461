/**
 * MCP tool definitions and their implementation
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { InventoryConnector } from '../connectors/base.js';
import type { SyncService } from '../services/sync-service.js';
import { normalizeCidr } from '../engine/extractor.js';
import { formatDiscovery, formatRunResult } from '../utils/format.js';
import { errorMessage } from '../utils/errors.js';
import { isValidCidr } from '../utils/helpers.js';

export interface ToolContext {
    syncService: SyncService;
    inventory: InventoryConnector;
    siteId?: number;
}

export type ToolResult = {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
};

export const TOOLS: Tool[] = [
    {
        name: 'discover_device',
        description: 'Walk the configured device over SNMP and list its VLAN sub-interfaces (aeN.M) and IPv4 subnets. Read-only, NetBox is not contacted.',
        inputSchema: {
            type: 'object',
            properties: {},
        },
    },
    {
        name: 'sync_inventory',
        description: 'Run a full sync: discover the device and create every missing VLAN and prefix in NetBox. Joins a sync already in progress.',
        inputSchema: {
            type: 'object',
            properties: {
                dryRun: {
                    type: 'boolean',
                    description: 'Look up every fact in NetBox but create nothing (default: false)',
                },
            },
        },
    },
    {
        name: 'check_inventory',
        description: 'Check whether a VLAN (by VID, scoped to the configured site) or a prefix (by CIDR) exists in NetBox',
        inputSchema: {
            type: 'object',
            properties: {
                vid: { type: 'number', description: 'VLAN ID to look up' },
                prefix: { type: 'string', description: 'IPv4 prefix in CIDR notation, e.g. 10.0.0.0/24' },
            },
        },
    },
    {
        name: 'get_sync_status',
        description: 'Status of the scheduled sync and the result of the last run',
        inputSchema: {
            type: 'object',
            properties: {},
        },
    },
];

const syncArgsSchema = z.object({
    dryRun: z.boolean().optional(),
});

const checkArgsSchema = z
    .object({
        vid: z.number().int().min(0).max(4095).optional(),
        prefix: z.string().trim().refine(isValidCidr, 'prefix must be IPv4 CIDR, e.g. 10.0.0.0/24').optional(),
    })
    .refine(args => (args.vid === undefined) !== (args.prefix === undefined), {
        message: 'Provide exactly one of vid or prefix',
    });

function text(value: string): ToolResult {
    return { content: [{ type: 'text', text: value }] };
}

function failure(value: string): ToolResult {
    return { content: [{ type: 'text', text: value }], isError: true };
}

function json(value: unknown): ToolResult {
    return text(JSON.stringify(value, null, 2));
}

export async function handleToolCall(name: string, args: unknown, context: ToolContext): Promise<ToolResult> {
    const { syncService, inventory, siteId } = context;

    try {
        switch (name) {
            case 'discover_device': {
                const discovery = await syncService.discover();
                return text(formatDiscovery(discovery).join('\n'));
            }

            case 'sync_inventory': {
                const parsed = syncArgsSchema.safeParse(args ?? {});
                if (!parsed.success) {
                    return failure(`Invalid arguments: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
                }

                const result = await syncService.runOnce({ dryRun: parsed.data.dryRun });
                const lines = formatRunResult(result);
                const header = result.success
                    ? `Sync ${result.dryRun ? 'dry run ' : ''}completed`
                    : `Sync ${result.dryRun ? 'dry run ' : ''}finished with errors`;
                return {
                    content: [{ type: 'text', text: [header, ...lines].join('\n') }],
                    isError: !result.success,
                };
            }

            case 'check_inventory': {
                const parsed = checkArgsSchema.safeParse(args ?? {});
                if (!parsed.success) {
                    return failure(`Invalid arguments: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
                }

                const { vid, prefix } = parsed.data;
                if (vid !== undefined) {
                    const existence = await inventory.vlanExists(vid, siteId);
                    return json({ vid, siteId: siteId ?? null, ...existence });
                }

                const network = normalizeCidr(prefix ?? '');
                const existence = await inventory.prefixExists(network);
                return json({ prefix: network, ...existence });
            }

            case 'get_sync_status': {
                const status = syncService.getStatus();
                return json({
                    ...status,
                    config: syncService.getConfig(),
                    running: syncService.isRunning(),
                });
            }

            default:
                return failure(`Unknown tool: ${name}`);
        }
    } catch (error) {
        return failure(`Error executing ${name}: ${errorMessage(error)}`);
    }
}

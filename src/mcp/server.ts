#!/usr/bin/env node

import 'dotenv/config';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { VERSION, loadConfig } from '../config/index.js';
import { createInventoryConnector } from '../connectors/index.js';
import { createSyncService } from '../services/sync-service.js';
import { redirectInfoToStderr } from '../utils/logger.js';
import { TOOLS, handleToolCall, type ToolContext } from './tools.js';

// stdout carries the MCP protocol
redirectInfoToStderr();

async function main() {
    const config = loadConfig();
    const inventory = createInventoryConnector(config.netbox);
    const context: ToolContext = {
        inventory,
        siteId: config.netbox.siteId,
        syncService: createSyncService({ ...config, sync: { ...config.sync, enabled: false } }, inventory),
    };

    const server = new Server(
        {
            name: 'netbox-snmp-sync',
            version: VERSION,
        },
        {
            capabilities: {
                tools: {},
            },
        }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        return handleToolCall(name, args, context);
    });

    const transport = new StdioServerTransport();
    await server.connect(transport);

    console.error(`[MCP] Server running for device ${config.device.host}`);
}

main().catch((error) => {
    console.error('[MCP] Fatal error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
});

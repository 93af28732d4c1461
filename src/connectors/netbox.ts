/**
 * NetBox Connector
 *
 * Minimal IPAM client: VLAN and prefix lookups and creates.
 * API Docs: https://demo.netbox.dev/api/docs/
 */

import { Agent, fetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import { BaseConnector, type CreateResult, type ExistenceResult } from './base.js';
import { errorMessage } from '../utils/errors.js';
import { safeJsonParse } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('NetBox');

const listSchema = z.object({
    count: z.number().int().nonnegative().optional(),
});

const createdSchema = z.object({
    id: z.number().int(),
});

const statusSchema = z.object({
    'netbox-version': z.string(),
});

export interface NetBoxConnectorOptions {
    url: string;
    token: string;
    /** Verify the server certificate (default true) */
    tlsVerify?: boolean;
    timeoutMs?: number;
    /** Custom undici dispatcher; takes precedence over tlsVerify */
    dispatcher?: Dispatcher;
}

interface RawResponse {
    status: number;
    text: string;
}

export class NetBoxConnector extends BaseConnector {
    private baseUrl: string;
    private token: string;
    private timeoutMs: number;
    private dispatcher: Dispatcher | undefined;

    constructor(options: NetBoxConnectorOptions) {
        super('NetBox', 'netbox');
        this.baseUrl = options.url.replace(/\/+$/, '');
        this.token = options.token;
        this.timeoutMs = options.timeoutMs ?? 10_000;

        if (options.tlsVerify === false) {
            logger.warn(`TLS certificate verification is DISABLED for ${this.baseUrl}`);
        }

        if (options.dispatcher) {
            this.dispatcher = options.dispatcher;
        } else if (options.tlsVerify === false) {
            this.dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
        }
    }

    private async request(method: 'GET' | 'POST', endpoint: string, payload?: unknown): Promise<RawResponse> {
        const response = await fetch(`${this.baseUrl}${endpoint}`, {
            method,
            headers: {
                'Authorization': `Token ${this.token}`,
                'Content-Type': 'application/json',
                'Accept': 'application/json',
            },
            body: payload === undefined ? undefined : JSON.stringify(payload),
            signal: AbortSignal.timeout(this.timeoutMs),
            dispatcher: this.dispatcher,
        });

        return { status: response.status, text: await response.text() };
    }

    private async lookup(endpoint: string): Promise<ExistenceResult> {
        let response: RawResponse;
        try {
            response = await this.request('GET', endpoint);
        } catch (error) {
            return { state: 'error', status: null, message: errorMessage(error) };
        }

        if (response.status !== 200) {
            return {
                state: 'error',
                status: response.status,
                message: `NetBox API error: ${response.status} - ${response.text}`,
            };
        }

        const parsed = listSchema.safeParse(safeJsonParse(response.text));
        if (!parsed.success) {
            return { state: 'error', status: response.status, message: 'NetBox API returned an unreadable list response' };
        }

        const count = parsed.data.count ?? 0;
        return count > 0 ? { state: 'found', count } : { state: 'absent' };
    }

    private async create(endpoint: string, payload: Record<string, unknown>, successStatuses: number[]): Promise<CreateResult> {
        let response: RawResponse;
        try {
            response = await this.request('POST', endpoint, payload);
        } catch (error) {
            return { ok: false, status: null, body: errorMessage(error) };
        }

        if (!successStatuses.includes(response.status)) {
            return { ok: false, status: response.status, body: response.text };
        }

        const created = createdSchema.safeParse(safeJsonParse(response.text));
        return created.success
            ? { ok: true, status: response.status, id: created.data.id }
            : { ok: true, status: response.status };
    }

    async testConnection(): Promise<{ success: boolean; message: string }> {
        try {
            const response = await this.request('GET', '/api/status/');
            if (response.status !== 200) {
                return { success: false, message: `NetBox API error: ${response.status} - ${response.text}` };
            }
            const status = statusSchema.safeParse(safeJsonParse(response.text));
            return {
                success: true,
                message: status.success
                    ? `Connected to NetBox v${status.data['netbox-version']}`
                    : 'Connected to NetBox',
            };
        } catch (error) {
            return {
                success: false,
                message: error instanceof Error ? error.message : 'Connection failed',
            };
        }
    }

    async vlanExists(vid: number, siteId?: number): Promise<ExistenceResult> {
        const params = new URLSearchParams({ vid: String(vid) });
        if (siteId !== undefined) {
            params.set('site_id', String(siteId));
        }
        return this.lookup(`/api/ipam/vlans/?${params.toString()}`);
    }

    /**
     * Create a VLAN. NetBox answers 201 on success; anything else is a failure.
     */
    async createVlan(vid: number, name: string, siteId?: number): Promise<CreateResult> {
        const payload: Record<string, unknown> = { vid, name };
        if (siteId !== undefined) {
            payload.site = siteId;
        }
        return this.create('/api/ipam/vlans/', payload, [201]);
    }

    async prefixExists(network: string): Promise<ExistenceResult> {
        const params = new URLSearchParams({ prefix: network });
        return this.lookup(`/api/ipam/prefixes/?${params.toString()}`);
    }

    async createPrefix(network: string, siteId?: number): Promise<CreateResult> {
        const payload: Record<string, unknown> = { prefix: network };
        if (siteId !== undefined) {
            payload.site = siteId;
        }
        return this.create('/api/ipam/prefixes/', payload, [200, 201]);
    }
}

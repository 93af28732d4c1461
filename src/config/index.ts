/**
 * Configuration
 *
 * Loaded once at process start from environment variables (entry points import
 * 'dotenv/config' first) and passed explicitly into every component.
 */

import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

export const VERSION = '0.1.0';

export const MIN_INTERVAL_MS = 30_000;

const intFromEnv = (fallback: string, min: number, max: number) =>
    z
        .string()
        .default(fallback)
        .transform((val) => Number(val.trim()))
        .pipe(z.number().int().min(min).max(max));

const boolFromEnv = (fallback: 'true' | 'false') =>
    z
        .string()
        .default(fallback)
        .transform((val) => val.trim().toLowerCase())
        .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
        .transform((val) => val === 'true' || val === '1' || val === 'yes');

const requiredString = (name: string) =>
    z
        .string({ required_error: `${name} is required` })
        .trim()
        .min(1, `${name} must not be empty`);

const envSchema = z.object({
    // -- Device ------------------------------------------------------------------
    SNMP_HOST: requiredString('SNMP_HOST'),
    SNMP_COMMUNITY: requiredString('SNMP_COMMUNITY'),
    SNMP_PORT: intFromEnv('161', 1, 65535),
    SNMP_TIMEOUT_MS: intFromEnv('5000', 100, 600_000),
    SNMP_RETRIES: intFromEnv('1', 0, 10),

    // -- NetBox ------------------------------------------------------------------
    NETBOX_URL: requiredString('NETBOX_URL').refine(
        (url) => /^https?:\/\/[^/\s]+/i.test(url),
        { message: 'NETBOX_URL must be an http:// or https:// URL' },
    ),
    NETBOX_TOKEN: requiredString('NETBOX_TOKEN'),
    NETBOX_SITE_ID: z
        .string()
        .trim()
        .optional()
        .transform((val) => (val ? Number(val) : undefined))
        .pipe(z.number({ invalid_type_error: 'NETBOX_SITE_ID must be a number' }).int().positive().optional()),
    NETBOX_TLS_VERIFY: boolFromEnv('true'),
    NETBOX_TIMEOUT_MS: intFromEnv('10000', 100, 600_000),

    // -- API server / scheduling -------------------------------------------------
    PORT: intFromEnv('3860', 1, 65535),
    HOST: z.string().default('0.0.0.0'),
    SYNC_AUTO: boolFromEnv('true'),
    SYNC_INTERVAL_MINUTES: intFromEnv('10', 1, 24 * 60),
});

export interface DeviceConfig {
    host: string;
    community: string;
    port: number;
    timeoutMs: number;
    retries: number;
}

export interface NetBoxConfig {
    url: string;
    token: string;
    siteId?: number;
    tlsVerify: boolean;
    timeoutMs: number;
}

export interface SyncScheduleConfig {
    enabled: boolean;
    intervalMs: number;
}

export interface ServerConfig {
    port: number;
    host: string;
}

export interface AppConfig {
    device: DeviceConfig;
    netbox: NetBoxConfig;
    sync: SyncScheduleConfig;
    server: ServerConfig;
}

/**
 * Validate an environment map and build the application config.
 * Throws ConfigError listing every problem found.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);

    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => {
            const key = issue.path.join('.');
            return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
        });
        throw new ConfigError(issues);
    }

    const data = parsed.data;

    return {
        device: {
            host: data.SNMP_HOST,
            community: data.SNMP_COMMUNITY,
            port: data.SNMP_PORT,
            timeoutMs: data.SNMP_TIMEOUT_MS,
            retries: data.SNMP_RETRIES,
        },
        netbox: {
            url: data.NETBOX_URL.replace(/\/+$/, ''),
            token: data.NETBOX_TOKEN,
            siteId: data.NETBOX_SITE_ID,
            tlsVerify: data.NETBOX_TLS_VERIFY,
            timeoutMs: data.NETBOX_TIMEOUT_MS,
        },
        sync: {
            enabled: data.SYNC_AUTO,
            intervalMs: data.SYNC_INTERVAL_MINUTES * 60 * 1000,
        },
        server: {
            port: data.PORT,
            host: data.HOST,
        },
    };
}

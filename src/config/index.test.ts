import { describe, expect, it } from 'vitest';
import { loadConfig } from './index.js';
import { ConfigError } from '../utils/errors.js';

const BASE_ENV = {
    SNMP_HOST: '192.0.2.1',
    SNMP_COMMUNITY: 'public',
    NETBOX_URL: 'https://netbox.example.com/',
    NETBOX_TOKEN: 'test-token',
};

function issuesFor(env: NodeJS.ProcessEnv): string[] {
    try {
        loadConfig(env);
    } catch (error) {
        if (error instanceof ConfigError) {
            return error.issues;
        }
        throw error;
    }
    throw new Error('expected loadConfig to reject the environment');
}

describe('loadConfig', () => {
    it('applies defaults for everything optional', () => {
        expect(loadConfig(BASE_ENV)).toEqual({
            device: { host: '192.0.2.1', community: 'public', port: 161, timeoutMs: 5000, retries: 1 },
            netbox: {
                url: 'https://netbox.example.com',
                token: 'test-token',
                siteId: undefined,
                tlsVerify: true,
                timeoutMs: 10000,
            },
            sync: { enabled: true, intervalMs: 600_000 },
            server: { port: 3860, host: '0.0.0.0' },
        });
    });

    it('reads overrides', () => {
        const config = loadConfig({
            ...BASE_ENV,
            SNMP_PORT: '1161',
            SNMP_RETRIES: '0',
            NETBOX_SITE_ID: '5',
            NETBOX_TLS_VERIFY: 'false',
            SYNC_AUTO: 'no',
            SYNC_INTERVAL_MINUTES: '15',
            PORT: '8080',
        });

        expect(config.device.port).toBe(1161);
        expect(config.device.retries).toBe(0);
        expect(config.netbox.siteId).toBe(5);
        expect(config.netbox.tlsVerify).toBe(false);
        expect(config.sync).toEqual({ enabled: false, intervalMs: 900_000 });
        expect(config.server.port).toBe(8080);
    });

    it('treats an empty site id as unset', () => {
        expect(loadConfig({ ...BASE_ENV, NETBOX_SITE_ID: '' }).netbox.siteId).toBeUndefined();
    });

    it('lists every missing required variable', () => {
        const issues = issuesFor({ SNMP_COMMUNITY: 'public', NETBOX_URL: 'https://netbox.example.com' });

        expect(issues).toEqual(['SNMP_HOST is required', 'NETBOX_TOKEN is required']);
    });

    it('rejects a blank community', () => {
        expect(issuesFor({ ...BASE_ENV, SNMP_COMMUNITY: '   ' })).toEqual(['SNMP_COMMUNITY must not be empty']);
    });

    it('rejects a URL without a scheme', () => {
        expect(issuesFor({ ...BASE_ENV, NETBOX_URL: 'netbox.local' }))
            .toEqual(['NETBOX_URL must be an http:// or https:// URL']);
    });

    it('rejects malformed numbers and flags', () => {
        const issues = issuesFor({
            ...BASE_ENV,
            NETBOX_SITE_ID: 'abc',
            SNMP_PORT: '70000',
            NETBOX_TLS_VERIFY: 'maybe',
        });

        expect(issues).toHaveLength(3);
        expect(issues).toContain('NETBOX_SITE_ID must be a number');
        expect(issues.some(issue => issue.startsWith('SNMP_PORT: '))).toBe(true);
        expect(issues.some(issue => issue.startsWith('NETBOX_TLS_VERIFY: '))).toBe(true);
    });

    it('puts every issue in the error message', () => {
        expect(() => loadConfig({})).toThrow(
            'Invalid configuration:\n' +
            '  - SNMP_HOST is required\n' +
            '  - SNMP_COMMUNITY is required\n' +
            '  - NETBOX_URL is required\n' +
            '  - NETBOX_TOKEN is required'
        );
    });
});

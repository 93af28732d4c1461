import { randomUUID } from 'crypto';

/**
 * Generate a unique ID for sync runs
 */
export function generateId(): string {
    return randomUUID();
}

/**
 * Parse JSON safely, returning null on failure
 */
export function safeJsonParse(json: string | null | undefined): unknown {
    if (!json) return null;
    try {
        return JSON.parse(json);
    } catch {
        return null;
    }
}

/**
 * Validate IPv4 address
 */
export function isValidIpv4(ip: string): boolean {
    const ipRegex = /^(\d{1,3}\.){3}\d{1,3}$/;
    if (!ipRegex.test(ip)) return false;

    const octets = ip.split('.').map(Number);
    return octets.every(o => o >= 0 && o <= 255);
}

/**
 * Validate CIDR notation
 */
export function isValidCidr(cidr: string): boolean {
    const cidrRegex = /^(\d{1,3}\.){3}\d{1,3}\/\d{1,2}$/;
    if (!cidrRegex.test(cidr)) return false;

    const [ip, prefix] = cidr.split('/');
    const prefixNum = parseInt(prefix, 10);
    if (prefixNum < 0 || prefixNum > 32) return false;

    return isValidIpv4(ip);
}

/**
 * Dotted quad to unsigned 32-bit integer. Caller validates the input.
 */
export function ipv4ToInt(ip: string): number {
    return ip.split('.').reduce((acc, octet) => ((acc << 8) | parseInt(octet, 10)) >>> 0, 0);
}

export function intToIpv4(value: number): string {
    return [24, 16, 8, 0].map(shift => (value >>> shift) & 0xff).join('.');
}

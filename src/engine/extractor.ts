/**
 * Fact Extractor
 *
 * Pure functions turning raw walk rows into VLAN interfaces and IPv4 subnets.
 */

import type { WalkEntry } from './walker.js';
import { InvalidAddressError, InvalidMaskError } from '../utils/errors.js';
import { intToIpv4, ipv4ToInt, isValidIpv4 } from '../utils/helpers.js';

export interface VlanInterface {
    name: string;
    /**
     * Unit number of the aeN.M descriptor. Always set for interfaces from
     * extractVlanInterfaces, which keeps only names with a unit; null only
     * reaches the reconciler from callers that build interfaces themselves.
     */
    vid: number | null;
}

export interface Subnet {
    network: string;
}

const VLAN_INTERFACE_PATTERN = /^ae\d+\.\d+$/;
const VLAN_ID_PATTERN = /ae\d+\.(\d+)/;

export function isVlanInterfaceName(name: string): boolean {
    return VLAN_INTERFACE_PATTERN.test(name);
}

export function parseVlanId(name: string): number | null {
    const match = VLAN_ID_PATTERN.exec(name);
    return match ? parseInt(match[1], 10) : null;
}

/**
 * Link-aggregation sub-interfaces (aeN.M) from an ifDescr walk, in walk order.
 */
export function extractVlanInterfaces(entries: readonly WalkEntry[]): VlanInterface[] {
    return entries
        .filter(entry => isVlanInterfaceName(entry.value))
        .map(entry => ({ name: entry.value, vid: parseVlanId(entry.value) }));
}

function isContiguousFromTop(bits: number): boolean {
    // ones followed by zeros: the inverted value is 2^n - 1
    const inverted = ~bits >>> 0;
    return (inverted & (inverted + 1)) === 0;
}

function countOnes(bits: number): number {
    let count = 0;
    for (let value = bits >>> 0; value !== 0; value >>>= 1) {
        count += value & 1;
    }
    return count;
}

/**
 * Dotted-decimal netmask to prefix length.
 * A host mask such as 0.0.0.255 is accepted as well and read as its inverse.
 */
export function maskToPrefix(mask: string): number {
    const trimmed = mask.trim();
    if (!isValidIpv4(trimmed)) {
        throw new InvalidMaskError(mask);
    }

    const bits = ipv4ToInt(trimmed);
    if (isContiguousFromTop(bits)) {
        return countOnes(bits);
    }

    const inverted = ~bits >>> 0;
    if (isContiguousFromTop(inverted)) {
        return countOnes(inverted);
    }

    throw new InvalidMaskError(mask);
}

function prefixToMask(prefixLength: number): number {
    return prefixLength === 0 ? 0 : (0xffffffff << (32 - prefixLength)) >>> 0;
}

/**
 * Clear host bits and render as CIDR. Non-strict: a host address is floored
 * to its network address.
 */
export function normalizeNetwork(address: string, prefixLength: number): string {
    if (!isValidIpv4(address)) {
        throw new InvalidAddressError(address);
    }
    if (!Number.isInteger(prefixLength) || prefixLength < 0 || prefixLength > 32) {
        throw new InvalidMaskError(String(prefixLength));
    }

    const network = (ipv4ToInt(address) & prefixToMask(prefixLength)) >>> 0;
    return `${intToIpv4(network)}/${prefixLength}`;
}

export function normalizeCidr(cidr: string): string {
    const [address, prefix, ...rest] = cidr.split('/');
    if (prefix === undefined || rest.length > 0 || !/^\d{1,2}$/.test(prefix)) {
        throw new InvalidAddressError(cidr);
    }
    return normalizeNetwork(address, parseInt(prefix, 10));
}

/**
 * Subnets from an ipAdEntNetMask walk. The row index is the interface
 * address (last four OID components), the value its netmask.
 */
export function extractSubnets(entries: readonly WalkEntry[]): Subnet[] {
    return entries.map(entry => {
        const address = entry.oidSuffix.split('.').slice(-4).join('.');
        if (!isValidIpv4(address)) {
            throw new InvalidAddressError(address);
        }
        return { network: normalizeNetwork(address, maskToPrefix(entry.value)) };
    });
}

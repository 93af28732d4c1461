/**
 * Device discovery: interface descriptions and address netmasks, walked one
 * after the other and turned into facts.
 */

import { OIDS, type SnmpTarget, type Walker } from './walker.js';
import { extractSubnets, extractVlanInterfaces, type Subnet, type VlanInterface } from './extractor.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('SNMP');

export interface DiscoveryResult {
    target: string;
    vlans: VlanInterface[];
    subnets: Subnet[];
    discoveredAt: Date;
}

export async function discoverDevice(walker: Walker, target: SnmpTarget): Promise<DiscoveryResult> {
    logger.info(`Walking ifDescr (${OIDS.ifDescr}) on ${target.host}:${target.port}`);
    const interfaces = await walker.walk(OIDS.ifDescr, target);
    const vlans = extractVlanInterfaces(interfaces);
    logger.info(`${interfaces.length} interface(s), ${vlans.length} VLAN sub-interface(s)`);

    logger.info(`Walking ipAdEntNetMask (${OIDS.ipAdEntNetMask}) on ${target.host}:${target.port}`);
    const netmasks = await walker.walk(OIDS.ipAdEntNetMask, target);
    const subnets = extractSubnets(netmasks);
    logger.info(`${subnets.length} subnet(s)`);

    return {
        target: target.host,
        vlans,
        subnets,
        discoveredAt: new Date(),
    };
}

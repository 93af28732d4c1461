/**
 * SNMP Walker
 *
 * Walks one OID subtree on a device with SNMP v2c and returns every row in
 * walk order. The first transport or varbind error aborts the walk; rows
 * collected before it are dropped.
 */

import * as snmp from 'net-snmp';
import { SnmpError, errorMessage } from '../utils/errors.js';

export const OIDS = {
    ifDescr: '1.3.6.1.2.1.2.2.1.2',
    ipAdEntNetMask: '1.3.6.1.2.1.4.20.1.3',
} as const;

const MAX_REPETITIONS = 20;

export interface WalkEntry {
    /** Full numeric OID of the row */
    oid: string;
    /** Part of the OID below the walked root, i.e. the table index */
    oidSuffix: string;
    value: string;
}

export interface SnmpTarget {
    host: string;
    community: string;
    port: number;
    timeoutMs: number;
    retries: number;
}

export interface Walker {
    walk(oidRoot: string, target: SnmpTarget): Promise<WalkEntry[]>;
}

function formatValue(value: unknown): string {
    if (Buffer.isBuffer(value)) {
        return value.toString('utf8');
    }
    return String(value);
}

function suffixOf(oid: string, root: string): string {
    return oid.startsWith(`${root}.`) ? oid.slice(root.length + 1) : oid;
}

type SnmpSession = ReturnType<typeof snmp.createSession>;

export class SnmpWalker implements Walker {
    async walk(oidRoot: string, target: SnmpTarget): Promise<WalkEntry[]> {
        const context = { host: target.host, oid: oidRoot };

        let session: SnmpSession;
        try {
            session = snmp.createSession(target.host, target.community, {
                port: target.port,
                version: snmp.Version2c,
                timeout: target.timeoutMs,
                retries: target.retries,
            });
        } catch (error) {
            throw new SnmpError(errorMessage(error), context, error);
        }

        try {
            return await this.subtree(session, oidRoot, context);
        } finally {
            session.close();
        }
    }

    private subtree(session: SnmpSession, oidRoot: string, context: { host: string; oid: string }): Promise<WalkEntry[]> {
        return new Promise((resolve, reject) => {
            // keyed by OID: a repeated OID overwrites in place
            const rows = new Map<string, WalkEntry>();
            let failure: SnmpError | null = null;

            session.on('error', (error: Error) => {
                reject(new SnmpError(error.message, context, error));
            });

            try {
                session.subtree(
                    oidRoot,
                    MAX_REPETITIONS,
                    (varbinds) => {
                        for (const varbind of varbinds) {
                            if (snmp.isVarbindError(varbind)) {
                                failure = new SnmpError(snmp.varbindError(varbind), context);
                                return true;
                            }
                            rows.set(varbind.oid, {
                                oid: varbind.oid,
                                oidSuffix: suffixOf(varbind.oid, oidRoot),
                                value: formatValue(varbind.value),
                            });
                        }
                        return false;
                    },
                    (error) => {
                        if (error) {
                            reject(new SnmpError(error.message, context, error));
                        } else if (failure) {
                            reject(failure);
                        } else {
                            resolve([...rows.values()]);
                        }
                    }
                );
            } catch (error) {
                reject(new SnmpError(errorMessage(error), context, error));
            }
        });
    }
}

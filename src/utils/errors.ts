/**
 * Error types for the sync pipeline
 *
 * Failures that end a run are thrown as one of these classes. Per-fact
 * inventory failures are not exceptions: they travel as values in
 * ExistenceResult / CreateResult and end up in the reconcile report.
 */

export type SyncErrorCode =
    | 'CONFIG_INVALID'
    | 'SNMP_TRANSPORT'
    | 'PARSE_MASK'
    | 'PARSE_ADDRESS';

export interface ErrorContext {
    [key: string]: unknown;
}

export class SyncError extends Error {
    public readonly code: SyncErrorCode;
    public readonly context: ErrorContext;

    constructor(message: string, code: SyncErrorCode, context: ErrorContext = {}, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'SyncError';
        this.code = code;
        this.context = context;
    }

    toJSON(): { name: string; code: SyncErrorCode; message: string; context: ErrorContext } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            context: this.context,
        };
    }
}

/**
 * Raised while loading configuration, before any network activity
 */
export class ConfigError extends SyncError {
    public readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`, 'CONFIG_INVALID', { issues });
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

/**
 * SNMP transport or protocol failure during a walk
 */
export class SnmpError extends SyncError {
    constructor(message: string, context: { host: string; oid: string }, cause?: unknown) {
        super(`SNMP walk of ${context.oid} on ${context.host} failed: ${message}`, 'SNMP_TRANSPORT', context, cause);
        this.name = 'SnmpError';
    }
}

export class InvalidMaskError extends SyncError {
    constructor(value: string) {
        super(`Invalid IPv4 netmask: "${value}"`, 'PARSE_MASK', { value });
        this.name = 'InvalidMaskError';
    }
}

export class InvalidAddressError extends SyncError {
    constructor(value: string) {
        super(`Invalid IPv4 address: "${value}"`, 'PARSE_ADDRESS', { value });
        this.name = 'InvalidAddressError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}

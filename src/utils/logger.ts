/**
 * Console logging with a bracketed component prefix: "[Reconciler] ..."
 *
 * Info lines go to stdout unless redirected. The MCP server speaks its
 * protocol on stdout and redirects them to stderr.
 */

export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

let infoToStderr = false;

export function redirectInfoToStderr(): void {
    infoToStderr = true;
}

export function createLogger(scope: string): Logger {
    const prefix = `[${scope}]`;
    return {
        info(message) {
            if (infoToStderr) {
                console.error(`${prefix} ${message}`);
            } else {
                console.log(`${prefix} ${message}`);
            }
        },
        warn(message) {
            console.warn(`${prefix} ${message}`);
        },
        error(message) {
            console.error(`${prefix} ${message}`);
        },
    };
}

import { parseArgs } from 'util';
import type { SyncRunResult, SyncService } from '../services/sync-service.js';
import { formatDiscovery, formatRunResult } from '../utils/format.js';
import { errorMessage } from '../utils/errors.js';

export const EXIT_CODES = {
    ok: 0,
    fatal: 1,
    partial: 2,
} as const;

export type Command = 'sync' | 'discover';

export interface CliArgs {
    command: Command;
    dryRun: boolean;
    help: boolean;
}

export const USAGE = `Usage: netbox-snmp-sync [sync|discover] [--dry-run]

Commands:
  sync       Discover VLANs and prefixes on the device and create the missing ones in NetBox (default)
  discover   Only walk the device and print what was found

Options:
  --dry-run  Look everything up in NetBox but create nothing
  -h, --help Show this help

Exit codes: 0 success, 1 fatal error, 2 some facts failed to reconcile`;

export function parseCliArgs(argv: string[]): CliArgs {
    const { values, positionals } = parseArgs({
        args: argv,
        options: {
            'dry-run': { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false },
        },
        allowPositionals: true,
    });

    if (positionals.length > 1) {
        throw new Error(`Unexpected arguments: ${positionals.slice(1).join(' ')}`);
    }

    const command = positionals[0] ?? 'sync';
    if (command !== 'sync' && command !== 'discover') {
        throw new Error(`Unknown command: ${command}`);
    }

    return {
        command,
        dryRun: values['dry-run'] ?? false,
        help: values.help ?? false,
    };
}

export function exitCodeFor(result: SyncRunResult): number {
    if (result.error || !result.report) return EXIT_CODES.fatal;
    return result.report.totals.failed > 0 ? EXIT_CODES.partial : EXIT_CODES.ok;
}

export async function runCommand(
    args: CliArgs,
    service: Pick<SyncService, 'runOnce' | 'discover'>,
    print: (line: string) => void,
): Promise<number> {
    if (args.command === 'discover') {
        try {
            const discovery = await service.discover();
            formatDiscovery(discovery).forEach(line => print(line));
            return EXIT_CODES.ok;
        } catch (error) {
            print(`Discovery failed: ${errorMessage(error)}`);
            return EXIT_CODES.fatal;
        }
    }

    const result = await service.runOnce({ dryRun: args.dryRun });
    formatRunResult(result).forEach(line => print(line));
    return exitCodeFor(result);
}

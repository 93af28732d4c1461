#!/usr/bin/env node

/**
 * One-shot command line entry point, meant for cron or CI.
 */

import 'dotenv/config';
import { loadConfig } from '../config/index.js';
import { createSyncService } from '../services/sync-service.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { EXIT_CODES, USAGE, parseCliArgs, runCommand, type CliArgs } from './commands.js';

async function main(): Promise<number> {
    let args: CliArgs;
    try {
        args = parseCliArgs(process.argv.slice(2));
    } catch (error) {
        console.error(errorMessage(error));
        console.error(USAGE);
        return EXIT_CODES.fatal;
    }

    if (args.help) {
        console.log(USAGE);
        return EXIT_CODES.ok;
    }

    try {
        const config = loadConfig();
        const service = createSyncService(config);
        return await runCommand(args, service, line => console.log(line));
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(error.message);
            return EXIT_CODES.fatal;
        }
        throw error;
    }
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error) => {
        console.error('[CLI] Unexpected failure:', error);
        process.exitCode = EXIT_CODES.fatal;
    });

#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { Logger } from 'winston';
import { version } from '../version';
import { loadRunConfig, TRunConfig, DEFAULT_CONFIG_PATH, DEFAULT_POLL_SECONDS } from '../config';
import { defaultLogger, getLogger } from '../logging/Logger';
import { ConfigError, JobFailedError } from '../manager/errors';
import { GlacierManager } from '../manager/GlacierManager';
import { IVaultService } from '../manager/model';
import { PrunerState, VaultPruner } from '../pruner/VaultPruner';
import { errorMessage } from '../utils/helpers';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type TCliDeps = {
    env?: NodeJS.ProcessEnv;
    logger?: Logger;
    sleep?: (ms: number) => Promise<void>;
    createVault?: (config: TRunConfig, logger: Logger) => IVaultService;
    onPruner?: (pruner: VaultPruner) => void;
};

export const createGlacierManager = ({ region, accountId, profile, roleArn }: TRunConfig, logger: Logger): IVaultService =>
    new GlacierManager({ region, accountId, profile, roleArn, logger });

export function createProgram(): Command {
    return new Command()
        .name('glacier-prune')
        .description('Delete all archives from an Amazon Glacier vault')
        .version(version)
        .option('--vault-name <name>', 'Name of the Glacier vault')
        .option('--region <region>', 'AWS region for the Glacier client (defaults to your AWS config/profile)')
        .option('--profile <profile>', 'Named AWS profile to take credentials from')
        .option('--role-arn <arn>', 'Role to assume before talking to Glacier')
        .option('--account-id <id>', 'Account owning the vault (default: the credentials\' account)')
        .option('--poll-seconds <seconds>', `Seconds to wait between job status checks (default: ${DEFAULT_POLL_SECONDS})`)
        .option('--dry-run', 'List archives without deleting them')
        .option('--save-inventory <file>', 'Save inventory to this file path after retrieval')
        .option('--load-inventory <file>', 'Load inventory from this file instead of retrieving from AWS')
        .option('--use-job-id <jobId>', 'Use an existing inventory-retrieval job ID instead of starting a new one')
        .option('--config <file>', `YAML configuration file (default: ${DEFAULT_CONFIG_PATH} if present)`)
        .option('--log-level <level>', 'error, warn, info or debug (default: info)')
        .option('--log-file <file>', 'Also write the log to this file');
}

/*
Runs one prune and resolves to the process exit code. Never calls process.exit itself.
*/
export async function main(argv: string[], deps: TCliDeps = {}): Promise<number> {
    const bootLogger = deps.logger || defaultLogger;
    const program = createProgram().exitOverride();

    try {
        program.parse(argv, { from: 'node' });
    } catch (err) {
        if (err instanceof CommanderError)
            return err.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
        throw err;
    }

    let config: TRunConfig;
    try {
        config = await loadRunConfig(program.opts(), { env: deps.env });
    } catch (err) {
        if (err instanceof ConfigError) {
            bootLogger.error(err.message);
            return EXIT_USAGE;
        }
        throw err;
    }

    const { logLevel, logFile } = config;
    const logger = deps.logger || getLogger({
        con: { level: logLevel },
        file: logFile ? { name: logFile, level: logLevel } : undefined
    });
    const vault = (deps.createVault || createGlacierManager)(config, logger);
    const pruner = new VaultPruner(config, vault, { logger, sleep: deps.sleep });
    deps.onPruner?.(pruner);

    try {
        const { failures } = await pruner.run();
        failures.forEach(({ archiveId }) => logger.warn(`Not deleted: ${archiveId}`));
        return EXIT_OK;
    } catch (err) {
        logger.error(`Error: ${errorMessage(err)}`);
        if (pruner.jobId && pruner.state === PrunerState.Polling && !(err instanceof JobFailedError))
            logger.info(`Resume later with --use-job-id ${pruner.jobId}`);
        return EXIT_FAILURE;
    }
}

if (require.main === module) {
    let active: VaultPruner | undefined;

    process.once('SIGINT', () => {
        defaultLogger.warn('Interrupted by user; exiting.');
        if (active?.jobId && active.state === PrunerState.Polling)
            defaultLogger.warn(`Resume later with --use-job-id ${active.jobId}`);
        process.exit(EXIT_FAILURE);
    });

    main(process.argv, { onPruner: pruner => active = pruner }).then(
        code => {
            process.exitCode = code;
        },
        (err: unknown) => {
            defaultLogger.error(`Error: ${errorMessage(err)}`);
            process.exitCode = EXIT_FAILURE;
        }
    );
}

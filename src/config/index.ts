import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import * as dotenv from 'dotenv';
import { load } from 'js-yaml';
import { z, ZodError } from 'zod';
import { LOG_LEVELS, TLogLevel } from '../logging/Logger';
import { ConfigError } from '../manager/errors';
import { errorMessage } from '../utils/helpers';

export const DEFAULT_CONFIG_PATH = 'glacier-prune.yml';
export const DEFAULT_ENV_PATH = '.env';
export const DEFAULT_POLL_SECONDS = 300;
// largest interval a single timer can wait for
export const MAX_POLL_SECONDS = Math.floor(0x7fffffff / 1000);

export type TInventorySource =
    | { kind: 'remote' }
    | { kind: 'job'; jobId: string }
    | { kind: 'file'; path: string };

export type TRunConfig = {
    vaultName: string;
    region?: string;
    accountId: string;
    profile?: string;
    roleArn?: string;
    dryRun: boolean;
    pollSeconds: number;
    saveInventory?: string;
    source: TInventorySource;
    logLevel: TLogLevel;
    logFile?: string;
};

type TRawSettings = Record<string, unknown>;

const optionalText = z.string().trim().min(1).optional();

/*
Flags as commander hands them over. Everything is optional here; requirements are checked after merging.
*/
export const CliOptionsSchema = z.object({
    vaultName: z.string().optional(),
    region: z.string().optional(),
    profile: z.string().optional(),
    roleArn: z.string().optional(),
    accountId: z.string().optional(),
    dryRun: z.boolean().optional(),
    pollSeconds: z.string().optional(),
    saveInventory: z.string().optional(),
    loadInventory: z.string().optional(),
    useJobId: z.string().optional(),
    config: z.string().optional(),
    logLevel: z.string().optional(),
    logFile: z.string().optional()
});

export type TCliOptions = z.infer<typeof CliOptionsSchema>;

const SettingsSchema = z.object({
    vaultName: z.string({ required_error: '--vault-name is required' }).trim().min(1),
    region: optionalText,
    profile: optionalText,
    roleArn: optionalText,
    accountId: z.string().trim().min(1).default('-'),
    dryRun: z.boolean().default(false),
    pollSeconds: z.coerce.number().int().positive()
        .max(MAX_POLL_SECONDS, `--poll-seconds cannot exceed ${MAX_POLL_SECONDS}`)
        .default(DEFAULT_POLL_SECONDS),
    saveInventory: optionalText,
    loadInventory: optionalText,
    useJobId: optionalText,
    logLevel: z.enum(LOG_LEVELS).default('info'),
    logFile: optionalText
}).superRefine(({ loadInventory, useJobId }, ctx) => {
    if (loadInventory && useJobId) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['loadInventory'],
            message: '--load-inventory and --use-job-id are mutually exclusive'
        });
    }
});

const FileConfigSchema = z.object({
    aws: z.object({
        region: z.string(),
        profile: z.string(),
        roleArn: z.string(),
        accountId: z.union([z.string(), z.number()]).transform(String)
    }).partial().default({}),
    prune: z.object({
        vaultName: z.string(),
        pollSeconds: z.number(),
        dryRun: z.boolean()
    }).partial().default({}),
    logging: z.object({
        level: z.string(),
        file: z.string()
    }).partial().default({})
});

const toConfigError = (prefix: string, error: ZodError): ConfigError => new ConfigError(
    `${prefix}: ${error.issues.map(issue =>
        issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message).join('; ')}`,
    error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
);

const compact = (values: TRawSettings): TRawSettings =>
    Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined && value !== ''));

export function parseCliOptions(values: unknown): TCliOptions {
    const result = CliOptionsSchema.safeParse(values);
    if (!result.success)
        throw toConfigError('Invalid command line', result.error);

    const { loadInventory, useJobId } = result.data;
    if (loadInventory && useJobId)
        throw new ConfigError('--load-inventory and --use-job-id are mutually exclusive',
            [{ path: 'loadInventory', message: '--load-inventory and --use-job-id are mutually exclusive' }]);

    return result.data;
}

export function settingsFromEnv(env: NodeJS.ProcessEnv): TRawSettings {
    const dryRun = env.GLACIER_DRY_RUN;
    return compact({
        vaultName: env.GLACIER_VAULT_NAME,
        region: env.AWS_REGION,
        profile: env.AWS_PROFILE,
        roleArn: env.AWS_ROLE_ARN,
        accountId: env.GLACIER_ACCOUNT_ID,
        pollSeconds: env.GLACIER_POLL_SECONDS,
        dryRun: dryRun ? dryRun.toLowerCase() !== 'false' : undefined,
        logLevel: env.LOG_LEVEL?.toLowerCase(),
        logFile: env.LOG_FILE
    });
}

export async function readConfigFile(path: string): Promise<TRawSettings> {
    let parsed: unknown;
    try {
        parsed = load(await readFile(path, { encoding: 'utf8' })) ?? {};
    } catch (err) {
        throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`);
    }

    const result = FileConfigSchema.safeParse(parsed);
    if (!result.success)
        throw toConfigError(`Invalid config file ${path}`, result.error);

    const { aws, prune, logging } = result.data;
    return compact({
        ...aws,
        ...prune,
        logLevel: logging.level?.toLowerCase(),
        logFile: logging.file
    });
}

/*
Merges the layers (CLI over environment over config file over defaults) and validates the result.
*/
export function resolveRunConfig(layers: {
    cli: TCliOptions;
    env?: TRawSettings;
    file?: TRawSettings;
}): TRunConfig {
    const { config: _configPath, ...cli } = layers.cli;
    const result = SettingsSchema.safeParse({
        ...layers.file,
        ...layers.env,
        ...compact(cli)
    });
    if (!result.success)
        throw toConfigError('Invalid configuration', result.error);

    const { loadInventory, useJobId, ...settings } = result.data;
    const source: TInventorySource = loadInventory ? { kind: 'file', path: loadInventory }
        : useJobId ? { kind: 'job', jobId: useJobId }
            : { kind: 'remote' };

    return { ...settings, source };
}

/*
Flag-level checks run before anything is read from disk; .env and the YAML file come after.
*/
export async function loadRunConfig(values: unknown, options: {
    env?: NodeJS.ProcessEnv;
    envFile?: string;
} = {}): Promise<TRunConfig> {
    const cli = parseCliOptions(values);

    if (!options.env)
        dotenv.config({ path: resolve(options.envFile || DEFAULT_ENV_PATH) });
    const env = options.env || process.env;

    const configPath = cli.config || (existsSync(DEFAULT_CONFIG_PATH) ? DEFAULT_CONFIG_PATH : undefined);
    const file = configPath ? await readConfigFile(configPath) : {};

    return resolveRunConfig({ cli, env: settingsFromEnv(env), file });
}


import { Glacier, SharedIniFileCredentials, ChainableTemporaryCredentials, Credentials } from 'aws-sdk';
import { InitiateJobInput, JobParameters, InitiateJobOutput, GlacierJobDescription } from 'aws-sdk/clients/glacier';
import { Logger } from 'winston';
import { ZodError } from 'zod';
import { getLogger, defaultLogger } from '../logging/Logger';
import { IVaultService, TAWSInventoryReport, TInventory, TJobHandle, TJobStatus, TJobStatusCode } from './model';
import { DeleteError, PruneError, PruneErrorCode } from './errors';
import {
    bodyToString, describeZodError, errorMessage, isFatalAwsError, parseInventoryReport, toInventory
} from '../utils/helpers';

const ROLE_SESSION_NAME = 'glacier-prune';
const JOB_STATUS_CODES: readonly TJobStatusCode[] = ['InProgress', 'Succeeded', 'Failed'];

export type TGlacierManagerConfig = {
    region?: string;
    accountId?: string;
    profile?: string;
    roleArn?: string;
    enableLogging?: boolean;
    logger?: Logger;
};

export class GlacierManager implements IVaultService {
    private readonly glacier: Glacier;
    private readonly accountId: string;
    private readonly region?: string;
    private readonly logger: Logger;

    constructor(params: TGlacierManagerConfig, glacier?: Glacier) {
        const { region, accountId, enableLogging, logger } = params;
        this.accountId = accountId || '-';
        this.region = region;
        this.logger = enableLogging === false ? getLogger({ silent: true }) : logger || defaultLogger;

        if (glacier) {
            this.glacier = glacier;
        } else {
            const credentials = GlacierManager.resolveCredentials(params);
            // a failed request surfaces at once; deletes in particular are never repeated
            this.glacier = new Glacier({ region, maxRetries: 0, ...(credentials ? { credentials } : {}) });
        }
    }

    /*
    Named profile first, then an optional assumed role on top of it.
    Undefined leaves the SDK's default provider chain in charge.
    */
    public static resolveCredentials({ profile, roleArn, region }: TGlacierManagerConfig): Credentials | undefined {
        const base = profile ? new SharedIniFileCredentials({ profile }) : undefined;

        if (!roleArn)
            return base;

        return new ChainableTemporaryCredentials({
            params: { RoleArn: roleArn, RoleSessionName: ROLE_SESSION_NAME },
            masterCredentials: base,
            stsConfig: { region }
        });
    }

    public async initiateInventoryJob(params: { vaultName: string; }): Promise<TJobHandle> {
        const { vaultName } = params;
        try {
            const jobParameters: JobParameters = {
                Type: 'inventory-retrieval',
                Format: 'JSON'
            };
            const jobInput: InitiateJobInput = {
                accountId: this.accountId,
                vaultName,
                jobParameters
            };

            this.logger.debug(`GlacierManager.initiateInventoryJob initiating new inventory job for ${vaultName}`);
            const { jobId }: InitiateJobOutput = await this.glacier.initiateJob(jobInput).promise();

            if (!jobId)
                throw new Error('initiateJob returned no jobId');

            return { jobId, vaultName, region: this.region };
        } catch (err) {
            this.logger.error('GlacierManager.initiateInventoryJob', err);
            throw new PruneError(PruneErrorCode.AWS_FAILURE, 'Failed to initiate inventory job', err);
        }
    }

    public async getJobStatus(job: TJobHandle): Promise<TJobStatus> {
        const { jobId, vaultName } = job;
        let description: GlacierJobDescription;
        try {
            description = await this.glacier.describeJob({
                accountId: this.accountId,
                vaultName,
                jobId
            }).promise();
            this.logger.debug(`GlacierManager.getJobStatus ${JSON.stringify(description)}`);
        } catch (err) {
            this.logger.error('GlacierManager.getJobStatus', err);
            throw new PruneError(PruneErrorCode.AWS_FAILURE, `Failed to describe job ${jobId}`, err);
        }

        const { Action, StatusCode, StatusMessage, Completed } = description;
        const statusCode = JOB_STATUS_CODES.find(code => code === StatusCode);

        return {
            jobId,
            action: Action,
            // anything Glacier reports outside the documented set is treated as terminal
            statusCode: statusCode || 'Failed',
            statusMessage: statusCode ? StatusMessage : `Unexpected job status: ${StatusCode}`,
            completed: !!Completed
        };
    }

    public async fetchInventory(job: TJobHandle): Promise<TInventory> {
        const { jobId, vaultName } = job;
        let inventorySerialized: string;
        try {
            const inventoryJobOutput = await this.glacier.getJobOutput({
                accountId: this.accountId,
                vaultName,
                jobId
            }).promise();
            inventorySerialized = await bodyToString(inventoryJobOutput.body);
        } catch (err) {
            this.logger.error('GlacierManager.fetchInventory', err);
            throw new PruneError(PruneErrorCode.AWS_FAILURE, 'Failed to fetch inventory', err);
        }

        let report: TAWSInventoryReport;
        try {
            report = parseInventoryReport(JSON.parse(inventorySerialized));
        } catch (err) {
            const reason = err instanceof ZodError ? describeZodError(err) : 'not valid JSON';
            throw new PruneError(PruneErrorCode.MALFORMED_INVENTORY,
                `Inventory output of job ${jobId} is malformed (${reason})`, err);
        }

        const inventory = toInventory(report);
        this.logger.debug(`GlacierManager.fetchInventory archives=${inventory.archiveList.length}`);
        return inventory;
    }

    public async deleteArchive(params: {
        vaultName: string;
        archiveId: string;
    }): Promise<void> {
        const { vaultName, archiveId } = params;
        try {
            this.logger.debug(`deleteArchive ${JSON.stringify(params)}`);
            await this.glacier.deleteArchive({
                accountId: this.accountId,
                vaultName,
                archiveId
            }).promise();
        } catch (err) {
            this.logger.debug('GlacierManager.deleteArchive', err);
            throw new DeleteError(archiveId, isFatalAwsError(err),
                `Failed to delete archive ${archiveId}: ${errorMessage(err)}`, err);
        }
    }
}

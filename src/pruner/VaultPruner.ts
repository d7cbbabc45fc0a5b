import { Logger } from 'winston';
import { defaultLogger } from '../logging/Logger';
import { DeleteError, JobFailedError, InventoryLoadError } from '../manager/errors';
import { IVaultService, TInventory, TJobHandle } from '../manager/model';
import { InventoryStore } from '../inventory/InventoryStore';
import { TRunConfig } from '../config';
import { errorMessage, sleep } from '../utils/helpers';

const INVENTORY_RETRIEVAL = 'InventoryRetrieval';

export enum PrunerState {
    Configuring = 'Configuring',
    Sourcing = 'Sourcing',
    Polling = 'Polling',
    Listing = 'Listing',
    Deleting = 'Deleting',
    Done = 'Done'
}

export type TDeleteFailure = {
    archiveId: string;
    message: string;
};

export type TPruneReport = {
    vaultName: string;
    dryRun: boolean;
    total: number;
    deleted: number;
    failures: TDeleteFailure[];
    jobId?: string;
};

export type TVaultPrunerOptions = {
    store?: InventoryStore;
    logger?: Logger;
    sleep?: (ms: number) => Promise<void>;
};

/*
One prune run: source an inventory (file, existing job or new job), optionally persist it,
then delete or list every archive it names. Instances are single-use.
*/
export class VaultPruner {
    private readonly store: InventoryStore;
    private readonly logger: Logger;
    private readonly sleep: (ms: number) => Promise<void>;

    private _state = PrunerState.Configuring;
    private job?: TJobHandle;

    constructor(
        private readonly config: TRunConfig,
        private readonly vault: IVaultService,
        options: TVaultPrunerOptions = {}) {
        this.logger = options.logger || defaultLogger;
        this.store = options.store || new InventoryStore(this.logger);
        this.sleep = options.sleep || sleep;
    }

    public get state(): PrunerState {
        return this._state;
    }

    /*
    Id of the inventory job this run is waiting on or consumed, for resuming with --use-job-id.
    */
    public get jobId(): string | undefined {
        return this.job?.jobId;
    }

    public async run(): Promise<TPruneReport> {
        if (this._state !== PrunerState.Configuring)
            throw new Error(`VaultPruner.run called in state ${this._state}`);

        const { dryRun, saveInventory } = this.config;
        if (dryRun)
            this.logger.info('Dry-run mode: no archives will be deleted.');

        this._state = PrunerState.Sourcing;
        const inventory = await this.sourceInventory();

        if (saveInventory)
            await this.store.save(saveInventory, inventory);

        const report = dryRun ? this.listArchives(inventory) : await this.deleteArchives(inventory);
        this._state = PrunerState.Done;

        if (dryRun)
            this.logger.info(`Dry-run complete. Would delete ${report.total} archives.`);
        else
            this.logger.info(`Finished. Deleted ${report.deleted} of ${report.total} archives.`);

        return report;
    }

    private async sourceInventory(): Promise<TInventory> {
        const { source, vaultName, region } = this.config;

        if (source.kind === 'file') {
            const inventory = await this.store.load(source.path);
            if (inventory.vaultName && inventory.vaultName !== vaultName) {
                throw new InventoryLoadError(source.path,
                    `Inventory in ${source.path} belongs to vault ${inventory.vaultName}, not ${vaultName}`);
            }
            return inventory;
        }

        if (source.kind === 'job') {
            this.logger.info(`Using existing inventory-retrieval job: ${source.jobId}`);
            this.job = { jobId: source.jobId, vaultName, region };
        } else {
            this.job = await this.vault.initiateInventoryJob({ vaultName });
            this.logger.info(`Started inventory-retrieval job: ${this.job.jobId}`);
        }

        const job = this.job;
        await this.waitForJob(job);
        this.logger.info(`Downloading inventory for vault ${vaultName}...`);
        return this.vault.fetchInventory(job);
    }

    private async waitForJob(job: TJobHandle): Promise<void> {
        const { pollSeconds } = this.config;
        this._state = PrunerState.Polling;
        this.logger.info(`Waiting for inventory job ${job.jobId} to complete (this can take hours)...`);

        let pollCount = 0;
        for (;;) {
            const { statusCode, statusMessage, action } = await this.vault.getJobStatus(job);

            if (action && action !== INVENTORY_RETRIEVAL) {
                throw new JobFailedError(job.jobId, statusCode,
                    `Job ${job.jobId} is a ${action} job, not an inventory retrieval`);
            }

            if (statusCode === 'InProgress') {
                pollCount++;
                this.logger.info(`Still waiting... (poll #${pollCount}, next check in ${pollSeconds} seconds)`);
                await this.sleep(pollSeconds * 1000);
                continue;
            }

            if (statusCode === 'Succeeded')
                return;

            throw new JobFailedError(job.jobId, statusCode,
                `Inventory job failed with status: ${statusCode}${statusMessage ? ` (${statusMessage})` : ''}`);
        }
    }

    private listArchives(inventory: TInventory): TPruneReport {
        this._state = PrunerState.Listing;
        const { archiveList } = inventory;
        const total = archiveList.length;

        this.logger.info(`Found ${total} archives to delete`);
        archiveList.forEach(({ archiveId }, index) =>
            this.logger.info(`Would delete ${archiveId} (${index + 1}/${total})`));

        return this.report(total, 0, []);
    }

    /*
    A failed delete is recorded and skipped unless it is fatal (credentials, authorization, network),
    in which case the run aborts. Deletes are never retried.
    */
    private async deleteArchives(inventory: TInventory): Promise<TPruneReport> {
        this._state = PrunerState.Deleting;
        const { vaultName } = this.config;
        const { archiveList } = inventory;
        const total = archiveList.length;
        const failures: TDeleteFailure[] = [];
        let deleted = 0;

        this.logger.info(`Found ${total} archives to delete`);
        for (const [index, { archiveId }] of archiveList.entries()) {
            try {
                await this.vault.deleteArchive({ vaultName, archiveId });
                deleted++;
                this.logger.info(`Deleted ${archiveId} (${index + 1}/${total})`);
            } catch (err) {
                if (!(err instanceof DeleteError) || err.fatal) {
                    this.logger.error(`Aborting after ${deleted} of ${total} deletions: ${errorMessage(err)}`);
                    throw err;
                }
                this.logger.error(`${err.message} (${index + 1}/${total})`);
                failures.push({ archiveId, message: err.message });
            }
        }

        if (failures.length)
            this.logger.warn(`${failures.length} of ${total} archives could not be deleted`);

        return this.report(total, deleted, failures);
    }

    private report(total: number, deleted: number, failures: TDeleteFailure[]): TPruneReport {
        return {
            vaultName: this.config.vaultName,
            dryRun: this.config.dryRun,
            total,
            deleted,
            failures,
            jobId: this.job?.jobId
        };
    }
}

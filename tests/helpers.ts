import { Writable } from 'stream';
import { createLogger, format, transports } from 'winston';
import { TAWSInventoryReport, IVaultService, TInventory, TJobHandle, TJobStatus, TJobStatusCode } from '../src/manager/model';
import { DeleteError } from '../src/manager/errors';
import { TRunConfig } from '../src/config';
import { getLogger } from '../src/logging/Logger';
import { toInventory } from '../src/utils/helpers';

export const silentLogger = getLogger({ silent: true });

/*
Logger whose formatted lines end up in `lines`, as `<level>: <message>`.
Transports are fed asynchronously, so await flushLogs() before reading them.
*/
export const capturingLogger = () => {
    const lines: string[] = [];
    const stream = new Writable({
        write(chunk: Buffer | string, _encoding, callback) {
            lines.push(chunk.toString().trimEnd());
            callback();
        }
    });
    const logger = createLogger({
        level: 'debug',
        format: format.printf(({ level, message }) => `${level}: ${String(message)}`),
        transports: [new transports.Stream({ stream })]
    });
    return { logger, lines };
};

export const flushLogs = () => new Promise<void>(resolve => setImmediate(resolve));

export const vaultArn = (vaultName: string) => `arn:aws:glacier:ca-central-1:777777777777:vaults/${vaultName}`;

export const inventoryReport = (vaultName: string, archives: number): TAWSInventoryReport => ({
    VaultARN: vaultArn(vaultName),
    InventoryDate: '2024-03-01T08:00:00Z',
    ArchiveList: Array.from({ length: archives }, (_, i) => ({
        ArchiveId: `archive-${i + 1}`,
        ArchiveDescription: `backup-${i + 1}.tar`,
        CreationDate: `2023-0${(i % 9) + 1}-15T10:00:00Z`,
        Size: 1024 * (i + 1),
        SHA256TreeHash: `hash${i + 1}`
    }))
});

export const awsError = (code: string, statusCode: number, message = code) =>
    Object.assign(new Error(message), { code, statusCode });

export const runConfig = (overrides: Partial<TRunConfig> = {}): TRunConfig => ({
    vaultName: 'test-vault',
    accountId: '-',
    dryRun: false,
    pollSeconds: 300,
    source: { kind: 'remote' },
    logLevel: 'error',
    ...overrides
});

/*
In-memory vault: job statuses are served from a script, deletes are recorded in order.
*/
export class FakeVaultService implements IVaultService {
    public readonly calls: string[] = [];
    public readonly deleted: string[] = [];
    public readonly failOn = new Map<string, DeleteError | Error>();
    public action = 'InventoryRetrieval';

    constructor(
        private readonly inventory: TInventory,
        private readonly statuses: TJobStatusCode[] = ['Succeeded'],
        private readonly jobId = 'job-1') {
    }

    public static withArchives(vaultName: string, archives: number, statuses?: TJobStatusCode[]) {
        return new FakeVaultService(toInventory(inventoryReport(vaultName, archives)), statuses);
    }

    public async initiateInventoryJob(params: { vaultName: string; }): Promise<TJobHandle> {
        this.calls.push('initiateInventoryJob');
        return { jobId: this.jobId, vaultName: params.vaultName };
    }

    public async getJobStatus(job: TJobHandle): Promise<TJobStatus> {
        this.calls.push('getJobStatus');
        const statusCode = this.statuses.shift() || 'Failed';
        return {
            jobId: job.jobId,
            action: this.action,
            statusCode,
            statusMessage: statusCode === 'Failed' ? 'inventory unavailable' : undefined,
            completed: statusCode !== 'InProgress'
        };
    }

    public async fetchInventory(): Promise<TInventory> {
        this.calls.push('fetchInventory');
        return this.inventory;
    }

    public async deleteArchive(params: { vaultName: string; archiveId: string; }): Promise<void> {
        this.calls.push('deleteArchive');
        const failure = this.failOn.get(params.archiveId);
        if (failure)
            throw failure;
        this.deleted.push(params.archiveId);
    }
}

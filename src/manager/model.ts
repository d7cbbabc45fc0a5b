export type TAWSArchiveItem = {
    ArchiveId: string;
    ArchiveDescription?: string;
    CreationDate?: string;
    Size?: number;
    SHA256TreeHash?: string;
};

export type TAWSInventoryReport = {
    VaultARN?: string;
    InventoryDate?: string;
    ArchiveList: TAWSArchiveItem[];
};

export type TArchiveItem = {
    readonly archiveId: string;
    readonly archiveDescription?: string;
    readonly creationDate?: string;
    readonly size?: number;
    readonly sha256TreeHash?: string;
};

export type TInventory = {
    readonly vaultARN?: string;
    readonly vaultName?: string;
    readonly inventoryDate?: string;
    readonly archiveList: readonly TArchiveItem[];
};

export type TJobHandle = {
    jobId: string;
    vaultName: string;
    region?: string;
};

export type TJobStatusCode = 'InProgress' | 'Succeeded' | 'Failed';

export type TJobStatus = {
    jobId: string;
    action?: string;
    statusCode: TJobStatusCode;
    statusMessage?: string;
    completed: boolean;
};

/*
The remote side of a prune run. GlacierManager is the production implementation.
*/
export interface IVaultService {
    initiateInventoryJob(params: { vaultName: string; }): Promise<TJobHandle>;
    getJobStatus(job: TJobHandle): Promise<TJobStatus>;
    fetchInventory(job: TJobHandle): Promise<TInventory>;
    deleteArchive(params: { vaultName: string; archiveId: string; }): Promise<void>;
}

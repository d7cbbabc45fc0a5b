export enum PruneErrorCode {
    AWS_FAILURE = 'AWS_FAILURE',
    CONFIG = 'CONFIG',
    INVENTORY_LOAD = 'INVENTORY_LOAD',
    MALFORMED_INVENTORY = 'MALFORMED_INVENTORY',
    JOB_FAILED = 'JOB_FAILED',
    DELETE_FAILED = 'DELETE_FAILED'
}

export class PruneError extends Error {
    public readonly isPruneError = true;

    constructor(public readonly code: PruneErrorCode, public readonly msg: string, public readonly source?: unknown) {
        super(msg);
        this.name = new.target.name;
    }
}

export type TConfigIssue = {
    path: string;
    message: string;
};

export class ConfigError extends PruneError {
    constructor(msg: string, public readonly issues: TConfigIssue[] = []) {
        super(PruneErrorCode.CONFIG, msg);
    }
}

export class InventoryLoadError extends PruneError {
    constructor(public readonly path: string, msg: string, source?: unknown) {
        super(PruneErrorCode.INVENTORY_LOAD, msg, source);
    }
}

export class JobFailedError extends PruneError {
    constructor(public readonly jobId: string, public readonly status: string, msg: string) {
        super(PruneErrorCode.JOB_FAILED, msg);
    }
}

export class DeleteError extends PruneError {
    constructor(public readonly archiveId: string, public readonly fatal: boolean, msg: string, source?: unknown) {
        super(PruneErrorCode.DELETE_FAILED, msg, source);
    }
}

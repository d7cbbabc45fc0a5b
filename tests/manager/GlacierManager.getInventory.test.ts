import AWSMock from 'aws-sdk-mock';
import AWS from 'aws-sdk';
import { Readable } from 'stream';
import { GlacierManager } from '../../src/manager/GlacierManager';
import { GetJobOutputInput, GetJobOutputOutput } from 'aws-sdk/clients/glacier';
import { PruneError, PruneErrorCode } from '../../src/manager/errors';
import { inventoryReport, silentLogger, vaultArn } from '../helpers';

const vaultName = 'test-vault';
const job = { jobId: 'inventory-job', vaultName };

beforeEach(() => {
    AWSMock.setSDKInstance(AWS);
});

afterEach(() => {
    AWSMock.restore('Glacier');
});

const mockJobOutput = (body: GetJobOutputOutput['body']) => {
    const requests: GetJobOutputInput[] = [];
    AWSMock.mock('Glacier', 'getJobOutput', (params: GetJobOutputInput, callback: Function) => {
        requests.push(params);
        const response: GetJobOutputOutput = { body };
        callback(null, response);
    });
    return requests;
};

const createManager = () =>
    new GlacierManager({ accountId: 'test', logger: silentLogger }, new AWS.Glacier({ region: 'ca-central-1' }));

describe('GlacierManager fetchInventory tests', () => {

    test('Success - string body, zero archives', async () => {
        const requests = mockJobOutput(JSON.stringify(inventoryReport(vaultName, 0)));

        const inventory = await createManager().fetchInventory(job);

        expect(requests).toEqual([{ accountId: 'test', vaultName, jobId: 'inventory-job' }]);
        expect(inventory.archiveList).toEqual([]);
        expect(inventory.vaultName).toBe(vaultName);
        expect(inventory.vaultARN).toBe(vaultArn(vaultName));
        expect(inventory.inventoryDate).toBe('2024-03-01T08:00:00Z');
    });

    test('Success - buffer body, some archives', async () => {
        mockJobOutput(Buffer.from(JSON.stringify(inventoryReport(vaultName, 2))));

        const inventory = await createManager().fetchInventory(job);

        expect(inventory.archiveList).toEqual([
            {
                archiveId: 'archive-1',
                archiveDescription: 'backup-1.tar',
                creationDate: '2023-01-15T10:00:00Z',
                size: 1024,
                sha256TreeHash: 'hash1'
            },
            {
                archiveId: 'archive-2',
                archiveDescription: 'backup-2.tar',
                creationDate: '2023-02-15T10:00:00Z',
                size: 2048,
                sha256TreeHash: 'hash2'
            }
        ]);
    });

    test('Success - streamed body', async () => {
        const serialized = JSON.stringify(inventoryReport(vaultName, 3));
        mockJobOutput(Readable.from([serialized.slice(0, 40), serialized.slice(40)].map(part => Buffer.from(part))));

        const inventory = await createManager().fetchInventory(job);

        expect(inventory.archiveList.map(({ archiveId }) => archiveId)).toEqual(['archive-1', 'archive-2', 'archive-3']);
    });

    test('Failure - output is not JSON', async () => {
        mockJobOutput('<html>nope</html>');

        await expect(createManager().fetchInventory(job)).rejects.toMatchObject({
            code: PruneErrorCode.MALFORMED_INVENTORY,
            msg: 'Inventory output of job inventory-job is malformed (not valid JSON)'
        });
    });

    test('Failure - archive without id', async () => {
        mockJobOutput(JSON.stringify({ VaultARN: vaultArn(vaultName), ArchiveList: [{ Size: 12 }] }));

        await expect(createManager().fetchInventory(job)).rejects.toMatchObject({
            code: PruneErrorCode.MALFORMED_INVENTORY,
            msg: 'Inventory output of job inventory-job is malformed (ArchiveList.0.ArchiveId: Required)'
        });
    });

    test('Failure - AWS error is wrapped', async () => {
        AWSMock.mock('Glacier', 'getJobOutput', (params: GetJobOutputInput, callback: Function) => {
            callback(Object.assign(new Error('job expired'), { code: 'ResourceNotFoundException', statusCode: 404 }));
        });

        const error: unknown = await createManager().fetchInventory(job).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(PruneError);
        expect(error).toMatchObject({ code: PruneErrorCode.AWS_FAILURE, msg: 'Failed to fetch inventory' });
    });
});

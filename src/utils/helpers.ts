import { Readable } from 'stream';
import { z, ZodError } from 'zod';
import { TArchiveItem, TAWSArchiveItem, TAWSInventoryReport, TInventory } from '../manager/model';

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

// AWS error codes after which no further call can be expected to succeed
const FATAL_AWS_CODES = new Set([
    'AccessDeniedException',
    'UnrecognizedClientException',
    'InvalidSignatureException',
    'SignatureDoesNotMatch',
    'ExpiredTokenException',
    'MissingAuthenticationTokenException',
    'CredentialsError',
    'NetworkingError',
    'TimeoutError',
    'UnknownEndpoint',
    'ConfigError'
]);

export function isFatalAwsError(err: unknown): boolean {
    if (typeof err !== 'object' || err === null)
        return true;

    const code: unknown = 'code' in err ? err.code : undefined;
    const statusCode: unknown = 'statusCode' in err ? err.statusCode : undefined;

    if (typeof code === 'string' && FATAL_AWS_CODES.has(code))
        return true;

    return statusCode === 401 || statusCode === 403;
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export function vaultNameFromArn(arn?: string): string | undefined {
    return arn?.split('/').pop() || undefined;
}

/*
Glacier returns the job output body as a string, a buffer or a stream depending on transport.
*/
export async function bodyToString(body: unknown): Promise<string> {
    if (typeof body === 'string')
        return body;

    if (body instanceof Uint8Array)
        return Buffer.from(body).toString('utf8');

    if (body instanceof Readable) {
        const chunks: Buffer[] = [];
        for await (const chunk of body) {
            chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
        }
        return Buffer.concat(chunks).toString('utf8');
    }

    throw new TypeError(`Unsupported job output body: ${typeof body}`);
}

const AWSArchiveItemSchema = z.object({
    ArchiveId: z.string().min(1),
    ArchiveDescription: z.string().optional(),
    CreationDate: z.string().optional(),
    Size: z.number().nonnegative().optional(),
    SHA256TreeHash: z.string().optional()
});

const AWSInventoryReportSchema = z.object({
    VaultARN: z.string().optional(),
    InventoryDate: z.string().optional(),
    ArchiveList: z.array(AWSArchiveItemSchema)
});

/*
Accepts a full inventory report or a bare list of archive records. Throws ZodError on mismatch.
*/
export function parseInventoryReport(value: unknown): TAWSInventoryReport {
    if (Array.isArray(value))
        return { ArchiveList: z.array(AWSArchiveItemSchema).parse(value) };

    return AWSInventoryReportSchema.parse(value);
}

export function describeZodError(err: ZodError): string {
    const [issue] = err.issues;
    if (!issue)
        return 'unknown issue';
    return issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

export function toInventory({ VaultARN, InventoryDate, ArchiveList }: TAWSInventoryReport): TInventory {
    return {
        vaultARN: VaultARN,
        vaultName: vaultNameFromArn(VaultARN),
        inventoryDate: InventoryDate,
        archiveList: ArchiveList.map(
            ({ ArchiveId, ArchiveDescription, CreationDate, Size, SHA256TreeHash }): TArchiveItem => ({
                archiveId: ArchiveId,
                archiveDescription: ArchiveDescription,
                creationDate: CreationDate,
                size: Size,
                sha256TreeHash: SHA256TreeHash
            })
        )
    };
}

export function toInventoryReport({ vaultARN, inventoryDate, archiveList }: TInventory): TAWSInventoryReport {
    return {
        VaultARN: vaultARN,
        InventoryDate: inventoryDate,
        ArchiveList: archiveList.map(
            ({ archiveId, archiveDescription, creationDate, size, sha256TreeHash }): TAWSArchiveItem => ({
                ArchiveId: archiveId,
                ArchiveDescription: archiveDescription,
                CreationDate: creationDate,
                Size: size,
                SHA256TreeHash: sha256TreeHash
            })
        )
    };
}

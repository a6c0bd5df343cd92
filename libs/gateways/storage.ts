import {
    CopyObjectCommand,
    CreateBucketCommand,
    DeleteObjectCommand,
    HeadBucketCommand,
    HeadObjectCommand,
    ListObjectsV2Command,
    PutObjectCommand,
    S3Client,
    S3ServiceException,
    type BucketLocationConstraint,
    type ListObjectsV2CommandOutput,
} from "@aws-sdk/client-s3";

export interface StorageGateway {
    bucketExists(bucket: string): Promise<boolean>;
    createBucket(bucket: string, region: string): Promise<void>;
    listObjects(bucket: string, prefix?: string): Promise<string[]>;
    objectExists(bucket: string, key: string): Promise<boolean>;
    copyObject(bucket: string, sourceKey: string, destinationKey: string): Promise<void>;
    deleteObject(bucket: string, key: string): Promise<void>;
    putObject(bucket: string, key: string, body: string | Uint8Array, contentType?: string): Promise<void>;
}

const NOT_FOUND_NAMES = new Set(["NotFound", "NoSuchKey", "NoSuchBucket"]);

export function isNotFound(err: unknown): boolean {
    if (!(err instanceof S3ServiceException)) return false;
    return NOT_FOUND_NAMES.has(err.name) || err.$metadata?.httpStatusCode === 404;
}

// shape check only: regions newer than the SDK's constraint list still pass
export function isRegionName(region: string): region is BucketLocationConstraint {
    return /^[a-z]{2}(-[a-z]+)+-\d+$/.test(region);
}

// CopySource is "<bucket>/<key>" with the key URL encoded segment by segment
export function copySource(bucket: string, key: string): string {
    return `${bucket}/${key.split("/").map(encodeURIComponent).join("/")}`;
}

export class S3StorageGateway implements StorageGateway {
    constructor(private readonly s3: S3Client) {}

    async bucketExists(bucket: string): Promise<boolean> {
        try {
            await this.s3.send(new HeadBucketCommand({ Bucket: bucket }));
            return true;
        } catch (err) {
            if (isNotFound(err)) return false;
            throw err;
        }
    }

    /** us-east-1 is the one region that rejects an explicit location constraint. */
    async createBucket(bucket: string, region: string): Promise<void> {
        if (region === "us-east-1") {
            await this.s3.send(new CreateBucketCommand({ Bucket: bucket }));
            return;
        }
        if (!isRegionName(region)) throw new Error(`Unsupported bucket region: ${region}`);
        await this.s3.send(new CreateBucketCommand({
            Bucket: bucket,
            CreateBucketConfiguration: { LocationConstraint: region },
        }));
    }

    async listObjects(bucket: string, prefix?: string): Promise<string[]> {
        let ContinuationToken: string | undefined = undefined;
        const keys: string[] = [];

        do {
            const out: ListObjectsV2CommandOutput = await this.s3.send(new ListObjectsV2Command({
                Bucket: bucket,
                Prefix: prefix || undefined,
                ContinuationToken,
            }));
            (out.Contents ?? []).forEach(o => {
                if (o.Key) keys.push(o.Key);
            });
            ContinuationToken = out.IsTruncated ? out.NextContinuationToken : undefined;
        } while (ContinuationToken);

        return keys;
    }

    async objectExists(bucket: string, key: string): Promise<boolean> {
        try {
            await this.s3.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
            return true;
        } catch (err) {
            if (isNotFound(err)) return false;
            throw err;
        }
    }

    async copyObject(bucket: string, sourceKey: string, destinationKey: string): Promise<void> {
        await this.s3.send(new CopyObjectCommand({
            Bucket: bucket,
            CopySource: copySource(bucket, sourceKey),
            Key: destinationKey,
        }));
    }

    async deleteObject(bucket: string, key: string): Promise<void> {
        await this.s3.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
    }

    async putObject(bucket: string, key: string, body: string | Uint8Array, contentType?: string): Promise<void> {
        await this.s3.send(new PutObjectCommand({
            Bucket: bucket,
            Key: key,
            Body: body,
            ContentType: contentType,
        }));
    }
}

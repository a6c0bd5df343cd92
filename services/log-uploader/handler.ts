import { readFile } from "fs/promises";
import type { StorageGateway } from "../../libs/gateways/storage";
import { errorMessage, type Logger } from "../../libs/obs/logger";

export type LogUploadDeps = { storage: StorageGateway; log: Logger };

/**
 * Mirrors the whole local log file to `key`, replacing the previous copy.
 * Never throws: a failure is written to the local log and reported as false.
 */
export async function uploadLogToS3(deps: LogUploadDeps, bucket: string, key: string, localLogFile: string): Promise<boolean> {
    const { storage, log } = deps;
    try {
        const body = await readFile(localLogFile);
        await storage.putObject(bucket, key, body, "text/plain; charset=utf-8");
        log.info(`Uploaded log file ${localLogFile} to s3://${bucket}/${key}.`);
        return true;
    } catch (err) {
        log.error(`Failed to upload the log file to S3: ${errorMessage(err)}`);
        return false;
    }
}

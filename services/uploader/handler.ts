import type { StorageGateway } from "../../libs/gateways/storage";
import type { Metrics } from "../../libs/obs/metrics";
import { errorMessage, type Logger } from "../../libs/obs/logger";
import { listCsvFiles, readCsvFile } from "../../libs/adapters/csv/local-dir";
import { destinationKey, extractIdentifier } from "../../libs/keys/object-keys";

export type UploadDeps = { storage: StorageGateway; log: Logger; metrics: Metrics };

export type UploadOptions = {
    bucket: string;
    csvLocalDirectory: string;
    prefixDir: string;
    identifierSeparator: string;
};

export type UploadResult = {
    uploaded: string[];
    skipped: string[];
    failures: Array<{ file: string; error: string }>;
};

// fs errors are checked by code, not class: they may come from another realm
export function isMissingDirectory(err: unknown): boolean {
    return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/**
 * Uploads local CSV files to the bucket root. A file is skipped when it is
 * already at the root or already filed under its identifier folder.
 */
export async function uploadLocalCsvFiles(deps: UploadDeps, opts: UploadOptions): Promise<UploadResult> {
    const { storage, log, metrics } = deps;
    const result: UploadResult = { uploaded: [], skipped: [], failures: [] };

    let names: string[];
    try {
        names = await listCsvFiles(opts.csvLocalDirectory);
    } catch (err) {
        if (!isMissingDirectory(err)) throw err;
        log.warn(`Local CSV directory ${opts.csvLocalDirectory} does not exist, nothing to upload.`);
        return result;
    }

    for (const name of names) {
        try {
            const identifier = extractIdentifier(name, opts.identifierSeparator);
            const filed = identifier ? destinationKey(opts.prefixDir, identifier, name) : undefined;
            if (await storage.objectExists(opts.bucket, name) || (filed && await storage.objectExists(opts.bucket, filed))) {
                log.info(`${name} already exists in S3, skipping upload.`);
                result.skipped.push(name);
                continue;
            }

            const file = await readCsvFile(opts.csvLocalDirectory, name);
            await storage.putObject(opts.bucket, name, file.body, "text/csv");
            log.info(`Uploaded ${name} (${file.rows} rows) to S3 bucket ${opts.bucket} with key ${name}.`);
            result.uploaded.push(name);
        } catch (err) {
            const error = errorMessage(err);
            log.error(`Failed to upload ${name}: ${error}`);
            result.failures.push({ file: name, error });
        }
    }

    await metrics.metricCount("files_uploaded_count", result.uploaded.length, { service: "uploader" });
    if (result.failures.length) {
        await metrics.metricCount("upload_error_count", result.failures.length, { service: "uploader" });
    }
    return result;
}

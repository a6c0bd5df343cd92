import type { Settings } from "../libs/config/settings";
import type { StorageGateway } from "../libs/gateways/storage";
import type { NotificationGateway } from "../libs/gateways/notification";
import type { Metrics } from "../libs/obs/metrics";
import { errorMessage } from "../libs/obs/logger";
import { RunLog } from "../libs/obs/run-log";
import { checkCreateBucket, ensureTopic, subscribeEmailToTopic } from "../services/bootstrap/handler";
import { uploadLocalCsvFiles, type UploadResult } from "../services/uploader/handler";
import { moveAndCleanObjects, type ReorganizeResult } from "../services/reorganizer/handler";
import { notifyMovedIdentifiers, type NotifyResult } from "../services/notifier/handler";
import { uploadLogToS3 } from "../services/log-uploader/handler";

export type RunContext = {
    settings: Settings;
    storage: StorageGateway;
    sns: NotificationGateway;
    metrics: Metrics;
};

export type RunSummary = {
    topicArn: string;
    upload: UploadResult;
    reorganize: ReorganizeResult;
    notify: NotifyResult;
    logUploaded: boolean;
};

/**
 * One full run: bootstrap, upload local CSVs, reorganize, notify, then mirror
 * the log. The log is uploaded and closed on every exit path; anything that
 * escapes a step is logged and rethrown for the scheduler.
 */
export async function runOnce(ctx: RunContext): Promise<RunSummary> {
    const { settings: s, storage, sns, metrics } = ctx;
    const t0 = Date.now();
    const log = await RunLog.open(s.localLogFile);

    try {
        log.info(`Run started for bucket ${s.bucketName}.`);

        await checkCreateBucket(storage, log, s.bucketName, s.region);
        const topicArn = await ensureTopic(sns, log, s.topicName);
        await subscribeEmailToTopic(sns, log, topicArn, s.subscriberEmail);

        const upload = await uploadLocalCsvFiles({ storage, log, metrics }, {
            bucket: s.bucketName,
            csvLocalDirectory: s.csvLocalDirectory,
            prefixDir: s.prefixDir,
            identifierSeparator: s.identifierSeparator,
        });
        const reorganize = await moveAndCleanObjects({ storage, log, metrics }, {
            bucket: s.bucketName,
            prefixDir: s.prefixDir,
            identifierSeparator: s.identifierSeparator,
        });
        const notify = await notifyMovedIdentifiers({ sns, log, metrics }, topicArn, reorganize.moved);

        log.info(
            `Run finished: ${upload.uploaded.length} uploaded, ${reorganize.moved.size} identifier(s) moved, ` +
            `${notify.published.length} notified, ` +
            `${upload.failures.length + reorganize.failures.length + notify.failures.length} failure(s).`,
        );

        await log.flush();
        const logUploaded = await uploadLogToS3({ storage, log }, s.bucketName, s.logS3Key, s.localLogFile);
        return { topicArn, upload, reorganize, notify, logUploaded };
    } catch (err) {
        log.error(`Run failed: ${errorMessage(err)}`);
        await metrics.metricCount("run_error_count", 1, { service: "run" });
        await log.flush();
        await uploadLogToS3({ storage, log }, s.bucketName, s.logS3Key, s.localLogFile);
        throw err;
    } finally {
        await metrics.metricMs("run_time_ms", Date.now() - t0, { service: "run" });
        await log.close();
    }
}

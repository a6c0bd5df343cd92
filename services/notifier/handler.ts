import type { NotificationGateway } from "../../libs/gateways/notification";
import type { Metrics } from "../../libs/obs/metrics";
import { errorMessage, type Logger } from "../../libs/obs/logger";
import type { MovedFiles } from "../reorganizer/handler";

export type NotifyDeps = { sns: NotificationGateway; log: Logger; metrics: Metrics };

export type NotifyResult = {
    published: string[];
    failures: Array<{ identifier: string; error: string }>;
};

// SNS subjects are printable ASCII and shorter than 100 characters
const MAX_SUBJECT = 99;

export function buildNotification(identifier: string, files: string[]): { subject: string; message: string } {
    const subject = `Files moved for ${identifier}`.replace(/[^\x20-\x7E]/g, "?").slice(0, MAX_SUBJECT);
    return { subject, message: `Files moved for ${identifier}: ${files.join(", ")}` };
}

/** One message per identifier; a failed publish does not stop the rest. */
export async function notifyMovedIdentifiers(deps: NotifyDeps, topicArn: string, moved: MovedFiles): Promise<NotifyResult> {
    const { sns, log, metrics } = deps;
    const result: NotifyResult = { published: [], failures: [] };

    for (const [identifier, files] of moved) {
        const { subject, message } = buildNotification(identifier, files);
        try {
            const messageId = await sns.publish(topicArn, subject, message);
            log.info(`SNS notification sent for ${identifier} (${messageId ?? "no message id"}): ${message}`);
            result.published.push(identifier);
        } catch (err) {
            const error = errorMessage(err);
            log.error(`Failed to notify ${identifier}: ${error}`);
            result.failures.push({ identifier, error });
        }
    }

    await metrics.metricCount("notifications_sent_count", result.published.length, { service: "notifier" });
    if (result.failures.length) {
        await metrics.metricCount("publish_error_count", result.failures.length, { service: "notifier" });
    }
    return result;
}

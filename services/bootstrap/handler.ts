import type { StorageGateway } from "../../libs/gateways/storage";
import type { NotificationGateway } from "../../libs/gateways/notification";
import type { Logger } from "../../libs/obs/logger";

export type SubscriptionStatus = "subscribed" | "pending" | "requested";

const PENDING = "PendingConfirmation";

/** Idempotent; safe on every run. */
export async function checkCreateBucket(
    storage: StorageGateway,
    log: Logger,
    bucket: string,
    region: string,
): Promise<"exists" | "created"> {
    if (await storage.bucketExists(bucket)) {
        log.info(`Bucket ${bucket} already exists.`);
        return "exists";
    }
    await storage.createBucket(bucket, region);
    log.info(`Bucket ${bucket} created in region ${region}.`);
    return "created";
}

/** Looks the topic up by name and creates it when missing. Returns the topic ARN. */
export async function ensureTopic(sns: NotificationGateway, log: Logger, topicName: string): Promise<string> {
    const existing = await sns.getTopicArn(topicName);
    if (existing) {
        log.info(`SNS topic already exists: ${existing}`);
        return existing;
    }
    const created = await sns.createTopic(topicName);
    log.info(`SNS topic created with ARN: ${created}`);
    return created;
}

/**
 * Subscribes the email to the topic unless an email subscription for the same
 * endpoint is already there, confirmed or not.
 */
export async function subscribeEmailToTopic(
    sns: NotificationGateway,
    log: Logger,
    topicArn: string,
    email: string,
): Promise<SubscriptionStatus> {
    const subs = await sns.listSubscriptions(topicArn);
    const existing = subs.find(s => s.protocol === "email" && s.endpoint.toLowerCase() === email.toLowerCase());
    if (existing) {
        if (existing.subscriptionArn.endsWith(PENDING)) {
            log.info(`Subscription for ${email} is still pending confirmation.`);
            return "pending";
        }
        log.info(`Email address ${email} is already subscribed.`);
        return "subscribed";
    }

    const arn = await sns.subscribe(topicArn, "email", email);
    log.info(`Subscription requested for ${email} (${arn}).`);
    return "requested";
}

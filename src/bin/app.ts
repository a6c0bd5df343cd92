#!/usr/bin/env node
import dotenv from "dotenv";
import { S3Client } from "@aws-sdk/client-s3";
import { SNSClient } from "@aws-sdk/client-sns";
import { CloudWatchClient } from "@aws-sdk/client-cloudwatch";
import { S3StorageGateway } from "../../libs/gateways/storage";
import { SnsNotificationGateway } from "../../libs/gateways/notification";
import { createMetrics } from "../../libs/obs/metrics";
import { runOnce } from "../run";
import { Scheduler } from "../scheduler";
import { loadSettingsOrExit } from "../startup";

dotenv.config();

process.on("unhandledRejection", (reason) => {
    console.error("UNHANDLED REJECTION:", reason);
});

const settings = loadSettingsOrExit();

// ── Gateways
const storage = new S3StorageGateway(new S3Client({ region: settings.region }));
const sns = new SnsNotificationGateway(new SNSClient({ region: settings.region }));
const metrics = createMetrics(settings.metricsNamespace, new CloudWatchClient({ region: settings.region }));

// ── Schedule
const scheduler = new Scheduler({
    schedule: settings.schedule,
    run: () => runOnce({ settings, storage, sns, metrics }),
});
scheduler.start();

for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
        console.log("shutdown", signal);
        scheduler.stop();
        void scheduler.idle().then(() => process.exit(0));
    });
}

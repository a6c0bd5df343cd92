import { z } from "zod";
import cron from "node-cron";

export const DEFAULT_SCHEDULE = "0 */4 * * *"; // every 4 hours
export const DEFAULT_REGION = "us-east-1";

const EnvSchema = z.object({
    BUCKET_NAME: z.string().min(3).max(63).regex(/^[a-z0-9][a-z0-9.-]+[a-z0-9]$/, "must be a valid S3 bucket name"),
    TOPIC_NAME: z.string().max(256).regex(/^[A-Za-z0-9_-]+$/, "must contain only letters, digits, '-' and '_'"),
    SUBSCRIBER_EMAIL: z.string().email(),
    AWS_REGION: z.string().min(1).optional(),
    AWS_DEFAULT_REGION: z.string().min(1).optional(),
    CSV_LOCAL_DIRECTORY: z.string().min(1).default("./csv-local"),
    S3_PREFIX_DIR: z.string().min(1)
        .refine(p => !p.includes(".."), "cannot contain '..'")
        .refine(p => p.replace(/^\/+|\/+$/g, "") !== "", "must name a folder")
        .default("sales/"),
    LOCAL_LOG_FILE: z.string().min(1).default("local_application_logs.log"),
    // a root-level key would be picked up and filed as a report
    LOG_S3_KEY: z.string().min(1)
        .refine(k => !k.startsWith("/") && !k.endsWith("/") && k.includes("/"), "must be inside a folder, e.g. sales/application_logs.log")
        .optional(),
    IDENTIFIER_SEPARATOR: z.string().length(1).refine(s => s !== "/", "cannot be '/'").default("_"),
    RUN_SCHEDULE: z.string().refine(s => cron.validate(s), "must be a valid cron expression").default(DEFAULT_SCHEDULE),
    METRICS_NS: z.string().min(1).optional(),
});

export interface Settings {
    bucketName: string;
    region: string;
    csvLocalDirectory: string;
    /** Always slash terminated, never slash prefixed, e.g. `sales/`. */
    prefixDir: string;
    localLogFile: string;
    logS3Key: string;
    topicName: string;
    subscriberEmail: string;
    identifierSeparator: string;
    schedule: string;
    metricsNamespace?: string;
}

export class SettingsError extends Error {
    constructor(public readonly variables: string[], messages: string[]) {
        super(`Invalid settings: ${messages.join("; ")}`);
        this.name = "SettingsError";
    }
}

export function normalizePrefix(prefix: string): string {
    return prefix.replace(/^\/+|\/+$/g, "") + "/";
}

/**
 * Builds the settings from environment variables. Blank values count as unset so
 * that an empty line in a .env file falls back to the default.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, v]) => typeof v === "string" && v.trim() !== ""),
    );
    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        const issues = parsed.error.issues;
        const variables = [...new Set(issues.map(i => String(i.path[0])))];
        throw new SettingsError(variables, issues.map(i => `${i.path.join(".")} ${i.message}`));
    }

    const e = parsed.data;
    const prefixDir = normalizePrefix(e.S3_PREFIX_DIR);
    return {
        bucketName: e.BUCKET_NAME,
        region: e.AWS_REGION ?? e.AWS_DEFAULT_REGION ?? DEFAULT_REGION,
        csvLocalDirectory: e.CSV_LOCAL_DIRECTORY,
        prefixDir,
        localLogFile: e.LOCAL_LOG_FILE,
        logS3Key: e.LOG_S3_KEY ?? `${prefixDir}application_logs.log`,
        topicName: e.TOPIC_NAME,
        subscriberEmail: e.SUBSCRIBER_EMAIL,
        identifierSeparator: e.IDENTIFIER_SEPARATOR,
        schedule: e.RUN_SCHEDULE,
        metricsNamespace: e.METRICS_NS,
    };
}

import { CloudWatchClient, PutMetricDataCommand, type StandardUnit } from "@aws-sdk/client-cloudwatch";

export interface Metrics {
    metricCount(name: string, value?: number, d?: Record<string, string>): Promise<void>;
    metricMs(name: string, ms: number, d?: Record<string, string>): Promise<void>;
}

function dims(d: Record<string, string> | undefined) {
    return Object.entries(d ?? {}).map(([Name, Value]) => ({ Name, Value }));
}

export const noMetrics: Metrics = {
    metricCount: async () => {},
    metricMs: async () => {},
};

/**
 * CloudWatch metrics, best effort. Without a namespace nothing is sent.
 */
export function createMetrics(namespace: string | undefined, cw?: CloudWatchClient): Metrics {
    if (!namespace) return noMetrics;
    const client = cw ?? new CloudWatchClient({});

    async function put(name: string, value: number, unit: StandardUnit, d?: Record<string, string>) {
        try {
            await client.send(new PutMetricDataCommand({
                Namespace: namespace,
                MetricData: [{ MetricName: name, Value: value, Unit: unit, Dimensions: dims(d) }],
            }));
        } catch (e) { console.warn("metric-failed", name, (e as Error).message); }
    }

    return {
        metricCount: (name, value = 1, d) => put(name, value, "Count", d),
        metricMs: (name, ms, d) => put(name, ms, "Milliseconds", d),
    };
}

import { CloudWatchClient, PutMetricDataCommand, type StandardUnit } from "@aws-sdk/client-cloudwatch";
import { errorMessage } from "./errors";

const cw = new CloudWatchClient({});
const NAMESPACE = process.env.METRICS_NS ?? "clinical.etl";

function dims(d: Record<string, string> | undefined) {
    return Object.entries(d ?? {}).map(([Name, Value]) => ({ Name, Value }));
}

async function put(name: string, value: number, unit: StandardUnit, d?: Record<string, string>) {
    try {
        await cw.send(new PutMetricDataCommand({
            Namespace: NAMESPACE,
            MetricData: [{ MetricName: name, Value: value, Unit: unit, Dimensions: dims(d) }],
        }));
    } catch (e) { console.warn("metric-failed", name, errorMessage(e)); }
}

export async function metricCount(name: string, value = 1, d?: Record<string, string>) {
    await put(name, value, "Count", d);
}

export async function metricMs(name: string, ms: number, d?: Record<string, string>) {
    await put(name, ms, "Milliseconds", d);
}

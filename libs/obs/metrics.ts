import { CloudWatchClient, PutMetricDataCommand, type StandardUnit } from "@aws-sdk/client-cloudwatch";

let cw: CloudWatchClient | undefined;

// Publishing is off unless METRICS_NS names a namespace.
function namespace() {
    return process.env.METRICS_NS || undefined;
}

function dims(d: Record<string, string> | undefined) {
    return Object.entries(d ?? {}).map(([Name, Value]) => ({ Name, Value }));
}

async function put(name: string, value: number, unit: StandardUnit, d?: Record<string, string>) {
    const Namespace = namespace();
    if (!Namespace) return;
    cw ??= new CloudWatchClient({});
    try {
        await cw.send(new PutMetricDataCommand({
            Namespace,
            MetricData: [{ MetricName: name, Value: value, Unit: unit, Dimensions: dims(d) }],
        }));
    } catch (e) { console.warn("metric-failed", name, e instanceof Error ? e.message : String(e)); }
}

export async function metricCount(name: string, value = 1, d?: Record<string, string>) {
    await put(name, value, "Count", d);
}

export async function metricMs(name: string, ms: number, d?: Record<string, string>) {
    await put(name, ms, "Milliseconds", d);
}

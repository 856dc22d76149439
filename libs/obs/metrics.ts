import {
    CloudWatchClient,
    PutMetricDataCommand,
    StandardUnit,
    type Dimension,
    type MetricDatum,
} from "@aws-sdk/client-cloudwatch";

const cw = new CloudWatchClient({});
const NAMESPACE = process.env.METRICS_NS ?? "report.sync";

export type MetricDimensions = Record<string, string | undefined>;

/** Unset values are dropped; CloudWatch rejects a dimension without a value. */
export function metricDimensions(d: MetricDimensions | undefined): Dimension[] {
    return Object.entries(d ?? {}).flatMap(([Name, Value]) => (Value ? [{ Name, Value }] : []));
}

/**
 * One datum per dimension set. CloudWatch does not aggregate across
 * dimensions, so a coarse set (alarms) and a detailed one (dashboards) are
 * both sent when asked for.
 */
export function metricData(
    name: string,
    value: number,
    unit: StandardUnit,
    d?: MetricDimensions | MetricDimensions[],
): MetricDatum[] {
    const sets = Array.isArray(d) ? d : [d];
    return sets.map(set => ({ MetricName: name, Value: value, Unit: unit, Dimensions: metricDimensions(set) }));
}

async function put(name: string, value: number, unit: StandardUnit, d?: MetricDimensions | MetricDimensions[]) {
    try {
        await cw.send(new PutMetricDataCommand({
            Namespace: NAMESPACE,
            MetricData: metricData(name, value, unit, d),
        }));
    } catch (e) { console.warn("metric-failed", name, e instanceof Error ? e.message : String(e)); }
}

export async function metricCount(name: string, value = 1, d?: MetricDimensions | MetricDimensions[]) {
    await put(name, value, StandardUnit.Count, d);
}

export async function metricMs(name: string, ms: number, d?: MetricDimensions | MetricDimensions[]) {
    await put(name, ms, StandardUnit.Milliseconds, d);
}

import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda";

import { BedrockIngestionJobClient } from "../../../libs/ingestion/bedrock-ingestion";
import { metricCount, metricMs, type MetricDimensions } from "../../../libs/obs/metrics";
import { ReportSyncError, errorMessage } from "../../../libs/reports/errors";
import type { ReportObjectEvent } from "../../../libs/reports/event";
import {
    responseStatus,
    responseText,
    syncReportObject,
    type ReportSyncDeps,
    type ReportSyncResult,
} from "../../../libs/reports/sync";
import { S3ReportStore } from "../../../libs/storage/s3-report-store";
import { loadReportSyncConfig } from "./config";

/** HTTP API invocation carrying the storage event, or the storage event itself. */
export type ReportSyncInvocation = Pick<APIGatewayProxyEventV2, "body" | "isBase64Encoded"> | ReportObjectEvent;

function createDeps(env: NodeJS.ProcessEnv): ReportSyncDeps {
    const config = loadReportSyncConfig(env);
    return {
        store: new S3ReportStore({
            region: config.objectStoreRegion,
            endpointTemplate: config.objectStoreEndpointTemplate,
            credentials: config.objectStoreCredentials,
        }),
        ingestion: new BedrockIngestionJobClient(),
        target: { compartmentId: config.compartmentId, dataSourceId: config.dataSourceId },
    };
}

function eventBody(event: unknown): unknown {
    if (typeof event !== "object" || event === null || !("body" in event)) return event;
    const body = event.body;
    const base64 = "isBase64Encoded" in event && event.isBase64Encoded === true;
    if (typeof body === "string" && base64) return Buffer.from(body, "base64").toString("utf8");
    return body;
}

const SERVICE = "report-sync";

function outcomeDimensions(result: ReportSyncResult): MetricDimensions {
    switch (result.outcome) {
        case "skipped":
            return { service: SERVICE, outcome: result.outcome };
        case "synced":
            return { service: SERVICE, outcome: result.outcome, reportType: result.reportType };
        case "failed":
            return { service: SERVICE, outcome: result.outcome, kind: result.kind };
    }
}

export type ReportSyncHandler = (event: ReportSyncInvocation) => Promise<APIGatewayProxyStructuredResultV2>;

/**
 * Builds the function entrypoint. Clients are created on the first call and
 * reused; a configuration failure is answered per call and retried next time.
 */
export function createReportSyncHandler(env: NodeJS.ProcessEnv = process.env): ReportSyncHandler {
    let deps: ReportSyncDeps | undefined;

    return async function main(event) {
        const t0 = Date.now();

        let result: ReportSyncResult;
        try {
            if (!deps) deps = createDeps(env);
            result = await syncReportObject(eventBody(event), deps);
        } catch (err) {
            const kind = err instanceof ReportSyncError ? err.kind : "configuration-invalid";
            result = { outcome: "failed", kind, message: errorMessage(err) };
        }

        // coarse set feeds the alarms, detailed set the dashboard
        const dims = [{ service: SERVICE }, outcomeDimensions(result)];
        switch (result.outcome) {
            case "skipped":
                console.log("report-sync skipped", JSON.stringify({ objectName: result.objectName }));
                await metricCount("report_skip_count", 1, dims);
                break;
            case "synced":
                console.log("report-sync triggered", JSON.stringify({
                    objectName: result.object.objectName,
                    bucket: result.object.bucket,
                    sidecar: result.sidecarName,
                    displayName: result.displayName,
                    ingestionJobId: result.ingestionJobId,
                }));
                await metricCount("report_sync_count", 1, dims);
                break;
            case "failed":
                console.error("report-sync error", JSON.stringify({
                    kind: result.kind,
                    objectName: result.objectName,
                    message: result.message,
                }));
                await metricCount("report_sync_error_count", 1, dims);
                break;
        }
        await metricMs("report_sync_latency_ms", Date.now() - t0, dims);

        return {
            statusCode: responseStatus(result),
            headers: { "content-type": "text/plain; charset=utf-8" },
            body: responseText(result),
        };
    };
}

export const main = createReportSyncHandler();

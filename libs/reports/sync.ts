import { ReportSyncError, errorMessage, type ReportSyncFailureKind } from "./errors";
import { parseReportObjectEvent, type ReportObjectRef } from "./event";
import { buildMetadataSidecar, serializeMetadataSidecar } from "./metadata";
import type { IngestionJobClient, IngestionTarget, ReportObjectStore } from "./ports";
import {
    classifyReportType,
    ingestionJobDisplayName,
    isReportObject,
    parseSnapshotId,
    sidecarObjectName,
    snapshotToken,
    type ReportType,
    type SnapshotId,
} from "./report-name";

export const SKIP_MESSAGE = "Skipping non-HTML file.";
export const SYNCED_MESSAGE = "Metadata created & Sync triggered.";

export type ReportSyncDeps = {
    store: ReportObjectStore;
    ingestion: IngestionJobClient;
    target: IngestionTarget;
};

export type ReportSyncResult =
    | { outcome: "skipped"; objectName: string }
    | {
        outcome: "synced";
        object: ReportObjectRef;
        reportType: ReportType;
        snapshotId: SnapshotId;
        sidecarName: string;
        displayName: string;
        ingestionJobId?: string;
    }
    | { outcome: "failed"; kind: ReportSyncFailureKind; message: string; objectName?: string };

/**
 * Handles one storage event: tags the report with a metadata sidecar and
 * starts a knowledge-base ingestion job for it. Never rejects; every failure
 * comes back as a `failed` result.
 *
 * The sidecar write is not undone when the job submission fails afterwards.
 */
export async function syncReportObject(rawEvent: unknown, deps: ReportSyncDeps): Promise<ReportSyncResult> {
    let objectName: string | undefined;
    try {
        const object = parseReportObjectEvent(rawEvent);
        objectName = object.objectName;

        if (!isReportObject(object.objectName)) {
            return { outcome: "skipped", objectName: object.objectName };
        }

        const reportType = classifyReportType(object.objectName);
        const snapshotId = parseSnapshotId(object.objectName);
        const body = serializeMetadataSidecar(buildMetadataSidecar(snapshotId, reportType));
        const sidecarName = sidecarObjectName(object.objectName);

        await step("storage-write-failed", () => deps.store.putObject({
            namespace: object.namespace,
            bucket: object.bucket,
            objectName: sidecarName,
            body,
            contentType: "application/json",
        }));

        const displayName = ingestionJobDisplayName(reportType, snapshotToken(object.objectName));
        const receipt = await step("job-submission-failed", () => deps.ingestion.createIngestionJob({
            compartmentId: deps.target.compartmentId,
            dataSourceId: deps.target.dataSourceId,
            displayName,
        }));

        return {
            outcome: "synced",
            object,
            reportType,
            snapshotId,
            sidecarName,
            displayName,
            ingestionJobId: receipt.jobId,
        };
    } catch (err) {
        const kind = err instanceof ReportSyncError ? err.kind : "classification-failed";
        return { outcome: "failed", kind, message: errorMessage(err), objectName };
    }
}

async function step<T>(kind: ReportSyncFailureKind, run: () => Promise<T>): Promise<T> {
    try {
        return await run();
    } catch (err) {
        if (err instanceof ReportSyncError) throw err;
        throw new ReportSyncError(kind, errorMessage(err), { cause: err });
    }
}

export function responseText(result: ReportSyncResult): string {
    switch (result.outcome) {
        case "skipped":
            return SKIP_MESSAGE;
        case "synced":
            return SYNCED_MESSAGE;
        case "failed":
            return `Error: ${result.message}`;
    }
}

const FAILURE_STATUS: Record<ReportSyncFailureKind, number> = {
    "configuration-invalid": 500,
    "payload-malformed": 400,
    "classification-failed": 422,
    "storage-write-failed": 502,
    "job-submission-failed": 502,
};

export function responseStatus(result: ReportSyncResult): number {
    return result.outcome === "failed" ? FAILURE_STATUS[result.kind] : 200;
}

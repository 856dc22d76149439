import { ReportSyncError } from "./errors";

export const REPORT_TYPES = ["AWR", "ADDM", "ASH"] as const;
export type ReportType = (typeof REPORT_TYPES)[number];

export const DEFAULT_REPORT_TYPE: ReportType = "AWR";

const REPORT_EXTENSION = ".html";

// Checked in this order; the first hit wins (a name carrying both ADDM and ASH is ADDM).
const REPORT_TYPE_MARKERS: ReadonlyArray<Exclude<ReportType, "AWR">> = ["ADDM", "ASH"];

export function isReportObject(objectName: string): boolean {
    return objectName.endsWith(REPORT_EXTENSION);
}

export function classifyReportType(objectName: string): ReportType {
    const upper = objectName.toUpperCase();
    return REPORT_TYPE_MARKERS.find(marker => upper.includes(marker)) ?? DEFAULT_REPORT_TYPE;
}

/**
 * Snapshot token of a report name: the last `_` segment with `.html` removed.
 * `ADDM_PROD_500.html` -> `500`.
 */
export function snapshotToken(objectName: string): string {
    const segments = objectName.split("_");
    return segments[segments.length - 1].split(REPORT_EXTENSION).join("");
}

/** Safe integers stay numbers; larger ids are kept exact as bigint. */
export type SnapshotId = number | bigint;

export function parseSnapshotId(objectName: string): SnapshotId {
    const token = snapshotToken(objectName);
    if (!/^\s*[+-]?\d+\s*$/.test(token)) {
        throw new ReportSyncError(
            "classification-failed",
            `invalid snapshot id "${token}" in object name "${objectName}"`,
        );
    }
    const snapshotId = BigInt(token.trim());
    const asNumber = Number(snapshotId);
    return Number.isSafeInteger(asNumber) ? asNumber : snapshotId;
}

export function sidecarObjectName(objectName: string): string {
    return `${objectName}.json`;
}

export function ingestionJobDisplayName(reportType: ReportType, token: string): string {
    return `AutoSync_${reportType}_${token}`;
}

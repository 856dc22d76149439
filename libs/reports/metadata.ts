import { validate } from "../contracts/src/validate";
import type { ReportType, SnapshotId } from "./report-name";

export type MetadataAttribute =
    | { name: "snapshot_id"; type: "integer"; value: SnapshotId }
    | { name: "report_type"; type: "string"; value: ReportType };

export type ReportMetadataSidecar = {
    metadataAttributes: [
        Extract<MetadataAttribute, { name: "snapshot_id" }>,
        Extract<MetadataAttribute, { name: "report_type" }>,
    ];
};

export function buildMetadataSidecar(snapshotId: SnapshotId, reportType: ReportType): ReportMetadataSidecar {
    return {
        metadataAttributes: [
            { name: "snapshot_id", type: "integer", value: snapshotId },
            { name: "report_type", type: "string", value: reportType },
        ],
    };
}

/**
 * JSON body of the sidecar. A bigint snapshot id is written as its digits so
 * the attribute stays a plain JSON integer of any size.
 */
export function serializeMetadataSidecar(sidecar: ReportMetadataSidecar): string {
    const [snapshot, reportType] = sidecar.metadataAttributes;
    const snapshotValue = typeof snapshot.value === "bigint" ? snapshot.value.toString() : JSON.stringify(snapshot.value);
    const body =
        `{"metadataAttributes":[` +
        `{"name":${JSON.stringify(snapshot.name)},"type":${JSON.stringify(snapshot.type)},"value":${snapshotValue}},` +
        `${JSON.stringify(reportType)}]}`;
    validate<ReportMetadataSidecar>("report.metadata.v1", JSON.parse(body));
    return body;
}

export const REPORT_SYNC_FAILURE_KINDS = [
    "configuration-invalid",
    "payload-malformed",
    "classification-failed",
    "storage-write-failed",
    "job-submission-failed",
] as const;

export type ReportSyncFailureKind = (typeof REPORT_SYNC_FAILURE_KINDS)[number];

export class ReportSyncError extends Error {
    constructor(
        readonly kind: ReportSyncFailureKind,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = "ReportSyncError";
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === "string") return err;
    try {
        return JSON.stringify(err) ?? String(err);
    } catch {
        return String(err);
    }
}

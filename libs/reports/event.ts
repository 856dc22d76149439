import { z } from "zod";
import { ReportSyncError, errorMessage } from "./errors";

export const ReportObjectEventSchema = z.object({
    data: z.object({
        resourceName: z.string().min(1),
        additionalDetails: z.object({
            bucketName: z.string().min(1),
            namespace: z.string().min(1),
        }),
    }),
});

export type ReportObjectEvent = z.infer<typeof ReportObjectEventSchema>;

export type ReportObjectRef = {
    objectName: string;
    bucket: string;
    namespace: string;
};

export function parseReportObjectEvent(raw: unknown): ReportObjectRef {
    let body: unknown = raw;
    if (typeof raw === "string") {
        try {
            body = JSON.parse(raw);
        } catch (err) {
            throw new ReportSyncError("payload-malformed", `event body is not valid JSON: ${errorMessage(err)}`, { cause: err });
        }
    }

    const parsed = ReportObjectEventSchema.safeParse(body);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
        throw new ReportSyncError("payload-malformed", `invalid storage event: ${issues}`);
    }

    const { resourceName, additionalDetails } = parsed.data.data;
    return {
        objectName: resourceName,
        bucket: additionalDetails.bucketName,
        namespace: additionalDetails.namespace,
    };
}

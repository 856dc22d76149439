import { z } from "zod";
import { ReportSyncError } from "../../../libs/reports/errors";

const nonEmpty = (name: string) => z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

export const ReportSyncConfigSchema = z.object({
    COMPARTMENT_ID: nonEmpty("COMPARTMENT_ID"),
    DATA_SOURCE_ID: nonEmpty("DATA_SOURCE_ID"),
    OBJECT_STORE_REGION: nonEmpty("OBJECT_STORE_REGION"),
    OBJECT_STORE_ACCESS_KEY_ID: nonEmpty("OBJECT_STORE_ACCESS_KEY_ID"),
    OBJECT_STORE_SECRET_ACCESS_KEY: nonEmpty("OBJECT_STORE_SECRET_ACCESS_KEY"),
    OBJECT_STORE_ENDPOINT_TEMPLATE: z.string().trim().optional().transform(v => (v ? v : undefined)),
});

export type ReportSyncConfig = {
    compartmentId: string;
    dataSourceId: string;
    objectStoreRegion: string;
    objectStoreEndpointTemplate?: string;
    objectStoreCredentials: { accessKeyId: string; secretAccessKey: string };
};

export function loadReportSyncConfig(env: NodeJS.ProcessEnv = process.env): ReportSyncConfig {
    const parsed = ReportSyncConfigSchema.safeParse(env);
    if (!parsed.success) {
        const messages = parsed.error.issues.map(i => i.message).join("; ");
        throw new ReportSyncError("configuration-invalid", `invalid configuration: ${messages}`);
    }
    return {
        compartmentId: parsed.data.COMPARTMENT_ID,
        dataSourceId: parsed.data.DATA_SOURCE_ID,
        objectStoreRegion: parsed.data.OBJECT_STORE_REGION,
        objectStoreEndpointTemplate: parsed.data.OBJECT_STORE_ENDPOINT_TEMPLATE,
        objectStoreCredentials: {
            accessKeyId: parsed.data.OBJECT_STORE_ACCESS_KEY_ID,
            secretAccessKey: parsed.data.OBJECT_STORE_SECRET_ACCESS_KEY,
        },
    };
}

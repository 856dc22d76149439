export type PutObjectInput = {
    namespace: string;
    bucket: string;
    objectName: string;
    body: string;
    contentType: string;
};

export interface ReportObjectStore {
    putObject(input: PutObjectInput): Promise<void>;
}

export type IngestionJobRequest = {
    compartmentId: string;
    dataSourceId: string;
    displayName: string;
};

export type IngestionJobReceipt = {
    jobId?: string;
    status?: string;
};

export interface IngestionJobClient {
    createIngestionJob(request: IngestionJobRequest): Promise<IngestionJobReceipt>;
}

export type IngestionTarget = Pick<IngestionJobRequest, "compartmentId" | "dataSourceId">;

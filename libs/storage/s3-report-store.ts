import { S3Client, PutObjectCommand, type S3ClientConfig } from "@aws-sdk/client-s3";
import type { PutObjectInput, ReportObjectStore } from "../reports/ports";

export const DEFAULT_ENDPOINT_TEMPLATE = "https://{namespace}.compat.objectstorage.{region}.oraclecloud.com";

export type S3ReportStoreOptions = {
    region: string;
    /** `{namespace}` and `{region}` are substituted per request namespace. */
    endpointTemplate?: string;
    /** Customer secret key pair; the compatibility endpoint does not accept the function's own role. */
    credentials: { accessKeyId: string; secretAccessKey: string };
};

export function resolveEndpoint(template: string, namespace: string, region: string): string {
    return template
        .split("{namespace}").join(encodeURIComponent(namespace))
        .split("{region}").join(encodeURIComponent(region));
}

export function s3ClientConfig(opts: S3ReportStoreOptions, namespace: string): S3ClientConfig {
    return {
        region: opts.region,
        endpoint: resolveEndpoint(opts.endpointTemplate ?? DEFAULT_ENDPOINT_TEMPLATE, namespace, opts.region),
        forcePathStyle: true,
        credentials: {
            accessKeyId: opts.credentials.accessKeyId,
            secretAccessKey: opts.credentials.secretAccessKey,
        },
    };
}

/**
 * Object store reached through the S3-compatible API. The namespace selects
 * the endpoint, so one client is kept per namespace.
 */
export class S3ReportStore implements ReportObjectStore {
    private readonly clients = new Map<string, S3Client>();

    constructor(private readonly opts: S3ReportStoreOptions) {}

    async putObject(input: PutObjectInput): Promise<void> {
        await this.clientFor(input.namespace).send(new PutObjectCommand({
            Bucket: input.bucket,
            Key: input.objectName,
            Body: input.body,
            ContentType: input.contentType,
        }));
    }

    private clientFor(namespace: string): S3Client {
        let client = this.clients.get(namespace);
        if (!client) {
            client = new S3Client(s3ClientConfig(this.opts, namespace));
            this.clients.set(namespace, client);
        }
        return client;
    }
}

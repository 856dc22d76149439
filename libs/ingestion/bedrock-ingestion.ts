import { BedrockAgentClient, StartIngestionJobCommand } from "@aws-sdk/client-bedrock-agent";
import type { IngestionJobClient, IngestionJobReceipt, IngestionJobRequest } from "../reports/ports";

export class BedrockIngestionJobClient implements IngestionJobClient {
    constructor(private readonly client: BedrockAgentClient = new BedrockAgentClient({})) {}

    async createIngestionJob(request: IngestionJobRequest): Promise<IngestionJobReceipt> {
        const out = await this.client.send(new StartIngestionJobCommand({
            // the compartment is the knowledge base that owns the data source
            knowledgeBaseId: request.compartmentId,
            dataSourceId: request.dataSourceId,
            description: request.displayName,
        }));
        return {
            jobId: out.ingestionJob?.ingestionJobId,
            status: out.ingestionJob?.status,
        };
    }
}

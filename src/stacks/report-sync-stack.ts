import { Duration, Stack, StackProps, CfnOutput, Tags } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as apigwv2 from "aws-cdk-lib/aws-apigatewayv2";
import * as apigwv2Integrations from "aws-cdk-lib/aws-apigatewayv2-integrations";
import * as iam from "aws-cdk-lib/aws-iam";
import { NodejsFunction } from "aws-cdk-lib/aws-lambda-nodejs";
import * as lambda from "aws-cdk-lib/aws-lambda";
import * as secretsmanager from "aws-cdk-lib/aws-secretsmanager";
import * as path from "path";

export interface ReportSyncStackProps extends StackProps {
  compartmentId: string;
  dataSourceId: string;
  objectStoreRegion: string;
  objectStoreEndpointTemplate?: string;
  /** Secrets Manager secret holding `{ "accessKeyId": ..., "secretAccessKey": ... }` (customer secret key). */
  objectStoreCredentialsSecretName: string;
  metricsNamespace?: string; // default "report.sync"
}

export class ReportSyncStack extends Stack {
  public readonly fn: NodejsFunction;
  constructor(scope: Construct, id: string, props: ReportSyncStackProps) {
    super(scope, id, props);

    const NS = props.metricsNamespace ?? "report.sync";
    const objectStoreKeys = secretsmanager.Secret.fromSecretNameV2(
      this, "ObjectStoreKeys", props.objectStoreCredentialsSecretName,
    );
    const entry = path.resolve(__dirname, "../../services/report-sync/src/handler.ts");

    this.fn = new NodejsFunction(this, "ReportSyncFn", {
      entry,
      handler: "main",
      runtime: lambda.Runtime.NODEJS_20_X,
      memorySize: 256,
      timeout: Duration.seconds(30),
      environment: {
        COMPARTMENT_ID: props.compartmentId,
        DATA_SOURCE_ID: props.dataSourceId,
        OBJECT_STORE_REGION: props.objectStoreRegion,
        // dynamic references; CloudFormation resolves the values at deploy time
        OBJECT_STORE_ACCESS_KEY_ID: objectStoreKeys.secretValueFromJson("accessKeyId").unsafeUnwrap(),
        OBJECT_STORE_SECRET_ACCESS_KEY: objectStoreKeys.secretValueFromJson("secretAccessKey").unsafeUnwrap(),
        METRICS_NS: NS,
        ...(props.objectStoreEndpointTemplate
          ? { OBJECT_STORE_ENDPOINT_TEMPLATE: props.objectStoreEndpointTemplate }
          : {}),
      },
      bundling: {
        target: "node20",
        sourceMap: true,
        keepNames: true,
      },
    });

    this.fn.addToRolePolicy(new iam.PolicyStatement({
      actions: ["cloudwatch:PutMetricData"],
      resources: ["*"],
      conditions: { "StringEquals": { "cloudwatch:namespace": NS } },
    }));

    this.fn.addToRolePolicy(new iam.PolicyStatement({
      actions: ["bedrock:StartIngestionJob"],
      resources: [
        Stack.of(this).formatArn({
          service: "bedrock",
          resource: "knowledge-base",
          resourceName: props.compartmentId,
        }),
      ],
    }));

    const api = new apigwv2.HttpApi(this, "ReportSyncApi", { apiName: "report-sync-api" });
    api.addRoutes({
      path: "/report-events",
      methods: [apigwv2.HttpMethod.POST],
      integration: new apigwv2Integrations.HttpLambdaIntegration("ReportSyncIntegration", this.fn),
    });

    new CfnOutput(this, "ReportSyncApiUrl", { value: api.apiEndpoint });

    Tags.of(this).add("project", "dbreport-autosync");
    Tags.of(this).add("stack", "report-sync");
  }
}

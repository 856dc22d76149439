import { Stack, StackProps, Duration } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as cw from "aws-cdk-lib/aws-cloudwatch";
import * as lambda from "aws-cdk-lib/aws-lambda";

export interface AlarmsStackProps extends StackProps {
  reportSyncFn: lambda.IFunction;
  metricsNamespace?: string; // default "report.sync"
}

export class AlarmsStack extends Stack {
  constructor(scope: Construct, id: string, props: AlarmsStackProps) {
    super(scope, id, props);

    const NS = props.metricsNamespace ?? "report.sync";
    // the handler also sends each datum under this coarse set, outcome breakdowns sit beside it
    const dimensionsMap = { service: "report-sync" };
    const sum = (metricName: string) =>
      new cw.Metric({ namespace: NS, metricName, dimensionsMap, period: Duration.minutes(1), statistic: "Sum" });

    // ---- Lambda error alarm (handler should never throw, so any error is unexpected)
    new cw.Alarm(this, "ReportSync-Errors-Alarm", {
      metric: props.reportSyncFn.metricErrors({ period: Duration.minutes(1), statistic: "Sum" }),
      threshold: 0,
      evaluationPeriods: 1,
      comparisonOperator: cw.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cw.TreatMissingData.NOT_BREACHING,
      alarmDescription: "report-sync function errors",
    });

    // ---- Failed syncs (Error: responses)
    const failed = sum("report_sync_error_count");
    new cw.Alarm(this, "ReportSyncFailed-Alarm", {
      metric: failed,
      threshold: 0,
      evaluationPeriods: 5,
      comparisonOperator: cw.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cw.TreatMissingData.NOT_BREACHING,
      alarmDescription: "report-sync returned Error: responses",
    });

    // ---- Dashboard
    const dash = new cw.Dashboard(this, "Dashboard", { dashboardName: "ReportSync-Dashboard" });

    dash.addWidgets(
      new cw.GraphWidget({
        title: "Report Sync Outcomes", left: [
          sum("report_sync_count"),
          sum("report_skip_count"),
          failed,
        ], width: 12
      }),
      new cw.GraphWidget({
        title: "Report Sync Latency (p95)", left: [
          new cw.Metric({ namespace: NS, metricName: "report_sync_latency_ms", dimensionsMap, period: Duration.minutes(1), statistic: "p95" }),
          props.reportSyncFn.metricDuration({ statistic: "p95" }),
        ], width: 12
      }),
    );
  }
}

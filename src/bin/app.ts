import * as cdk from 'aws-cdk-lib';
import { ReportSyncStack } from '../stacks/report-sync-stack';
import { AlarmsStack } from '../stacks/alarms-stack';

const app = new cdk.App();

const env = {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION || 'us-east-1',
};

function requiredContext(key: string): string {
    const value: unknown = app.node.tryGetContext(key);
    if (typeof value !== 'string' || value.trim() === '') {
        throw new Error(`cdk context "${key}" is required`);
    }
    return value;
}

const endpointTemplate: unknown = app.node.tryGetContext('objectStoreEndpointTemplate');

// ── Report sync function + HTTP API
const reportSync = new ReportSyncStack(app, 'ReportSync-Handler', {
    env,
    compartmentId: requiredContext('compartmentId'),
    dataSourceId: requiredContext('dataSourceId'),
    objectStoreRegion: requiredContext('objectStoreRegion'),
    objectStoreCredentialsSecretName: requiredContext('objectStoreCredentialsSecret'),
    objectStoreEndpointTemplate: typeof endpointTemplate === 'string' ? endpointTemplate : undefined,
});

// ── Alarms
const alarms = new AlarmsStack(app, 'ReportSync-Alarms', {
    env,
    reportSyncFn: reportSync.fn,
});

alarms.addDependency(reportSync);

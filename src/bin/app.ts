import * as cdk from 'aws-cdk-lib';
import { ForwarderStack } from '../stacks/forwarder-stack';

const app = new cdk.App();

const env = {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION || 'eu-central-1',
};

const licenseKey: string | undefined = app.node.tryGetContext('licenseKey') ?? process.env.LICENSE_KEY;
const ingestRegion: string | undefined = app.node.tryGetContext('ingestRegion') ?? process.env.INGEST_REGION;
if (!licenseKey || !ingestRegion) {
    throw new Error('licenseKey and ingestRegion are required (cdk context or LICENSE_KEY / INGEST_REGION env)');
}

const logGroups: string = app.node.tryGetContext('logGroups') ?? '';
const logBucketName: string | undefined = app.node.tryGetContext('logBucket');

new ForwarderStack(app, 'LogForwarder', {
    env,
    licenseKey,
    ingestRegion,
    logGroupNames: logGroups.split(',').map(s => s.trim()).filter(Boolean),
    logBucketName,
});

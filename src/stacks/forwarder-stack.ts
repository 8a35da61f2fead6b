import { Duration, Stack, StackProps, CfnOutput, Tags } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as iam from "aws-cdk-lib/aws-iam";
import * as s3 from "aws-cdk-lib/aws-s3";
import * as s3n from "aws-cdk-lib/aws-s3-notifications";
import * as logs from "aws-cdk-lib/aws-logs";
import * as logsDestinations from "aws-cdk-lib/aws-logs-destinations";
import { NodejsFunction } from "aws-cdk-lib/aws-lambda-nodejs";
import * as lambda from "aws-cdk-lib/aws-lambda";
import * as path from "path";

export interface ForwarderStackProps extends StackProps {
  licenseKey: string;
  ingestRegion: string;           // "US" | "EU" | explicit URL
  logGroupNames?: string[];       // subscribed with an empty filter pattern
  logBucketName?: string;         // existing bucket, ObjectCreated notifications
  metricsNamespace?: string;      // default "log.forwarder"
}

export class ForwarderStack extends Stack {
  public readonly fn: NodejsFunction;
  constructor(scope: Construct, id: string, props: ForwarderStackProps) {
    super(scope, id, props);

    const ns = props.metricsNamespace ?? "log.forwarder";
    const entry = path.resolve(__dirname, "../../services/forwarder/handler.ts");

    this.fn = new NodejsFunction(this, "ForwarderFn", {
      entry,
      handler: "main",
      runtime: lambda.Runtime.NODEJS_20_X,
      memorySize: 256,
      // 3 attempts with 1s + 2s backoff per payload must fit comfortably
      timeout: Duration.minutes(1),
      environment: {
        LICENSE_KEY: props.licenseKey,
        INGEST_REGION: props.ingestRegion,
        METRICS_NS: ns,
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
      conditions: { "StringEquals": { "cloudwatch:namespace": ns } },
    }));

    for (const [i, name] of (props.logGroupNames ?? []).entries()) {
      const group = logs.LogGroup.fromLogGroupName(this, `SourceLogGroup${i}`, name);
      new logs.SubscriptionFilter(this, `Subscription${i}`, {
        logGroup: group,
        destination: new logsDestinations.LambdaDestination(this.fn),
        filterPattern: logs.FilterPattern.allEvents(),
      });
    }

    if (props.logBucketName) {
      const bucket = s3.Bucket.fromBucketName(this, "LogBucket", props.logBucketName);
      bucket.grantRead(this.fn);
      bucket.addEventNotification(s3.EventType.OBJECT_CREATED, new s3n.LambdaDestination(this.fn));
    }

    new CfnOutput(this, "ForwarderFnArn", { value: this.fn.functionArn });

    Tags.of(this).add("app", "log-forwarder");
    Tags.of(this).add("stack", "forwarder");
  }
}

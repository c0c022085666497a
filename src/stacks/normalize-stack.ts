import { Duration, Stack, StackProps, Tags } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as sqs from "aws-cdk-lib/aws-sqs";
import * as s3 from "aws-cdk-lib/aws-s3";
import * as lambda from "aws-cdk-lib/aws-lambda";
import { NodejsFunction } from "aws-cdk-lib/aws-lambda-nodejs";
import { SqsEventSource } from "aws-cdk-lib/aws-lambda-event-sources";
import * as iam from "aws-cdk-lib/aws-iam";
import * as path from "path";

export interface NormalizeStackProps extends StackProps {
  ingestQueue: sqs.IQueue;
  rawBucket: s3.IBucket;
  canonicalBucket: s3.IBucket;
  metricsNamespace: string;
  /** Country calling code applied to national phone numbers. */
  phoneCountryCode?: string;
  auditFn?: lambda.IFunction;
}

export class NormalizeStack extends Stack {
  public readonly fn: NodejsFunction;

  constructor(scope: Construct, id: string, props: NormalizeStackProps) {
    super(scope, id, props);

    Tags.of(this).add("app", "clinical-etl");
    Tags.of(this).add("stack", "normalize");

    this.fn = new NodejsFunction(this, "NormalizeFn", {
      entry: path.resolve(__dirname, "../../services/normalize/handler.ts"),
      handler: "main",
      runtime: lambda.Runtime.NODEJS_20_X,
      timeout: Duration.seconds(60),
      memorySize: 512,
      bundling: {
        target: "node20",
        sourceMap: true,
        keepNames: true,
      },
      environment: {
        CANONICAL_BUCKET: props.canonicalBucket.bucketName,
        PHONE_COUNTRY_CODE: props.phoneCountryCode ?? "260",
        METRICS_NS: props.metricsNamespace,
        ...(props.auditFn ? { AUDIT_FN_ARN: props.auditFn.functionArn } : {}),
      },
    });

    this.fn.addToRolePolicy(new iam.PolicyStatement({
      actions: ["cloudwatch:PutMetricData"],
      resources: ["*"],
      conditions: { StringEquals: { "cloudwatch:namespace": props.metricsNamespace } },
    }));

    // Partial batch failures go back to the queue and, after maxReceiveCount, to the DLQ
    this.fn.addEventSource(new SqsEventSource(props.ingestQueue, {
      batchSize: 10,
      maxBatchingWindow: Duration.seconds(5),
      reportBatchItemFailures: true,
    }));

    props.rawBucket.grantRead(this.fn);
    props.canonicalBucket.grantPut(this.fn);
    props.auditFn?.grantInvoke(this.fn);
  }
}

import { Duration, Stack, StackProps, CfnOutput, Tags } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as apigwv2 from "aws-cdk-lib/aws-apigatewayv2";
import * as apigwv2Integrations from "aws-cdk-lib/aws-apigatewayv2-integrations";
import * as iam from "aws-cdk-lib/aws-iam";
import * as s3 from "aws-cdk-lib/aws-s3";
import * as sqs from "aws-cdk-lib/aws-sqs";
import { NodejsFunction } from "aws-cdk-lib/aws-lambda-nodejs";
import * as lambda from "aws-cdk-lib/aws-lambda";
import * as path from "path";

export interface IngestStackProps extends StackProps {
  rawBucket: s3.IBucket;
  ingestQueue: sqs.IQueue;
  metricsNamespace: string;
  auditFn?: lambda.IFunction;
}

export class IngestStack extends Stack {
  public readonly fn: NodejsFunction;
  public readonly api: apigwv2.HttpApi;

  constructor(scope: Construct, id: string, props: IngestStackProps) {
    super(scope, id, props);

    Tags.of(this).add("app", "clinical-etl");
    Tags.of(this).add("stack", "ingest");

    this.fn = new NodejsFunction(this, "IngestFn", {
      entry: path.resolve(__dirname, "../../services/ingest/handler.ts"),
      handler: "main",
      runtime: lambda.Runtime.NODEJS_20_X,
      memorySize: 256,
      timeout: Duration.seconds(30),
      environment: {
        RAW_BUCKET: props.rawBucket.bucketName,
        INGEST_QUEUE_URL: props.ingestQueue.queueUrl,
        METRICS_NS: props.metricsNamespace,
        ...(props.auditFn ? { AUDIT_FN_ARN: props.auditFn.functionArn } : {}),
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
      conditions: { StringEquals: { "cloudwatch:namespace": props.metricsNamespace } },
    }));

    props.rawBucket.grantPut(this.fn);
    props.ingestQueue.grantSendMessages(this.fn);
    props.auditFn?.grantInvoke(this.fn);

    this.api = new apigwv2.HttpApi(this, "IngestApi", { apiName: "clinical-ingest-api" });
    this.api.addRoutes({
      path: "/ingest",
      methods: [apigwv2.HttpMethod.POST],
      integration: new apigwv2Integrations.HttpLambdaIntegration("IngestIntegration", this.fn),
    });

    new CfnOutput(this, "IngestApiUrl", { value: this.api.apiEndpoint });
  }
}

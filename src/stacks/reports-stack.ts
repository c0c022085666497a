import { Duration, Stack, StackProps, CfnOutput, Tags } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as apigwv2 from "aws-cdk-lib/aws-apigatewayv2";
import * as apigwv2Integrations from "aws-cdk-lib/aws-apigatewayv2-integrations";
import * as iam from "aws-cdk-lib/aws-iam";
import * as s3 from "aws-cdk-lib/aws-s3";
import * as lambda from "aws-cdk-lib/aws-lambda";
import { NodejsFunction } from "aws-cdk-lib/aws-lambda-nodejs";
import * as path from "path";

export interface ReportsStackProps extends StackProps {
  canonicalBucket: s3.IBucket;
  metricsNamespace: string;
  auditFn?: lambda.IFunction;
}

export class ReportsStack extends Stack {
  public readonly fn: NodejsFunction;

  constructor(scope: Construct, id: string, props: ReportsStackProps) {
    super(scope, id, props);

    Tags.of(this).add("app", "clinical-etl");
    Tags.of(this).add("stack", "reports");

    this.fn = new NodejsFunction(this, "ReportsFn", {
      entry: path.resolve(__dirname, "../../services/reports-api/src/handler.ts"),
      handler: "main",
      runtime: lambda.Runtime.NODEJS_20_X,
      memorySize: 256,
      timeout: Duration.seconds(15),
      environment: {
        CANONICAL_BUCKET: props.canonicalBucket.bucketName,
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

    props.canonicalBucket.grantRead(this.fn);
    props.auditFn?.grantInvoke(this.fn);

    const api = new apigwv2.HttpApi(this, "ReportsApi", { apiName: "clinical-reports-api" });
    api.addRoutes({
      path: "/reports",
      methods: [apigwv2.HttpMethod.GET],
      integration: new apigwv2Integrations.HttpLambdaIntegration("ReportsIntegration", this.fn),
    });

    new CfnOutput(this, "ReportsApiUrl", { value: api.apiEndpoint });
  }
}

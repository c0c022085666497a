import { Stack, StackProps, Duration, CfnOutput, Tags } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as lambda from "aws-cdk-lib/aws-lambda";
import * as s3 from "aws-cdk-lib/aws-s3";
import { NodejsFunction } from "aws-cdk-lib/aws-lambda-nodejs";
import * as path from "path";

export interface AuditStackProps extends StackProps {
  auditBucket: s3.IBucket; // provided by StorageStack
}

export class AuditStack extends Stack {
  public readonly auditFn: NodejsFunction;

  constructor(scope: Construct, id: string, props: AuditStackProps) {
    super(scope, id, props);

    Tags.of(this).add("app", "clinical-etl");
    Tags.of(this).add("stack", "audit");

    this.auditFn = new NodejsFunction(this, "AuditFn", {
      entry: path.resolve(__dirname, "../../services/audit/src/handler.ts"),
      handler: "handler",
      runtime: lambda.Runtime.NODEJS_20_X,
      memorySize: 128,
      timeout: Duration.seconds(10),
      environment: {
        AUDIT_BUCKET: props.auditBucket.bucketName,
      },
      bundling: {
        target: "node20",
        sourceMap: true,
        keepNames: true,
      },
    });

    props.auditBucket.grantPut(this.auditFn);

    new CfnOutput(this, "AuditFnArn", { value: this.auditFn.functionArn });
  }
}

import { Stack, StackProps, Duration, CfnOutput, Tags } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as sqs from "aws-cdk-lib/aws-sqs";
import * as iam from "aws-cdk-lib/aws-iam";

export class MessagingStack extends Stack {
  public readonly ingestQueue: sqs.Queue;
  public readonly ingestDlq: sqs.Queue;

  constructor(scope: Construct, id: string, props?: StackProps) {
    super(scope, id, props);

    Tags.of(this).add("app", "clinical-etl");
    Tags.of(this).add("stack", "messaging");

    this.ingestDlq = new sqs.Queue(this, "IngestDLQ", {
      queueName: "clinical-ingest-queue-dlq",
      retentionPeriod: Duration.days(14),
      visibilityTimeout: Duration.seconds(180),
      receiveMessageWaitTime: Duration.seconds(20),
    });

    // Visibility must exceed the normalize function timeout
    this.ingestQueue = new sqs.Queue(this, "IngestQueue", {
      queueName: "clinical-ingest-queue",
      visibilityTimeout: Duration.seconds(180),
      retentionPeriod: Duration.days(7),
      receiveMessageWaitTime: Duration.seconds(20),
      deadLetterQueue: { queue: this.ingestDlq, maxReceiveCount: 5 },
    });

    for (const q of [this.ingestQueue, this.ingestDlq]) {
      q.addToResourcePolicy(new iam.PolicyStatement({
        sid: "DenyInsecureTransport",
        effect: iam.Effect.DENY,
        principals: [new iam.AnyPrincipal()],
        actions: ["sqs:*"],
        resources: [q.queueArn],
        conditions: { Bool: { "aws:SecureTransport": "false" } },
      }));
    }

    new CfnOutput(this, "IngestQueueUrl", { value: this.ingestQueue.queueUrl });
    new CfnOutput(this, "IngestQueueArn", { value: this.ingestQueue.queueArn });
    new CfnOutput(this, "IngestDLQUrl", { value: this.ingestDlq.queueUrl });
  }
}

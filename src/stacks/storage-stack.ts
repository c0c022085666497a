import { Stack, StackProps, RemovalPolicy, CfnOutput, Duration, Tags } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as s3 from "aws-cdk-lib/aws-s3";
import * as kms from "aws-cdk-lib/aws-kms";

export class StorageStack extends Stack {
  public readonly rawLanding: s3.Bucket;
  public readonly canonicalBucket: s3.Bucket;
  public readonly auditBucket: s3.Bucket;
  public readonly storageKey: kms.Key;

  constructor(scope: Construct, id: string, props?: StackProps) {
    super(scope, id, props);

    this.storageKey = new kms.Key(this, "StorageKey", {
      alias: "alias/clinical-etl-storage-key",
      enableKeyRotation: true,
      removalPolicy: RemovalPolicy.DESTROY,
    });

    const bucketDefaults: s3.BucketProps = {
      versioned: true,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.KMS,
      encryptionKey: this.storageKey,
      enforceSSL: true,
      objectOwnership: s3.ObjectOwnership.BUCKET_OWNER_ENFORCED,
      removalPolicy: RemovalPolicy.DESTROY, // dev
      autoDeleteObjects: true,
    };

    // Uploaded encounter CSVs, as received
    this.rawLanding = new s3.Bucket(this, "RawLandingBucket", bucketDefaults);
    this.rawLanding.addLifecycleRule({
      abortIncompleteMultipartUploadAfter: Duration.days(7),
    });

    // clinical.canonical.v1 files written by the normalize stage
    this.canonicalBucket = new s3.Bucket(this, "CanonicalBucket", bucketDefaults);

    this.auditBucket = new s3.Bucket(this, "AuditBucket", {
      ...bucketDefaults,
      versioned: false,
      lifecycleRules: [{ expiration: Duration.days(365) }],
    });

    new CfnOutput(this, "RawLandingBucketName", { value: this.rawLanding.bucketName });
    new CfnOutput(this, "CanonicalBucketName", { value: this.canonicalBucket.bucketName });
    new CfnOutput(this, "AuditBucketName", { value: this.auditBucket.bucketName });
    new CfnOutput(this, "StorageKeyArn", { value: this.storageKey.keyArn });

    Tags.of(this).add("app", "clinical-etl");
    Tags.of(this).add("stack", "storage");
    Tags.of(this).add("env", this.node.tryGetContext("env") ?? "dev");
  }
}

import * as cdk from "aws-cdk-lib";
import { StorageStack } from "../stacks/storage-stack";
import { MessagingStack } from "../stacks/messaging-stack";
import { AuditStack } from "../stacks/audit-stack";
import { IngestStack } from "../stacks/ingest-stack";
import { NormalizeStack } from "../stacks/normalize-stack";
import { ReportsStack } from "../stacks/reports-stack";

const app = new cdk.App();

const env = {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION || "eu-central-1",
};

const metricsNamespace = String(app.node.tryGetContext("metricsNamespace") ?? "clinical.etl");
const phoneCountryCode = String(app.node.tryGetContext("phoneCountryCode") ?? "260");

// ── Foundations
const storage = new StorageStack(app, "ClinicalEtl-Storage", { env });
const messaging = new MessagingStack(app, "ClinicalEtl-Messaging", { env });

// ── Audit (shared function)
const audit = new AuditStack(app, "ClinicalEtl-Audit", {
    env,
    auditBucket: storage.auditBucket,
});

// ── ETL stages
const ingest = new IngestStack(app, "ClinicalEtl-Ingest", {
    env,
    rawBucket: storage.rawLanding,
    ingestQueue: messaging.ingestQueue,
    metricsNamespace,
    auditFn: audit.auditFn,
});

const normalize = new NormalizeStack(app, "ClinicalEtl-Normalize", {
    env,
    ingestQueue: messaging.ingestQueue,
    rawBucket: storage.rawLanding,
    canonicalBucket: storage.canonicalBucket,
    metricsNamespace,
    phoneCountryCode,
    auditFn: audit.auditFn,
});

// ── Reports API
const reports = new ReportsStack(app, "ClinicalEtl-Reports", {
    env,
    canonicalBucket: storage.canonicalBucket,
    metricsNamespace,
    auditFn: audit.auditFn,
});

audit.addDependency(storage);

ingest.addDependency(storage);
ingest.addDependency(messaging);

normalize.addDependency(storage);
normalize.addDependency(messaging);

reports.addDependency(storage);

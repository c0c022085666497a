import { randomUUID } from "crypto";
import { S3Client, GetObjectCommand, PutObjectCommand } from "@aws-sdk/client-s3";
import type { SQSBatchResponse, SQSEvent, SQSRecord } from "aws-lambda";

import { parseClinicalCsv } from "../../libs/adapters";
import { loadEnv, NormalizeEnvSchema } from "../../libs/config/env";
import type { ClinicalCanonicalV1, ClinicalIngestV1 } from "../../libs/contracts/src/types";
import { validate } from "../../libs/contracts/src/validate";
import { auditFireAndForget } from "../../libs/obs/audit";
import { metricCount, metricMs } from "../../libs/obs/metrics";
import { createPatternLibrary, type PatternLibrary } from "../../libs/patterns/library";
import { runPipeline } from "../../libs/pipeline";
import { assessRawQuality } from "../../libs/reports";

const s3 = new S3Client({});

// Built once per container; the library is frozen and shared by every message.
let patterns: PatternLibrary | undefined;

function patternsFor(countryCode: string): PatternLibrary {
  if (!patterns || patterns.countryCode !== countryCode) {
    patterns = createPatternLibrary({ countryCode });
  }
  return patterns;
}

async function getS3Text(bucket: string, key: string): Promise<string> {
  const out = await s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
  if (!out.Body) throw new Error(`Empty object s3://${bucket}/${key}`);
  return out.Body.transformToString("utf-8");
}

export function canonicalKey(msg: ClinicalIngestV1): string {
  const date = msg.metadata.ingestedAt.slice(0, 10);
  return `canonical/${msg.metadata.tenantId}/${date}/${msg.metadata.idempotencyKey}.json`;
}

async function processMessage(rec: SQSRecord, env: { bucket: string; patterns: PatternLibrary }) {
  const t0 = Date.now();
  const body: unknown = JSON.parse(rec.body);
  validate("clinical.ingest.v1", body);

  const { bucket, key } = body.payload.s3;
  const csv = await getS3Text(bucket, key);
  const batch = parseClinicalCsv(csv);

  const result = runPipeline(batch, { patterns: env.patterns });

  const file: ClinicalCanonicalV1 = {
    schema: "clinical.canonical.v1",
    metadata: {
      tenantId: body.metadata.tenantId,
      source: body.metadata.source,
      normalizedAt: new Date().toISOString(),
      idempotencyKey: body.metadata.idempotencyKey,
      traceId: randomUUID(),
      sourceKey: key,
    },
    stats: {
      rawQuality: assessRawQuality(batch),
      cleanQuality: result.quality,
      deduplication: result.deduplication,
    },
    records: [...result.dataset.values()],
  };
  validate("clinical.canonical.v1", file);

  const outKey = canonicalKey(body);
  await s3.send(new PutObjectCommand({
    Bucket: env.bucket,
    Key: outKey,
    Body: JSON.stringify(file),
    ContentType: "application/json",
  }));

  console.info("Normalized", {
    messageId: rec.messageId,
    tenantId: file.metadata.tenantId,
    rows: batch.length,
    records: file.records.length,
    duplicatesRemoved: result.deduplication.duplicatesRemoved,
    key: outKey,
  });

  const dims = { service: "normalize" };
  const q = result.quality;
  await metricCount("raw_rows_count", batch.length, dims);
  await metricCount("canonical_records_count", file.records.length, dims);
  await metricCount("duplicates_removed_count", result.deduplication.duplicatesRemoved, dims);
  await metricCount("invalid_phone_count", q.invalidPhones, dims);
  await metricCount("unknown_label_count", q.unknownGenders + q.unknownVitalTypes + q.unknownLabTests, dims);
  await metricMs("pipeline_time_ms", result.elapsedMs, dims);
  await metricMs("transform_time_ms", Date.now() - t0, dims);

  await auditFireAndForget({
    type: "clinical.canonical.v1",
    tenantId: file.metadata.tenantId,
    traceId: file.metadata.traceId,
    object: { bucket: env.bucket, key: outKey, records: file.records.length },
  });
}

export async function main(event: SQSEvent): Promise<SQSBatchResponse> {
  const t0Batch = Date.now();
  const failures: Array<{ itemIdentifier: string }> = [];

  const { CANONICAL_BUCKET, PHONE_COUNTRY_CODE } = loadEnv(NormalizeEnvSchema);
  const env = { bucket: CANONICAL_BUCKET, patterns: patternsFor(PHONE_COUNTRY_CODE) };

  await Promise.all(event.Records.map(async (rec: SQSRecord) => {
    try {
      await processMessage(rec, env);
    } catch (err) {
      await metricCount("normalize_error_count", 1, { service: "normalize" });
      console.error("Normalize error for messageId", rec.messageId, err);
      failures.push({ itemIdentifier: rec.messageId });
    }
  }));

  await metricMs("normalize_batch_time_ms", Date.now() - t0Batch, { service: "normalize" });
  return { batchItemFailures: failures };
}

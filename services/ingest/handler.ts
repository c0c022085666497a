import { randomUUID, createHash } from "crypto";
import { S3Client, PutObjectCommand } from "@aws-sdk/client-s3";
import { SQSClient, SendMessageCommand } from "@aws-sdk/client-sqs";
import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda";

import { IngestEnvSchema, loadEnv } from "../../libs/config/env";
import type { ClinicalIngestV1 } from "../../libs/contracts/src/types";
import { SchemaValidationError, validate } from "../../libs/contracts/src/validate";
import { auditFireAndForget } from "../../libs/obs/audit";
import { metricCount, metricMs } from "../../libs/obs/metrics";

const s3 = new S3Client({});
const sqs = new SQSClient({});

function json(statusCode: number, body: unknown): APIGatewayProxyStructuredResultV2 {
  return { statusCode, headers: { "content-type": "application/json" }, body: JSON.stringify(body) };
}

function readBody(event: APIGatewayProxyEventV2): string {
  if (!event.body) return "";
  return event.isBase64Encoded ? Buffer.from(event.body, "base64").toString("utf8") : event.body;
}

/** POST /ingest?tenantId=&source= with an encounter CSV as the request body. */
export async function main(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> {
  const t0 = Date.now();
  try {
    const { RAW_BUCKET, INGEST_QUEUE_URL } = loadEnv(IngestEnvSchema);

    const content = readBody(event);
    if (!content.trim()) {
      return json(400, { ok: false, error: "Empty CSV body" });
    }

    const id = randomUUID();
    const tenantId = event.queryStringParameters?.tenantId ?? "unknown";
    const source = event.queryStringParameters?.source ?? "upload";
    const ingestedAt = new Date().toISOString();
    const key = `raw/${tenantId}/${ingestedAt.slice(0, 10)}/${id}.csv`;
    const contentHash = createHash("sha256").update(content).digest("hex");

    // Tenant and idempotency key end up in S3 keys; reject them before anything is written
    const message: ClinicalIngestV1 = {
      schema: "clinical.ingest.v1",
      metadata: {
        tenantId,
        source,
        ingestedAt,
        idempotencyKey: event.headers?.["idempotency-key"] ?? id,
        contentHash,
      },
      payload: { contentType: "text/csv", s3: { bucket: RAW_BUCKET, key } },
    };
    validate("clinical.ingest.v1", message);

    await s3.send(new PutObjectCommand({
      Bucket: RAW_BUCKET,
      Key: key,
      Body: content,
      ContentType: "text/csv",
      Metadata: { contentHash },
    }));

    await sqs.send(new SendMessageCommand({
      QueueUrl: INGEST_QUEUE_URL,
      MessageBody: JSON.stringify(message),
      MessageAttributes: {
        schema: { DataType: "String", StringValue: "clinical.ingest.v1" },
        tenantId: { DataType: "String", StringValue: tenantId },
      },
    }));

    await auditFireAndForget({
      type: "clinical.ingest.v1",
      tenantId,
      traceId: id,
      s3: { bucket: RAW_BUCKET, key },
      contentHash,
    });

    await metricCount("ingest_count", 1, { service: "ingest" });
    await metricMs("ingest_latency_ms", Date.now() - t0, { service: "ingest" });

    return json(202, { ok: true, key, message });
  } catch (err) {
    if (err instanceof SchemaValidationError) {
      console.warn("Ingest rejected", err.message);
      return json(400, { ok: false, error: err.message });
    }
    await metricCount("ingest_error_count", 1, { service: "ingest" });
    console.error("Ingest error", err);
    return json(500, { ok: false, error: "Internal Error" });
  }
}

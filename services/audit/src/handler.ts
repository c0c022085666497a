import { S3Client, PutObjectCommand } from "@aws-sdk/client-s3";
import { randomUUID } from "crypto";
import { z } from "zod";
import { AuditEnvSchema, loadEnv } from "../../../libs/config/env";

const s3 = new S3Client({});

// event may be any of: clinical.ingest.v1, clinical.canonical.v1, reports.served
// Each field falls back on its own; one bad field does not discard the rest.
const AuditEventSchema = z.object({
    type: z.string().min(1).catch("unknown"),
    tenantId: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/).catch("unknown"),
    traceId: z.string().optional().catch(undefined),
}).passthrough();

export const handler = async (event: unknown) => {
    const { AUDIT_BUCKET } = loadEnv(AuditEnvSchema);
    const parsed = AuditEventSchema.safeParse(event ?? {});
    const head = parsed.success ? parsed.data : { type: "unknown", tenantId: "unknown", traceId: undefined };

    const now = new Date();
    const date = now.toISOString().slice(0, 10); // YYYY-MM-DD
    const hour = String(now.getUTCHours()).padStart(2, "0");
    const key = `tenantId=${head.tenantId}/date=${date}/hour=${hour}/${randomUUID()}.jsonl`;

    const line = JSON.stringify({
        at: now.toISOString(),
        type: head.type,
        tenantId: head.tenantId,
        traceId: head.traceId,
        payload: event,
    }) + "\n";

    await s3.send(new PutObjectCommand({ Bucket: AUDIT_BUCKET, Key: key, Body: line }));
    return { ok: true, key };
};

import { S3Client, GetObjectCommand } from "@aws-sdk/client-s3";
import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda";

import { loadEnv, ReportsEnvSchema } from "../../../libs/config/env";
import { SchemaValidationError, validate } from "../../../libs/contracts/src/validate";
import { errorMessage } from "../../../libs/obs/errors";
import { auditFireAndForget } from "../../../libs/obs/audit";
import { metricCount } from "../../../libs/obs/metrics";
import { admissionTrend, ageDistribution, genderDistribution, lengthOfStay } from "../../../libs/reports";
import { CalendarDateSchema } from "../../../libs/validation/dto";

const s3 = new S3Client({});

function json(statusCode: number, body: unknown): APIGatewayProxyStructuredResultV2 {
    return { statusCode, headers: { "content-type": "application/json" }, body: JSON.stringify(body) };
}

async function loadCanonical(bucket: string, key: string): Promise<unknown> {
    const out = await s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!out.Body) throw new Error(`Empty object s3://${bucket}/${key}`);
    return JSON.parse(await out.Body.transformToString("utf-8"));
}

function isMissingKey(err: unknown): boolean {
    return err instanceof Error && (err.name === "NoSuchKey" || err.name === "NotFound");
}

/** GET /reports?key=<canonical key>&asOf=YYYY-MM-DD */
export const main = async (event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> => {
    try {
        const { CANONICAL_BUCKET } = loadEnv(ReportsEnvSchema);

        const key = event.queryStringParameters?.key;
        if (!key || !key.startsWith("canonical/")) {
            return json(400, { ok: false, error: "Missing or invalid key" });
        }

        const asOf = event.queryStringParameters?.asOf ?? new Date().toISOString().slice(0, 10);
        if (!CalendarDateSchema.safeParse(asOf).success) {
            return json(400, { ok: false, error: "asOf must be YYYY-MM-DD" });
        }

        const file = await loadCanonical(CANONICAL_BUCKET, key);
        validate("clinical.canonical.v1", file);

        const records = file.records;

        await auditFireAndForget({ type: "reports.served", tenantId: file.metadata.tenantId, key });
        await metricCount("reports_served_count", 1, { service: "reports-api" });

        return json(200, {
            ok: true,
            key,
            recordCount: records.length,
            quality: file.stats,
            ageDistribution: ageDistribution(records, asOf),
            genderDistribution: genderDistribution(records),
            lengthOfStay: lengthOfStay(records),
            admissionTrend: admissionTrend(records),
        });
    } catch (err) {
        if (isMissingKey(err)) return json(404, { ok: false, error: "Not found" });
        if (err instanceof SchemaValidationError) {
            console.error("Canonical file failed validation", err.message);
            return json(422, { ok: false, error: "Canonical file is not clinical.canonical.v1" });
        }
        await metricCount("reports_error_count", 1, { service: "reports-api" });
        console.error("Reports error", errorMessage(err));
        return json(500, { ok: false, error: "Internal Error" });
    }
};

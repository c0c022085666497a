import type { CleanQuality, RawQuality } from "../../reports/quality";
import type { DeduplicationMetrics } from "../../pipeline/deduplicate";
import type { CleanRecord } from "../../validation/dto";

export interface ClinicalIngestV1 {
    schema: "clinical.ingest.v1";
    metadata: {
        tenantId: string;
        source: string;
        ingestedAt: string;
        idempotencyKey: string;
        contentHash: string;
    };
    payload: {
        contentType: string;
        s3: { bucket: string; key: string };
    };
}

export interface ClinicalCanonicalV1 {
    schema: "clinical.canonical.v1";
    metadata: {
        tenantId: string;
        source: string;
        normalizedAt: string;
        idempotencyKey: string;
        traceId: string;
        /** Raw landing key the records were read from. */
        sourceKey: string;
    };
    stats: {
        rawQuality: RawQuality;
        cleanQuality: CleanQuality;
        deduplication: DeduplicationMetrics;
    };
    records: CleanRecord[];
}

export interface ContractTypes {
    "clinical.ingest.v1": ClinicalIngestV1;
    "clinical.canonical.v1": ClinicalCanonicalV1;
}

export type ContractName = keyof ContractTypes;

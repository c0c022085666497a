import { DEFAULT_PATTERN_LIBRARY, type PatternLibrary } from "../patterns/library";
import { summarizeCleanQuality, type CleanQuality } from "../reports/quality";
import type { CanonicalDataset, CleanRecord, RawRecord } from "../validation/dto";
import { deduplicate, type DeduplicationMetrics, type DuplicateGroup } from "./deduplicate";
import { normalizeRecord } from "./normalize-record";

export interface PipelineOptions {
    patterns?: PatternLibrary;
}

export interface PipelineResult {
    dataset: CanonicalDataset;
    /** Normalized records in input order, before deduplication. */
    cleanRecords: CleanRecord[];
    duplicateGroups: DuplicateGroup[];
    deduplication: DeduplicationMetrics;
    quality: CleanQuality;
    elapsedMs: number;
}

/**
 * Normalizes every record, then collapses them to one per patient id.
 * Deduplication waits for the whole batch to be normalized.
 */
export function runPipeline(batch: readonly RawRecord[], opts: PipelineOptions = {}): PipelineResult {
    const t0 = Date.now();
    const patterns = opts.patterns ?? DEFAULT_PATTERN_LIBRARY;

    const cleanRecords = batch.map((raw) => normalizeRecord(raw, patterns));
    const { dataset, duplicateGroups, metrics } = deduplicate(cleanRecords);

    return {
        dataset,
        cleanRecords,
        duplicateGroups,
        deduplication: metrics,
        quality: summarizeCleanQuality(dataset.values()),
        elapsedMs: Date.now() - t0,
    };
}

export function normalizeAndDeduplicate(batch: readonly RawRecord[], opts: PipelineOptions = {}): CanonicalDataset {
    return runPipeline(batch, opts).dataset;
}

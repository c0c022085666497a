export { normalizeRecord, FIELD_RULES } from "./normalize-record";
export { deduplicate, type DeduplicationResult, type DeduplicationMetrics, type DuplicateGroup } from "./deduplicate";
export { runPipeline, normalizeAndDeduplicate, type PipelineOptions, type PipelineResult } from "./runner";

import { DEFAULT_PATTERN_LIBRARY, type PatternLibrary, type SynonymTable } from "../patterns/library";
import type { Gender, LabTest, VitalType } from "../validation/dto";
import type { RawValue } from "./text";

export const UNKNOWN_LABEL = "Unknown";

/** Shared lookup for every categorical field; anything unmatched is "Unknown". */
export function normalizeCategory<L extends string>(raw: RawValue, table: SynonymTable<L>): L | typeof UNKNOWN_LABEL {
    if (raw == null) return UNKNOWN_LABEL;
    return table.get(raw.trim().toLowerCase()) ?? UNKNOWN_LABEL;
}

export function normalizeGender(raw: RawValue, patterns: PatternLibrary = DEFAULT_PATTERN_LIBRARY): Gender {
    return normalizeCategory(raw, patterns.gender);
}

export function normalizeVitalType(raw: RawValue, patterns: PatternLibrary = DEFAULT_PATTERN_LIBRARY): VitalType {
    return normalizeCategory(raw, patterns.vitalType);
}

export function normalizeLabTest(raw: RawValue, patterns: PatternLibrary = DEFAULT_PATTERN_LIBRARY): LabTest {
    return normalizeCategory(raw, patterns.labTest);
}

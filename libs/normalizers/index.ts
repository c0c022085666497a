export { normalizePatientId } from "./patient-id";
export { normalizeName, UNKNOWN_NAME } from "./name";
export { normalizeCategory, normalizeGender, normalizeVitalType, normalizeLabTest, UNKNOWN_LABEL } from "./categorical";
export { normalizeDateOfBirth, normalizeTimestamp, matchCandidates } from "./datetime";
export { normalizePhone } from "./phone";
export { trimValue, digitsOnly, type RawValue } from "./text";

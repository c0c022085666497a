import { DEFAULT_PATTERN_LIBRARY, type PatternLibrary } from "../patterns/library";
import {
    normalizeDateOfBirth,
    normalizeGender,
    normalizeLabTest,
    normalizeName,
    normalizePatientId,
    normalizePhone,
    normalizeTimestamp,
    normalizeVitalType,
    trimValue,
} from "../normalizers";
import type { CleanRecord, RawRecord } from "../validation/dto";

type FieldRules = {
    readonly [K in keyof CleanRecord]: (raw: RawRecord, patterns: PatternLibrary) => CleanRecord[K];
};

// One rule per clean field, each reading a single raw field.
export const FIELD_RULES: FieldRules = {
    patientId: (r) => normalizePatientId(r.patient_id),
    fullName: (r) => normalizeName(r.full_name),
    gender: (r, p) => normalizeGender(r.gender, p),
    dateOfBirth: (r, p) => normalizeDateOfBirth(r.date_of_birth, p),
    admissionTime: (r, p) => normalizeTimestamp(r.admission_time, p),
    dischargeTime: (r, p) => normalizeTimestamp(r.discharge_time, p),
    phone: (r, p) => normalizePhone(r.phone, p),
    vitalType: (r, p) => normalizeVitalType(r.vital_type, p),
    vitalValue: (r) => trimValue(r.vital_value),
    labTest: (r, p) => normalizeLabTest(r.lab_test, p),
    labResult: (r) => trimValue(r.lab_result),
};

export function normalizeRecord(raw: RawRecord, patterns: PatternLibrary = DEFAULT_PATTERN_LIBRARY): CleanRecord {
    const rule = FIELD_RULES;
    return {
        patientId: rule.patientId(raw, patterns),
        fullName: rule.fullName(raw, patterns),
        gender: rule.gender(raw, patterns),
        dateOfBirth: rule.dateOfBirth(raw, patterns),
        admissionTime: rule.admissionTime(raw, patterns),
        dischargeTime: rule.dischargeTime(raw, patterns),
        phone: rule.phone(raw, patterns),
        vitalType: rule.vitalType(raw, patterns),
        vitalValue: rule.vitalValue(raw, patterns),
        labTest: rule.labTest(raw, patterns),
        labResult: rule.labResult(raw, patterns),
    };
}

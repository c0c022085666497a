import type { CleanRecord, RawRecord } from "../validation/dto";

// Spellings the source systems are expected to use; anything else is worth a look.
const EXPECTED_GENDER_SPELLINGS = new Set(["male", "female", "M", "F", "Male", "Female"]);

export interface RawQuality {
    totalRows: number;
    uniquePatients: number;
    missingNames: number;
    unusualGenders: number;
}

export interface CleanQuality {
    records: number;
    invalidPhones: number;
    unknownNames: number;
    unknownGenders: number;
    unknownVitalTypes: number;
    unknownLabTests: number;
    missingDatesOfBirth: number;
    missingAdmissions: number;
    missingDischarges: number;
}

/** Quality check over the batch as ingested, before any cleaning. */
export function assessRawQuality(batch: readonly RawRecord[]): RawQuality {
    const ids = new Set<string>();
    let missingNames = 0;
    let unusualGenders = 0;

    for (const row of batch) {
        if (row.patient_id != null) ids.add(row.patient_id);
        if (row.full_name == null || row.full_name === "") missingNames++;
        if (row.gender != null && !EXPECTED_GENDER_SPELLINGS.has(row.gender)) unusualGenders++;
    }

    return { totalRows: batch.length, uniquePatients: ids.size, missingNames, unusualGenders };
}

export function summarizeCleanQuality(records: Iterable<CleanRecord>): CleanQuality {
    const q: CleanQuality = {
        records: 0,
        invalidPhones: 0,
        unknownNames: 0,
        unknownGenders: 0,
        unknownVitalTypes: 0,
        unknownLabTests: 0,
        missingDatesOfBirth: 0,
        missingAdmissions: 0,
        missingDischarges: 0,
    };

    for (const r of records) {
        q.records++;
        if (r.phone.isInvalid) q.invalidPhones++;
        if (r.fullName === "Unknown") q.unknownNames++;
        if (r.gender === "Unknown") q.unknownGenders++;
        if (r.vitalType === "Unknown") q.unknownVitalTypes++;
        if (r.labTest === "Unknown") q.unknownLabTests++;
        if (r.dateOfBirth === null) q.missingDatesOfBirth++;
        if (r.admissionTime === null) q.missingAdmissions++;
        if (r.dischargeTime === null) q.missingDischarges++;
    }
    return q;
}

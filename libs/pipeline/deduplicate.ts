import type { CanonicalDataset, CleanRecord } from "../validation/dto";

export interface DuplicateGroup {
    patientId: string;
    /** Input positions; `kept` is the retained record. */
    kept: number;
    dropped: number[];
}

export interface DeduplicationMetrics {
    totalRecords: number;
    uniqueRecords: number;
    duplicatesRemoved: number;
    duplicateRate: number;
}

export interface DeduplicationResult {
    dataset: CanonicalDataset;
    duplicateGroups: DuplicateGroup[];
    metrics: DeduplicationMetrics;
}

/**
 * True when `candidate` should replace `current`: it has an admission time and
 * `current` has none or a later one. Equal times keep the earlier record.
 */
function admittedEarlier(candidate: CleanRecord, current: CleanRecord): boolean {
    if (candidate.admissionTime === null) return false;
    if (current.admissionTime === null) return true;
    // zone-less ISO timestamps order lexically
    return candidate.admissionTime < current.admissionTime;
}

export function deduplicate(records: readonly CleanRecord[]): DeduplicationResult {
    const groups = new Map<string, number[]>();
    records.forEach((record, index) => {
        const members = groups.get(record.patientId);
        if (members) members.push(index);
        else groups.set(record.patientId, [index]);
    });

    const dataset = new Map<string, CleanRecord>();
    const duplicateGroups: DuplicateGroup[] = [];

    for (const [patientId, members] of groups) {
        let kept = members[0];
        for (const index of members.slice(1)) {
            if (admittedEarlier(records[index], records[kept])) kept = index;
        }
        dataset.set(patientId, records[kept]);

        if (members.length > 1) {
            duplicateGroups.push({ patientId, kept, dropped: members.filter((i) => i !== kept) });
        }
    }

    const totalRecords = records.length;
    const duplicatesRemoved = totalRecords - dataset.size;

    return {
        dataset,
        duplicateGroups,
        metrics: {
            totalRecords,
            uniqueRecords: dataset.size,
            duplicatesRemoved,
            duplicateRate: totalRecords > 0 ? duplicatesRemoved / totalRecords : 0,
        },
    };
}

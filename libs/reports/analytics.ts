import type { CleanRecord, Gender } from "../validation/dto";

export interface AgeBucket {
    age: number;
    patients: number;
}

export interface StayLength {
    patientId: string;
    days: number | null;
}

export interface AdmissionDay {
    date: string | null;
    admissions: number;
}

const MINUTES_PER_DAY = 24 * 60;

function dateParts(isoDate: string): [number, number, number] {
    return [Number(isoDate.slice(0, 4)), Number(isoDate.slice(5, 7)), Number(isoDate.slice(8, 10))];
}

/** Minutes since the epoch for a zone-less timestamp, read as UTC. */
function toMinutes(timestamp: string): number {
    const [y, mo, d] = dateParts(timestamp);
    const h = Number(timestamp.slice(11, 13));
    const mi = Number(timestamp.slice(14, 16));
    return Date.UTC(y, mo - 1, d, h, mi) / 60_000;
}

function roundHalfAwayFromZero(n: number): number {
    const r = Math.round(Math.abs(n));
    return n < 0 && r !== 0 ? -r : r;
}

/** Completed years between `birth` and `asOf`, both `YYYY-MM-DD`. */
export function ageInYears(birth: string, asOf: string): number {
    const [by, bm, bd] = dateParts(birth);
    const [ay, am, ad] = dateParts(asOf);
    const beforeBirthday = am < bm || (am === bm && ad < bd);
    return ay - by - (beforeBirthday ? 1 : 0);
}

export function ageDistribution(records: Iterable<CleanRecord>, asOf: string): AgeBucket[] {
    const counts = new Map<number, number>();
    for (const r of records) {
        if (r.dateOfBirth === null) continue;
        const age = ageInYears(r.dateOfBirth, asOf);
        counts.set(age, (counts.get(age) ?? 0) + 1);
    }
    return [...counts.entries()]
        .sort(([a], [b]) => a - b)
        .map(([age, patients]) => ({ age, patients }));
}

export function genderDistribution(records: Iterable<CleanRecord>): Record<Gender, number> {
    const out: Record<Gender, number> = { M: 0, F: 0, Unknown: 0 };
    for (const r of records) out[r.gender]++;
    return out;
}

/**
 * Whole days in hospital for every discharged record. An admission-less record
 * keeps its row with `days: null`.
 */
export function lengthOfStay(records: Iterable<CleanRecord>): StayLength[] {
    const out: StayLength[] = [];
    for (const r of records) {
        if (r.dischargeTime === null) continue;
        const days = r.admissionTime === null
            ? null
            : roundHalfAwayFromZero((toMinutes(r.dischargeTime) - toMinutes(r.admissionTime)) / MINUTES_PER_DAY);
        out.push({ patientId: r.patientId, days });
    }
    return out;
}

/** Admissions per calendar day, ascending; records without admission come last. */
export function admissionTrend(records: Iterable<CleanRecord>): AdmissionDay[] {
    const counts = new Map<string | null, number>();
    for (const r of records) {
        const date = r.admissionTime === null ? null : r.admissionTime.slice(0, 10);
        counts.set(date, (counts.get(date) ?? 0) + 1);
    }

    const dated = [...counts.entries()]
        .filter((e): e is [string, number] => e[0] !== null)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([date, admissions]) => ({ date, admissions }));

    const undated = counts.get(null);
    return undated === undefined ? dated : [...dated, { date: null, admissions: undated }];
}

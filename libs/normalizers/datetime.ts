import { DEFAULT_PATTERN_LIBRARY, type DateCandidate, type PatternLibrary } from "../patterns/library";
import type { RawValue } from "./text";

interface CalendarParts {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
}

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

function daysInMonth(year: number, month: number): number {
    if (month === 2) {
        const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
        return leap ? 29 : 28;
    }
    return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function isRealDate(p: CalendarParts): boolean {
    return p.year >= 1
        && p.month >= 1 && p.month <= 12
        && p.day >= 1 && p.day <= daysInMonth(p.year, p.month)
        && p.hour >= 0 && p.hour <= 23
        && p.minute >= 0 && p.minute <= 59;
}

/**
 * First candidate whose shape matches decides the reading. A shape match that
 * does not denote a real calendar date/time yields undefined; later candidates
 * are not tried.
 */
export function matchCandidates(raw: RawValue, candidates: readonly DateCandidate[]): CalendarParts | undefined {
    if (raw == null) return undefined;
    const text = raw.trim();

    for (const candidate of candidates) {
        const m = candidate.shape.exec(text);
        if (!m) continue;

        const group = (index: number | undefined) => (index === undefined ? 0 : Number(m[index]));
        const parts: CalendarParts = {
            year: group(candidate.parts.year),
            month: group(candidate.parts.month),
            day: group(candidate.parts.day),
            hour: group(candidate.parts.hour),
            minute: group(candidate.parts.minute),
        };
        return isRealDate(parts) ? parts : undefined;
    }
    return undefined;
}

const formatDate = (p: CalendarParts) => `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}`;

/** Date of birth as `YYYY-MM-DD`, or null when no format applies. */
export function normalizeDateOfBirth(raw: RawValue, patterns: PatternLibrary = DEFAULT_PATTERN_LIBRARY): string | null {
    const parts = matchCandidates(raw, patterns.dateOfBirth);
    return parts ? formatDate(parts) : null;
}

/** Admission/discharge time as zone-less `YYYY-MM-DDTHH:MM:SS`, or null. */
export function normalizeTimestamp(raw: RawValue, patterns: PatternLibrary = DEFAULT_PATTERN_LIBRARY): string | null {
    const parts = matchCandidates(raw, patterns.timestamp);
    return parts ? `${formatDate(parts)}T${pad(parts.hour)}:${pad(parts.minute)}:00` : null;
}

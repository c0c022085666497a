import type { Gender, LabTest, VitalType } from "../validation/dto";

/** Capture-group positions of each calendar part inside a shape regex. */
export interface DateParts {
    readonly year: number;
    readonly month: number;
    readonly day: number;
    readonly hour?: number;
    readonly minute?: number;
}

export interface DateCandidate {
    readonly format: string;
    readonly shape: RegExp;
    readonly parts: DateParts;
}

export interface PhoneRule {
    readonly name: "national" | "international" | "subscriber";
    readonly shape: RegExp;
    /** Leading digits removed before the prefix is applied. */
    readonly drop: number;
    readonly prefix: string;
}

export type SynonymTable<L extends string> = ReadonlyMap<string, L>;

export interface PatternLibrary {
    readonly countryCode: string;
    readonly dateOfBirth: readonly DateCandidate[];
    readonly timestamp: readonly DateCandidate[];
    readonly phone: readonly PhoneRule[];
    readonly gender: SynonymTable<Exclude<Gender, "Unknown">>;
    readonly vitalType: SynonymTable<Exclude<VitalType, "Unknown">>;
    readonly labTest: SynonymTable<Exclude<LabTest, "Unknown">>;
}

export interface PatternLibraryOptions {
    countryCode?: string;
}

// Slash dates are day-first, hyphen dates month-first. Both conventions occur in
// the feeds and must stay distinct.
const DATE_OF_BIRTH: readonly DateCandidate[] = [
    { format: "YYYY-MM-DD", shape: /^(\d{4})-(\d{2})-(\d{2})$/, parts: { year: 1, month: 2, day: 3 } },
    { format: "DD/MM/YYYY", shape: /^(\d{2})\/(\d{2})\/(\d{4})$/, parts: { day: 1, month: 2, year: 3 } },
    { format: "MM-DD-YYYY", shape: /^(\d{2})-(\d{2})-(\d{4})$/, parts: { month: 1, day: 2, year: 3 } },
];

const TIMESTAMP: readonly DateCandidate[] = [
    {
        format: "YYYY-MM-DD HH:MM",
        shape: /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/,
        parts: { year: 1, month: 2, day: 3, hour: 4, minute: 5 },
    },
    {
        format: "DD/MM/YYYY HH:MM",
        shape: /^(\d{2})\/(\d{2})\/(\d{4}) (\d{2}):(\d{2})$/,
        parts: { day: 1, month: 2, year: 3, hour: 4, minute: 5 },
    },
];

/** Read-only view over a lookup map; exposes no mutators at run time. */
class FrozenTable<L extends string> implements ReadonlyMap<string, L> {
    readonly #entries: Map<string, L>;

    constructor(entries: Map<string, L>) {
        this.#entries = entries;
        Object.freeze(this);
    }

    get size(): number {
        return this.#entries.size;
    }

    get(key: string): L | undefined {
        return this.#entries.get(key);
    }

    has(key: string): boolean {
        return this.#entries.has(key);
    }

    forEach(callback: (value: L, key: string, map: ReadonlyMap<string, L>) => void): void {
        this.#entries.forEach((value, key) => callback(value, key, this));
    }

    entries() {
        return this.#entries.entries();
    }

    keys() {
        return this.#entries.keys();
    }

    values() {
        return this.#entries.values();
    }

    [Symbol.iterator]() {
        return this.#entries[Symbol.iterator]();
    }
}

/**
 * Builds a lookup from lower-cased synonyms to canonical labels. Each label is
 * also registered under its own lower-cased form so canonical values map to
 * themselves.
 */
export function synonymTable<L extends string>(entries: ReadonlyArray<readonly [L, readonly string[]]>): SynonymTable<L> {
    const table = new Map<string, L>();
    for (const [label, synonyms] of entries) {
        table.set(label.toLowerCase(), label);
        for (const synonym of synonyms) table.set(synonym.toLowerCase(), label);
    }
    return new FrozenTable(table);
}

function freezeCandidates(candidates: readonly DateCandidate[]): readonly DateCandidate[] {
    return Object.freeze(candidates.map((c) => Object.freeze({
        format: c.format,
        shape: new RegExp(c.shape),
        parts: Object.freeze({ ...c.parts }),
    })));
}

function phoneRules(countryCode: string): readonly PhoneRule[] {
    const rules: PhoneRule[] = [
        { name: "national", shape: /^0\d{9}$/, drop: 1, prefix: `+${countryCode}` },
        { name: "international", shape: new RegExp(`^${countryCode}\\d{9}$`), drop: 0, prefix: "+" },
        { name: "subscriber", shape: /^\d{9}$/, drop: 0, prefix: `+${countryCode}` },
    ];
    return Object.freeze(rules.map((r) => Object.freeze(r)));
}

export function createPatternLibrary(opts: PatternLibraryOptions = {}): PatternLibrary {
    const countryCode = opts.countryCode ?? "260";
    if (!/^\d{1,3}$/.test(countryCode)) {
        throw new Error(`Invalid country calling code: ${countryCode}`);
    }

    return Object.freeze({
        countryCode,
        dateOfBirth: freezeCandidates(DATE_OF_BIRTH),
        timestamp: freezeCandidates(TIMESTAMP),
        phone: phoneRules(countryCode),
        gender: synonymTable([
            ["M", ["m", "male"]],
            ["F", ["f", "female"]],
        ]),
        vitalType: synonymTable([
            ["Temperature", ["temperature", "temp"]],
            ["Heart Rate", ["hr", "heart rate"]],
            ["Blood Pressure", ["bp"]],
        ]),
        labTest: synonymTable([
            ["WBC", ["wbc"]],
            ["Hgb", ["hb", "hgb"]],
            ["Creatinine", ["creatinine"]],
        ]),
    });
}

export const DEFAULT_PATTERN_LIBRARY = createPatternLibrary();

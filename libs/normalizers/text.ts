export type RawValue = string | null | undefined;

export function digitsOnly(raw: RawValue): string {
    return (raw ?? "").replace(/[^0-9]/g, "");
}

/** Free-text fields (vital value, lab result) are trimmed and otherwise kept as-is. */
export function trimValue(raw: RawValue): string | null {
    return raw == null ? null : raw.trim();
}

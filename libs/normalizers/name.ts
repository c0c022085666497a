import type { RawValue } from "./text";

export const UNKNOWN_NAME = "Unknown";

function titleCase(token: string): string {
    return token.charAt(0).toUpperCase() + token.slice(1).toLowerCase();
}

export function normalizeName(raw: RawValue): string {
    const trimmed = (raw ?? "").trim();
    if (!trimmed) return UNKNOWN_NAME;
    return trimmed.replace(/\S+/g, titleCase);
}

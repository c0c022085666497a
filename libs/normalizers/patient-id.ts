import { digitsOnly, type RawValue } from "./text";

const ID_WIDTH = 4;

/**
 * Canonical patient id: `P-` followed by exactly four digits.
 * Shorter digit runs are zero-padded on the left; longer ones keep their last
 * four digits. Input without any digits becomes `P-0000`.
 */
export function normalizePatientId(raw: RawValue): string {
    const digits = digitsOnly(raw);
    const fitted = digits.length > ID_WIDTH ? digits.slice(-ID_WIDTH) : digits.padStart(ID_WIDTH, "0");
    return `P-${fitted}`;
}

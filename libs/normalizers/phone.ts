import { DEFAULT_PATTERN_LIBRARY, type PatternLibrary } from "../patterns/library";
import type { Phone } from "../validation/dto";
import { digitsOnly, type RawValue } from "./text";

/**
 * Classifies the digits of a phone value against the library's shape rules in
 * order. Only a matched shape yields a number; everything else, including an
 * absent value, is flagged invalid.
 */
export function normalizePhone(raw: RawValue, patterns: PatternLibrary = DEFAULT_PATTERN_LIBRARY): Phone {
    const digits = digitsOnly(raw);
    const rule = patterns.phone.find((r) => r.shape.test(digits));
    if (!rule) return { number: null, isInvalid: true };
    return { number: rule.prefix + digits.slice(rule.drop), isInvalid: false };
}

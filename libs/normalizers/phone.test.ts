import { createPatternLibrary } from "../patterns/library";
import { normalizePhone } from "./phone";

test("national, international and subscriber forms", () => {
    expect(normalizePhone("0971234567")).toEqual({ number: "+260971234567", isInvalid: false });
    expect(normalizePhone("260971234567")).toEqual({ number: "+260971234567", isInvalid: false });
    expect(normalizePhone("971234567")).toEqual({ number: "+260971234567", isInvalid: false });
});

test("separators are ignored", () => {
    expect(normalizePhone("+260 97-123-4567")).toEqual({ number: "+260971234567", isInvalid: false });
    expect(normalizePhone("(097) 123 4567")).toEqual({ number: "+260971234567", isInvalid: false });
});

test("anything else is invalid with no number", () => {
    for (const raw of ["12345", "09712345678", "", "n/a", null, undefined]) {
        expect(normalizePhone(raw)).toEqual({ number: null, isInvalid: true });
    }
});

test("country code is configurable", () => {
    const patterns = createPatternLibrary({ countryCode: "27" });
    expect(normalizePhone("0821234567", patterns)).toEqual({ number: "+27821234567", isInvalid: false });
    expect(normalizePhone("27821234567", patterns)).toEqual({ number: "+27821234567", isInvalid: false });
});

import { normalizeDateOfBirth, normalizeGender, normalizePhone } from "../normalizers";
import { createPatternLibrary, DEFAULT_PATTERN_LIBRARY, synonymTable } from "./library";

test("synonym tables are keyed by lower-cased spelling and include the label itself", () => {
    const table = synonymTable([["Heart Rate", ["HR", "pulse"]]]);
    expect([...table.entries()]).toEqual([
        ["heart rate", "Heart Rate"],
        ["hr", "Heart Rate"],
        ["pulse", "Heart Rate"],
    ]);
});

test("default library uses country code 260", () => {
    expect(DEFAULT_PATTERN_LIBRARY.countryCode).toBe("260");
    expect(DEFAULT_PATTERN_LIBRARY.phone.map((r) => [r.name, r.prefix])).toEqual([
        ["national", "+260"],
        ["international", "+"],
        ["subscriber", "+260"],
    ]);
});

test("international rule follows the configured country code", () => {
    const lib = createPatternLibrary({ countryCode: "27" });
    const international = lib.phone.find((r) => r.name === "international");
    expect(international?.shape.test("27821234567")).toBe(true);
    expect(international?.shape.test("260971234567")).toBe(false);
});

test("rejects country codes that are not 1-3 digits", () => {
    expect(() => createPatternLibrary({ countryCode: "+44" })).toThrow("Invalid country calling code: +44");
    expect(() => createPatternLibrary({ countryCode: "1234" })).toThrow();
});

test("library is frozen", () => {
    expect(Object.isFrozen(DEFAULT_PATTERN_LIBRARY)).toBe(true);
    expect(Object.isFrozen(DEFAULT_PATTERN_LIBRARY.dateOfBirth)).toBe(true);
    expect(Object.isFrozen(DEFAULT_PATTERN_LIBRARY.dateOfBirth[1])).toBe(true);
    expect(Object.isFrozen(DEFAULT_PATTERN_LIBRARY.dateOfBirth[1].parts)).toBe(true);
    expect(Object.isFrozen(DEFAULT_PATTERN_LIBRARY.timestamp[0].parts)).toBe(true);
    expect(Object.isFrozen(DEFAULT_PATTERN_LIBRARY.phone[0])).toBe(true);
    expect(Object.isFrozen(DEFAULT_PATTERN_LIBRARY.gender)).toBe(true);
});

test("rules and tables cannot be changed through any library", () => {
    const lib = createPatternLibrary();

    expect(Reflect.set(lib.phone[0], "prefix", "+1")).toBe(false);
    expect(Reflect.set(lib.dateOfBirth[1].parts, "day", 2)).toBe(false);
    expect(Reflect.get(lib.gender, "set")).toBeUndefined();
    expect(Reflect.get(lib.gender, "delete")).toBeUndefined();

    expect(normalizePhone("0971234567", lib)).toEqual({ number: "+260971234567", isInvalid: false });
    expect(normalizeGender("x", lib)).toBe("Unknown");
    expect(normalizeDateOfBirth("01/05/1990", lib)).toBe("1990-05-01");
    expect(normalizeDateOfBirth("01/05/1990", createPatternLibrary())).toBe("1990-05-01");
});

test("each library gets its own candidate objects", () => {
    const a = createPatternLibrary();
    const b = createPatternLibrary();
    expect(a.dateOfBirth[1]).not.toBe(b.dateOfBirth[1]);
    expect(a.dateOfBirth[1].parts).not.toBe(b.dateOfBirth[1].parts);
    expect(a.dateOfBirth[1].parts).toEqual(b.dateOfBirth[1].parts);
});

import { normalizeDateOfBirth, normalizeTimestamp } from "./datetime";

test("ISO date of birth", () => {
    expect(normalizeDateOfBirth("1990-05-01")).toBe("1990-05-01");
    expect(normalizeDateOfBirth(" 1990-05-01 ")).toBe("1990-05-01");
});

test("slash dates are day-first", () => {
    expect(normalizeDateOfBirth("01/05/1990")).toBe("1990-05-01");
    expect(normalizeDateOfBirth("25/12/1985")).toBe("1985-12-25");
});

test("hyphen dates are month-first", () => {
    expect(normalizeDateOfBirth("01-05-1990")).toBe("1990-01-05");
    expect(normalizeDateOfBirth("12-25-1985")).toBe("1985-12-25");
});

test("unrecognized shapes are absent", () => {
    for (const raw of ["1990/05/01", "1-5-1990", "May 1 1990", "19900501", "", null, undefined]) {
        expect(normalizeDateOfBirth(raw)).toBeNull();
    }
});

test("impossible calendar dates fail closed", () => {
    expect(normalizeDateOfBirth("1990-02-30")).toBeNull();
    expect(normalizeDateOfBirth("32/01/1990")).toBeNull();
    expect(normalizeDateOfBirth("13-01-1990")).toBeNull();
    expect(normalizeDateOfBirth("0000-01-01")).toBeNull();
    expect(normalizeDateOfBirth("1900-02-29")).toBeNull();
    expect(normalizeDateOfBirth("2000-02-29")).toBe("2000-02-29");
    // month 25 in a slash date is not retried month-first
    expect(normalizeDateOfBirth("12/25/1985")).toBeNull();
});

test("admission timestamps in both formats", () => {
    expect(normalizeTimestamp("2021-01-02 08:30")).toBe("2021-01-02T08:30:00");
    expect(normalizeTimestamp("02/01/2021 08:30")).toBe("2021-01-02T08:30:00");
});

test("timestamps need the time part and a real time", () => {
    expect(normalizeTimestamp("2021-01-02")).toBeNull();
    expect(normalizeTimestamp("01-02-2021 08:30")).toBeNull();
    expect(normalizeTimestamp("2021-01-02 24:00")).toBeNull();
    expect(normalizeTimestamp("2021-01-02 10:60")).toBeNull();
    expect(normalizeTimestamp("31/04/2021 10:00")).toBeNull();
});

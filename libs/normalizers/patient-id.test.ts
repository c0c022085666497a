import { normalizePatientId } from "./patient-id";

test("pads short ids to four digits", () => {
    expect(normalizePatientId("p-12")).toBe("P-0012");
    expect(normalizePatientId("  7 ")).toBe("P-0007");
});

test("strips separators and letters", () => {
    expect(normalizePatientId("PAT 1-0-2-3")).toBe("P-1023");
    expect(normalizePatientId("id#0045x")).toBe("P-0045");
});

test("keeps the last four digits of longer ids", () => {
    expect(normalizePatientId("P-123456")).toBe("P-3456");
});

test("digitless or absent input becomes P-0000", () => {
    expect(normalizePatientId("abc")).toBe("P-0000");
    expect(normalizePatientId("")).toBe("P-0000");
    expect(normalizePatientId(null)).toBe("P-0000");
    expect(normalizePatientId(undefined)).toBe("P-0000");
});

test("output always has the P-#### shape", () => {
    for (const raw of ["1", "12345678901", "--", "P-0001", " 99 99 ", "٣٤"]) {
        expect(normalizePatientId(raw)).toMatch(/^P-\d{4}$/);
    }
});

test("canonical ids normalize to themselves", () => {
    expect(normalizePatientId("P-0042")).toBe("P-0042");
    expect(normalizePatientId(normalizePatientId("x98765"))).toBe("P-8765");
});

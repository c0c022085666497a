import { normalizeName } from "./name";

test("trims and title-cases each token", () => {
    expect(normalizeName("  jOHN   mwale ")).toBe("John   Mwale");
    expect(normalizeName("MARY banda")).toBe("Mary Banda");
});

test("hyphenated and apostrophe names are one token", () => {
    expect(normalizeName("mary-jane o'neil")).toBe("Mary-jane O'neil");
});

test("absent or blank names fall back to Unknown", () => {
    expect(normalizeName(null)).toBe("Unknown");
    expect(normalizeName(undefined)).toBe("Unknown");
    expect(normalizeName("")).toBe("Unknown");
    expect(normalizeName("   ")).toBe("Unknown");
});

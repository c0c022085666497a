import { ConfigError, loadEnv, NormalizeEnvSchema } from "./env";

test("defaults the phone country code", () => {
    expect(loadEnv(NormalizeEnvSchema, { CANONICAL_BUCKET: "canonical" })).toEqual({
        CANONICAL_BUCKET: "canonical",
        PHONE_COUNTRY_CODE: "260",
    });
});

test("missing variables raise ConfigError naming them", () => {
    expect.assertions(2);
    expect(() => loadEnv(NormalizeEnvSchema, { PHONE_COUNTRY_CODE: "1x" })).toThrow(ConfigError);
    try {
        loadEnv(NormalizeEnvSchema, {});
    } catch (err) {
        expect(err instanceof ConfigError && err.issues).toEqual(["CANONICAL_BUCKET: Required"]);
    }
});

import { z } from "zod";

export class ConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join("; ")}`);
        this.name = "ConfigError";
    }
}

const required = z.string().min(1);

export const IngestEnvSchema = z.object({
    RAW_BUCKET: required,
    INGEST_QUEUE_URL: required,
});

export const NormalizeEnvSchema = z.object({
    CANONICAL_BUCKET: required,
    PHONE_COUNTRY_CODE: z.string().regex(/^\d{1,3}$/).default("260"),
});

export const ReportsEnvSchema = z.object({
    CANONICAL_BUCKET: required,
});

export const AuditEnvSchema = z.object({
    AUDIT_BUCKET: required,
});

export type IngestEnv = z.infer<typeof IngestEnvSchema>;
export type NormalizeEnv = z.infer<typeof NormalizeEnvSchema>;
export type ReportsEnv = z.infer<typeof ReportsEnvSchema>;
export type AuditEnv = z.infer<typeof AuditEnvSchema>;

/** Parses the service's variables out of `env`; throws ConfigError naming every bad one. */
export function loadEnv<S extends z.ZodTypeAny>(schema: S, env: NodeJS.ProcessEnv = process.env): z.infer<S> {
    const parsed = schema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
    }
    return parsed.data;
}

import { parse } from "csv-parse/sync";
import { RawRecordSchema, type RawRecord } from "../../validation/dto";

/**
 * Reads an encounter extract into raw records.
 * - header row required; names are trimmed and lower-cased, unknown columns dropped
 * - unquoted empty cell -> null, quoted empty cell -> ""
 * - cell text is left untouched; cleaning happens in the pipeline
 */
export function parseClinicalCsv(buf: Buffer | string): RawRecord[] {
    const rows: unknown[] = parse(buf, {
        bom: true,
        columns: (header: string[]) => header.map((h) => h.trim().toLowerCase()),
        skip_empty_lines: true,
        relax_column_count: true,
        cast: (value, context) => (!context.header && value === "" && !context.quoting ? null : value),
    });

    return rows.map((row) => RawRecordSchema.parse(row));
}

import Ajv2020, { type ErrorObject, type ValidateFunction } from "ajv/dist/2020";
import addFormats from "ajv-formats";

import ingest from "../schemas/clinical.ingest.v1.json";
import canonical from "../schemas/clinical.canonical.v1.json";
import type { ContractName, ContractTypes } from "./types";

const ajv = new Ajv2020({ allErrors: true, strict: false });
addFormats(ajv);

// Compile validators once (cold start cost only)
const validators: Record<ContractName, ValidateFunction> = {
  "clinical.ingest.v1": ajv.compile(ingest),
  "clinical.canonical.v1": ajv.compile(canonical),
};

export class SchemaValidationError extends Error {
  constructor(public readonly schemaName: ContractName, public readonly details: ErrorObject[]) {
    super(`Schema validation failed for ${schemaName}: ${details.map((e) => `${e.instancePath || "/"} ${e.message}`).join("; ")}`);
    this.name = "SchemaValidationError";
  }
}

export function validate<N extends ContractName>(schemaName: N, data: unknown): asserts data is ContractTypes[N] {
  const v = validators[schemaName];
  if (!v(data)) {
    throw new SchemaValidationError(schemaName, v.errors ?? []);
  }
}

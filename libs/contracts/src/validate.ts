import Ajv2020, { ValidateFunction } from "ajv/dist/2020";

import cwLogsData from "../schemas/cloudwatch.logs.data.v1.json";

/** Only logEvents is relied on; events and every other field pass through untouched. */
export interface CloudWatchLogsDataV1 {
  logEvents: unknown[];
  [key: string]: unknown;
}

interface SchemaTypes {
  "cloudwatch.logs.data.v1": CloudWatchLogsDataV1;
}

export type SchemaName = keyof SchemaTypes;

const ajv = new Ajv2020({ allErrors: true, strict: false });

// Compile validators once (cold start cost only)
const validators: Record<SchemaName, ValidateFunction> = {
  "cloudwatch.logs.data.v1": ajv.compile(cwLogsData),
};

export class SchemaValidationError extends Error {
  public readonly details: string[];

  constructor(schemaName: SchemaName, details: string[]) {
    super(`Schema validation failed for ${schemaName}: ${details.join("; ")}`);
    this.name = "SchemaValidationError";
    this.details = details;
    Object.setPrototypeOf(this, SchemaValidationError.prototype);
  }
}

export function validate<K extends SchemaName>(schemaName: K, data: unknown): asserts data is SchemaTypes[K] {
  const v = validators[schemaName];
  if (!v(data)) {
    const messages = (v.errors || []).map(e => `${e.instancePath || "/"} ${e.message}`);
    throw new SchemaValidationError(schemaName, messages);
  }
}

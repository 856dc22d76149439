import Ajv2020, { ErrorObject } from "ajv/dist/2020";
import addFormats from "ajv-formats";

// Schemas
import reportMetadata from "../schemas/report.metadata.v1.json";
import healthReport from "../schemas/health.report.v1.json";

const ajv = new Ajv2020({ allErrors: true, strict: false });
addFormats(ajv);

// Compile validators once (cold start cost only)
const validators = {
  "report.metadata.v1": ajv.compile(reportMetadata),
  "health.report.v1": ajv.compile(healthReport),
};

export type ContractName = keyof typeof validators;

export class ContractValidationError extends Error {
  constructor(
    readonly contract: ContractName,
    readonly details: ErrorObject[],
  ) {
    const messages = details.map(e => `${e.instancePath || "/"} ${e.message}`).join("; ");
    super(`Schema validation failed for ${contract}: ${messages}`);
    this.name = "ContractValidationError";
  }
}

export function validate<T>(schemaName: ContractName, data: unknown): asserts data is T {
  const v = validators[schemaName];
  if (!v(data)) {
    throw new ContractValidationError(schemaName, v.errors ?? []);
  }
}

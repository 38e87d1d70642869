import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

import { getToolSchema, type ToolInputSchema } from "../schemas/tool-schemas.js";
import {
  MCPError,
  SchemaValidationError,
  InvalidParametersError,
  UnsupportedOperationError,
} from "../errors/index.js";
import { serverLogger as logger } from "../logging/index.js";

// removeAdditional: true only strips where a schema says additionalProperties: false,
// so free-form objects such as variables and config_data pass through untouched.
const ajv = new Ajv({
  allErrors: true,
  verbose: true,
  strict: false,
  removeAdditional: true,
  useDefaults: true,
  coerceTypes: true,
});

addFormats(ajv);

export type ValidationResult<T = unknown> =
  | { valid: true; data: T }
  | { valid: false; errors: ValidationError[] };

export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
  allowedValues?: unknown[];
}

function paramString(error: ErrorObject, name: string): string {
  const value: unknown = error.params[name];
  return typeof value === "string" || typeof value === "number" ? String(value) : "";
}

export function formatValidationErrors(errors: ErrorObject[]): ValidationError[] {
  return errors.map((error) => {
    let field = error.instancePath;
    let message = error.message ?? "Validation failed";
    let allowedValues: unknown[] | undefined;

    switch (error.keyword) {
      case "required": {
        const missing = paramString(error, "missingProperty");
        field = `${field}/${missing}`;
        message = `Missing required field: ${missing}`;
        break;
      }
      case "enum": {
        const allowed: unknown = error.params["allowedValues"];
        if (Array.isArray(allowed)) {
          allowedValues = allowed;
          message = `Invalid value. Allowed values: ${allowed.map((v) => String(v)).join(", ")}`;
        }
        break;
      }
      case "pattern":
        message = `Value does not match required pattern: ${paramString(error, "pattern")}`;
        break;
      case "minimum":
      case "minLength":
        message = `Value must be at least ${paramString(error, "limit")}`;
        break;
      case "maximum":
      case "maxLength":
        message = `Value must be at most ${paramString(error, "limit")}`;
        break;
      case "type":
        message = `Expected ${paramString(error, "type")} but received ${typeof error.data}`;
        break;
      case "additionalProperties":
        message = `Unknown field: ${paramString(error, "additionalProperty")}`;
        break;
    }

    return {
      field: field.replace(/^\//, "").replace(/\//g, ".") || "root",
      message,
      value: error.data,
      ...(allowedValues !== undefined && { allowedValues }),
    };
  });
}

function compileSchema<T>(toolName: string, schema: ToolInputSchema): ValidateFunction<T> {
  try {
    return ajv.compile<T>(schema);
  } catch (error) {
    logger.error({ error, toolName }, "Failed to compile schema");
    throw new MCPError(1500, "Schema compilation failed", { toolName });
  }
}

/**
 * Validates tool arguments against the tool's JSON schema. Defaults are filled in and
 * scalar types coerced in place, so the returned data is the normalized argument object.
 */
export function validateToolParameters<T = unknown>(
  toolName: string,
  parameters: unknown
): ValidationResult<T> {
  const schema = getToolSchema(toolName);

  if (!schema) {
    logger.warn({ toolName }, "No schema found for tool");
    throw new UnsupportedOperationError(`Tool '${toolName}'`, "no validation schema available");
  }

  const validate = compileSchema<T>(toolName, schema);

  if (validate(parameters)) {
    return { valid: true, data: parameters };
  }

  const validationErrors = formatValidationErrors(validate.errors ?? []);

  logger.debug(
    {
      toolName,
      errors: validationErrors,
    },
    "Parameter validation failed"
  );

  return { valid: false, errors: validationErrors };
}

/** Throwing form of {@link validateToolParameters}, used by the tool executors. */
export function parseToolParameters<T>(toolName: string, rawParams: unknown): T {
  try {
    const result = validateToolParameters<T>(toolName, rawParams ?? {});

    if (!result.valid) {
      throw new SchemaValidationError(result.errors);
    }

    return result.data;
  } catch (error) {
    if (error instanceof MCPError) {
      throw error;
    }

    logger.error(
      {
        error: error instanceof Error ? error.message : String(error),
        toolName,
      },
      "Unexpected validation error"
    );

    throw new InvalidParametersError("validation", "Unexpected validation error occurred");
  }
}

export function getValidationSchema(toolName: string): ToolInputSchema | null {
  return getToolSchema(toolName);
}

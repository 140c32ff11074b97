/**
 * JSON Schema validation utilities using Ajv.
 *
 * Provides functions to load and validate data against JSON schemas.
 */

import AjvDefault from 'ajv';
import type { ValidateFunction } from 'ajv';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

/**
 * Directory of the schemas shipped with the package. Resolves the same
 * from `src/lib` and `dist/lib`.
 */
export const SCHEMAS_DIR = fileURLToPath(new URL('../../schemas/', import.meta.url));

/**
 * Result of schema validation.
 */
export interface ValidationResult<T> {
  /** Whether the data is valid */
  valid: boolean;
  /** Typed data if valid, null otherwise */
  data: T | null;
  /** Validation error messages if invalid */
  errors: string[];
}

// Cache for compiled schemas
const schemaCache = new Map<string, ValidateFunction>();

/**
 * Loads and parses a JSON schema file.
 *
 * @throws Error if the schema file cannot be read or parsed
 */
export async function loadSchema(schemaPath: string): Promise<object> {
  try {
    const content = await readFile(schemaPath, 'utf-8');
    return JSON.parse(content);
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${schemaPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function compileSchema(schema: object): ValidateFunction {
  const schemaId = (schema as { $id?: string }).$id || JSON.stringify(schema);
  const cached = schemaCache.get(schemaId);
  if (cached) {
    return cached;
  }

  // Type assertion needed due to NodeNext module resolution
  const Ajv = AjvDefault as unknown as new (options?: { strict?: boolean; allErrors?: boolean; verbose?: boolean }) => {
    compile: (schema: object) => ValidateFunction;
  };
  const ajv = new Ajv({
    strict: true,
    allErrors: true,
    verbose: true,
  });

  const validate = ajv.compile(schema);
  schemaCache.set(schemaId, validate);
  return validate;
}

/**
 * Validates data against a JSON schema using Ajv.
 *
 * Compiled schemas are cached by `$id`.
 */
export function validateWithSchema<T>(data: unknown, schema: object): ValidationResult<T> {
  const validate = compileSchema(schema);

  if (validate(data)) {
    return {
      valid: true,
      data: data as T,
      errors: [],
    };
  }

  const errors: string[] = [];
  for (const error of validate.errors ?? []) {
    const path = error.instancePath || error.schemaPath || '';
    const message = error.message || 'Validation error';
    errors.push(`${path ? `${path}: ` : ''}${message}`);
  }

  return {
    valid: false,
    data: null,
    errors,
  };
}

/**
 * Schema Validation with Ajv
 * Phase control objects are checked against JSON Schema (draft 2020-12)
 * documents loaded from the workflow directory.
 */

import Ajv2020 from 'ajv/dist/2020';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { ConfigurationError, SchemaValidationError, SchemaViolation } from '../types/errors';
import { FileSystem } from '../types/file-system';
import { Result, ok, err } from '../types/result';

/**
 * A schema document that has been read and compiled
 */
export interface CompiledSchema {
  /** Absolute path the schema was loaded from */
  path: string;
  /** Raw schema text, as embedded in prompts */
  source: string;
  validate: ValidateFunction;
}

/**
 * Convert an Ajv instance path (`/checks/0/name`) to dot form (`checks.0.name`)
 */
export function formatInstancePath(instancePath: string): string {
  if (instancePath === '') {
    return '<root>';
  }
  return instancePath
    .slice(1)
    .split('/')
    .map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'))
    .join('.');
}

function isSchemaDocument(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Order violations by path, then keyword, then message
 */
function compareViolations(a: SchemaViolation, b: SchemaViolation): number {
  const keysA = [a.path, a.keyword, a.message];
  const keysB = [b.path, b.keyword, b.message];
  for (let i = 0; i < keysA.length; i++) {
    if (keysA[i] < keysB[i]) return -1;
    if (keysA[i] > keysB[i]) return 1;
  }
  return 0;
}

/**
 * Map Ajv errors to sorted violations
 */
export function toViolations(errors: readonly ErrorObject[]): SchemaViolation[] {
  return errors
    .map((error) => ({
      path: formatInstancePath(error.instancePath),
      keyword: error.keyword,
      message: error.message ?? `failed ${error.keyword}`,
    }))
    .sort(compareViolations);
}

/**
 * Loads, caches and applies phase schemas
 */
export class SchemaValidator {
  private readonly ajv: Ajv2020;
  private readonly fileSystem: FileSystem;
  private readonly cache = new Map<string, CompiledSchema>();

  constructor(fileSystem: FileSystem, ajv?: Ajv2020) {
    this.fileSystem = fileSystem;
    // User schemas may carry annotation keywords Ajv does not know
    this.ajv = ajv ?? new Ajv2020({ allErrors: true, strict: false });
  }

  /**
   * Read and compile a schema file
   */
  async load(schemaPath: string): Promise<Result<CompiledSchema, ConfigurationError>> {
    const absolutePath = this.fileSystem.resolve(schemaPath);
    const cached = this.cache.get(absolutePath);
    if (cached) {
      return ok(cached);
    }

    const read = await this.fileSystem.readFile(absolutePath);
    if (!read.ok) {
      return err(new ConfigurationError(`Schema not found: ${absolutePath}`, {}, read.error));
    }

    let document: unknown;
    try {
      document = JSON.parse(read.value);
    } catch (error) {
      return err(new ConfigurationError(`Schema is not valid JSON: ${absolutePath}`, {}, error));
    }

    if (!isSchemaDocument(document)) {
      return err(new ConfigurationError(`Schema must be a JSON object: ${absolutePath}`));
    }

    let validate: ValidateFunction;
    try {
      validate = this.ajv.compile(document);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err(new ConfigurationError(`Invalid schema ${absolutePath}: ${reason}`, {}, error));
    }

    const compiled: CompiledSchema = { path: absolutePath, source: read.value, validate };
    this.cache.set(absolutePath, compiled);
    return ok(compiled);
  }

  /**
   * Every violation of `value` against `schema`, in stable order
   * An empty list means the value is accepted.
   */
  validate(schema: CompiledSchema, value: unknown): SchemaViolation[] {
    if (schema.validate(value)) {
      return [];
    }
    return toViolations(schema.validate.errors ?? []);
  }

  /**
   * Validate and fold violations into a SchemaValidationError
   */
  check(schema: CompiledSchema, value: unknown): Result<void, SchemaValidationError> {
    const violations = this.validate(schema, value);
    if (violations.length > 0) {
      return err(new SchemaValidationError(violations));
    }
    return ok(undefined);
  }
}

/**
 * Create a schema validator backed by the given file system
 */
export function createSchemaValidator(fileSystem: FileSystem): SchemaValidator {
  return new SchemaValidator(fileSystem);
}

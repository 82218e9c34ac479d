// src/validation/ajv.ts
//
// Shared Ajv configuration and deterministic error formatting.
//
// - No type coercion, no default injection, no mutation of validated values.
// - Issues are sorted and bounded so error payloads are stable across runs.

import AjvModule from 'ajv';
import type { ErrorObject, SchemaObject } from 'ajv';
import { readJsonObjectFile } from '../util/packageRoot.js';

const Ajv = AjvModule.default;

export type AjvInstance = InstanceType<typeof Ajv>;

export const MAX_ISSUES = 10;

export type SchemaIssue = Readonly<{
  path: string;
  keyword: string;
  message: string;
  schemaPath: string;
}>;

export function createAjv(): AjvInstance {
  return new Ajv({
    allErrors: true,
    strict: true,
    allowUnionTypes: true,
    validateSchema: true,
    coerceTypes: false,
    useDefaults: false,
    removeAdditional: false,
  });
}

/**
 * Convert Ajv errors into a stable, bounded list. `params` is left out to keep large values out of
 * error payloads.
 */
export function formatAjvErrors(errors: readonly ErrorObject[] | null | undefined): readonly SchemaIssue[] {
  if (!errors || errors.length === 0) return [];

  const issues: SchemaIssue[] = errors.map((e) => ({
    path: e.instancePath,
    keyword: e.keyword,
    message: e.message ?? 'Schema validation failed',
    schemaPath: e.schemaPath,
  }));

  issues.sort((a, b) => {
    if (a.path !== b.path) return a.path < b.path ? -1 : 1;
    if (a.keyword !== b.keyword) return a.keyword < b.keyword ? -1 : 1;
    if (a.schemaPath !== b.schemaPath) return a.schemaPath < b.schemaPath ? -1 : 1;
    if (a.message !== b.message) return a.message < b.message ? -1 : 1;
    return 0;
  });

  return issues.length > MAX_ISSUES ? issues.slice(0, MAX_ISSUES) : issues;
}

/** Read a schema file; the root must be a JSON object. */
export function loadSchemaFile(absPath: string): SchemaObject {
  return { ...readJsonObjectFile(absPath) };
}

// src/tools/schemaRegistry.ts
//
// Loads tool input schemas from `schemas/tools/<toolName>.json`, compiles them once, and validates
// tools/call arguments.
//
// - Root schema must be an object schema with `additionalProperties: false`.
// - No coercion, no default injection, no mutation of the provided args.
// - Failures are -32602 with `error.data.code === "MCP_SESSION_ENGINE/INVALID_PARAMS"`.

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ValidateFunction } from 'ajv';

import { JSONRPC_INVALID_PARAMS, jsonRpcError, type JsonRpcErrorObject } from '../mcp/errors.js';
import { findPackageRoot } from '../util/packageRoot.js';
import { createAjv, formatAjvErrors, loadSchemaFile } from '../validation/ajv.js';
import { TOOL_NAMES, isToolName, type JsonSchemaObject, type ToolName } from './catalog.js';

export const TOOL_SCHEMA_DIR = path.join('schemas', 'tools');

export const ERROR_CODE_INVALID_PARAMS = 'MCP_SESSION_ENGINE/INVALID_PARAMS' as const;

export type ValidateInputResult =
  | Readonly<{ ok: true; value: unknown }>
  | Readonly<{ ok: false; error: JsonRpcErrorObject }>;

export class SchemaRegistry {
  private static singleton: SchemaRegistry | undefined;

  public static getOrCreate(): SchemaRegistry {
    if (SchemaRegistry.singleton) return SchemaRegistry.singleton;
    const created = SchemaRegistry.load(path.join(findPackageRoot(import.meta.url), TOOL_SCHEMA_DIR));
    SchemaRegistry.singleton = created;
    return created;
  }

  /** Throws when the directory or any tool's schema file is missing or malformed. */
  public static load(schemaDir: string): SchemaRegistry {
    if (!fs.existsSync(schemaDir) || !fs.statSync(schemaDir).isDirectory()) {
      throw new Error(`Schema directory missing or not a directory: ${schemaDir}`);
    }

    const ajv = createAjv();
    const schemaByTool = new Map<ToolName, JsonSchemaObject>();
    const validateByTool = new Map<ToolName, ValidateFunction>();

    for (const toolName of TOOL_NAMES) {
      const schema = loadSchemaFile(path.join(schemaDir, `${toolName}.json`));
      assertRootSchemaInvariants(toolName, schema);
      validateByTool.set(toolName, ajv.compile(schema));
      schemaByTool.set(toolName, schema);
    }

    return new SchemaRegistry(schemaByTool, validateByTool);
  }

  private constructor(
    private readonly schemaByTool: Map<ToolName, JsonSchemaObject>,
    private readonly validateByTool: Map<ToolName, ValidateFunction>,
  ) {}

  public getInputSchema(toolName: ToolName): JsonSchemaObject {
    const schema = this.schemaByTool.get(toolName);
    if (!schema) throw new Error(`Schema not loaded for tool: ${toolName}`);
    return schema;
  }

  public validateInput(toolName: string, args: unknown): ValidateInputResult {
    const validate = isToolName(toolName) ? this.validateByTool.get(toolName) : undefined;
    if (!validate) {
      return { ok: false, error: invalidParams({ code: ERROR_CODE_INVALID_PARAMS, tool: toolName }) };
    }

    if (validate(args)) return { ok: true, value: args };

    return {
      ok: false,
      error: invalidParams({
        code: ERROR_CODE_INVALID_PARAMS,
        tool: toolName,
        issues: formatAjvErrors(validate.errors),
      }),
    };
  }
}

function invalidParams(data: Readonly<Record<string, unknown>>): JsonRpcErrorObject {
  return jsonRpcError(JSONRPC_INVALID_PARAMS, 'Invalid params', data);
}

function assertRootSchemaInvariants(toolName: ToolName, schema: JsonSchemaObject): void {
  if (schema['type'] !== 'object') {
    throw new Error(`Tool schema root must have type "object" (${toolName}).`);
  }
  if (schema['additionalProperties'] !== false) {
    throw new Error(`Tool schema root must set additionalProperties: false (${toolName}).`);
  }
}

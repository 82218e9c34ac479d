// src/mcp/protocolSchemas.ts
//
// Loads the protocol payload schemas from `schemas/protocol/*.json` and compiles them once.
// Used by the state machine (capabilities, client info) and the handler (initialize and
// resources/read params).

import * as path from 'node:path';
import type { ValidateFunction } from 'ajv';
import { createAjv, formatAjvErrors, loadSchemaFile, type SchemaIssue } from '../validation/ajv.js';
import { findPackageRoot } from '../util/packageRoot.js';

export const PROTOCOL_SCHEMA_DIR = path.join('schemas', 'protocol');

export const PROTOCOL_SCHEMA_NAMES = [
  'initialize-params',
  'client-capabilities',
  'peer-info',
  'resources-read-params',
] as const;
export type ProtocolSchemaName = (typeof PROTOCOL_SCHEMA_NAMES)[number];

export type SchemaCheckResult =
  | Readonly<{ ok: true }>
  | Readonly<{ ok: false; issues: readonly SchemaIssue[] }>;

/** What the state machine needs from a payload validator. */
export type SessionPayloadValidator = Readonly<{
  checkClientCapabilities: (value: unknown) => SchemaCheckResult;
  checkPeerInfo: (value: unknown) => SchemaCheckResult;
}>;

export class ProtocolSchemas implements SessionPayloadValidator {
  private static singleton: ProtocolSchemas | undefined;

  public static getOrCreate(): ProtocolSchemas {
    if (ProtocolSchemas.singleton) return ProtocolSchemas.singleton;
    const created = ProtocolSchemas.load(path.join(findPackageRoot(import.meta.url), PROTOCOL_SCHEMA_DIR));
    ProtocolSchemas.singleton = created;
    return created;
  }

  public static load(schemaDir: string): ProtocolSchemas {
    const ajv = createAjv();
    const validators = new Map<ProtocolSchemaName, ValidateFunction>();
    for (const name of PROTOCOL_SCHEMA_NAMES) {
      const schema = loadSchemaFile(path.join(schemaDir, `${name}.json`));
      validators.set(name, ajv.compile(schema));
    }
    return new ProtocolSchemas(validators);
  }

  private constructor(private readonly validators: Map<ProtocolSchemaName, ValidateFunction>) {}

  public check(name: ProtocolSchemaName, value: unknown): SchemaCheckResult {
    const validate = this.validators.get(name);
    if (!validate) throw new Error(`Protocol schema not loaded: ${name}`);
    if (validate(value)) return { ok: true };
    return { ok: false, issues: formatAjvErrors(validate.errors) };
  }

  public checkInitializeParams(value: unknown): SchemaCheckResult {
    return this.check('initialize-params', value);
  }

  public checkClientCapabilities(value: unknown): SchemaCheckResult {
    return this.check('client-capabilities', value);
  }

  public checkPeerInfo(value: unknown): SchemaCheckResult {
    return this.check('peer-info', value);
  }

  public checkResourcesReadParams(value: unknown): SchemaCheckResult {
    return this.check('resources-read-params', value);
  }
}

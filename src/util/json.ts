// src/util/json.ts
//
// Narrowing helpers for values produced by JSON.parse, plus deterministic serialization.

import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);
const fastStableStringify = require('fast-stable-stringify') as (value: unknown) => string;

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function hasOwn(obj: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/** Object- or array-shaped value (JSON-RPC `params`). */
export function isStructured(v: unknown): v is Record<string, unknown> | unknown[] {
  return typeof v === 'object' && v !== null;
}

/** Deep copy so the receiver holds the only reference to the value. */
export function takeOwnership<T>(value: T): T {
  return value === undefined ? value : structuredClone(value);
}

/** JSON text with object keys sorted at every depth; array order is kept. */
export function stableJson(value: unknown): string {
  return fastStableStringify(value);
}

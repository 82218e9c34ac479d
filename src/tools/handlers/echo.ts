// src/tools/handlers/echo.ts
//
// echo: input is already Ajv-validated by the dispatcher.

import { isRecord } from '../../util/json.js';
import type { ToolResult } from './types.js';

export type EchoOutput = Readonly<{ text: string }>;

export function handleEcho(args: unknown): ToolResult<EchoOutput> {
  const text = isRecord(args) && typeof args.text === 'string' ? args.text : '';
  const repeat = isRecord(args) && typeof args.repeat === 'number' ? args.repeat : 1;
  return { ok: true, result: { text: text.repeat(repeat) } };
}

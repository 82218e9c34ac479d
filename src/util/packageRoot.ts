// src/util/packageRoot.ts
//
// Locate the package root (the nearest directory holding package.json) from a module URL, so data
// files under schemas/ resolve the same way from src/ (tsx) and from dist/src/ (built output).

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

export function findPackageRoot(moduleUrl: string): string {
  let dir = path.dirname(fileURLToPath(moduleUrl));
  for (;;) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) throw new Error(`No package.json found above ${fileURLToPath(moduleUrl)}`);
    dir = parent;
  }
}

export function readJsonObjectFile(absPath: string): object {
  if (!fs.existsSync(absPath) || !fs.statSync(absPath).isFile()) {
    throw new Error(`Missing JSON file: ${absPath}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(absPath, 'utf8'));
  } catch (err) {
    throw new Error(`Invalid JSON in ${absPath}. ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`File does not contain a JSON object: ${absPath}`);
  }
  return parsed;
}

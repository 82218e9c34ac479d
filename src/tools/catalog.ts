// src/tools/catalog.ts
//
// Tool catalog: stable, ordered names and descriptions. Input schemas are supplied at runtime by the
// schema registry, which owns schema IO and Ajv compilation.

export const TOOL_NAMES = ['echo', 'add'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export type JsonSchemaObject = Readonly<Record<string, unknown>>;

export type ToolCatalogEntry = Readonly<{
  name: ToolName;
  description: string;
  inputSchema: JsonSchemaObject;
  annotations: Readonly<{ readOnlyHint: true }>;
}>;

const DESCRIPTIONS: Readonly<Record<ToolName, string>> = {
  echo: 'Return the given text, optionally repeated.',
  add: 'Add two numbers.',
};

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((t) => t === name);
}

/** Catalog in declaration order; `getInputSchema` must return an already-loaded schema object. */
export function buildToolCatalog(getInputSchema: (name: ToolName) => JsonSchemaObject): readonly ToolCatalogEntry[] {
  return TOOL_NAMES.map((name) => ({
    name,
    description: DESCRIPTIONS[name],
    inputSchema: getInputSchema(name),
    annotations: { readOnlyHint: true },
  }));
}

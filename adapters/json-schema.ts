// Structural checks for tool input schemas (JSON Schema subset used by function calling)
import type { JsonObject, JsonValue } from "./canonical.js";

const SCHEMA_TYPES = new Set(["object", "array", "string", "number", "integer", "boolean", "null"]);

const SCHEMA_MAP_KEYWORDS = ["properties", "patternProperties", "$defs", "definitions"] as const;
const SCHEMA_LIST_KEYWORDS = ["anyOf", "oneOf", "allOf"] as const;
const SCHEMA_SINGLE_KEYWORDS = ["not", "if", "then", "else", "contains", "propertyNames"] as const;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Collect structural problems in a tool's input schema. An empty list means the schema is usable.
 * The root must describe an object, since tool arguments are always a JSON object.
 */
export function validateToolInputSchema(schema: JsonValue, path = "input_schema"): string[] {
  if (!isJsonObject(schema)) return [`${path} must be a JSON Schema object`];
  const issues = validateSchemaNode(schema, path);
  if (schema.type !== undefined && schema.type !== "object") {
    issues.push(`${path}.type must be "object"`);
  }
  return issues;
}

function validateSchemaNode(node: JsonValue, path: string): string[] {
  // booleans are valid schemas (true accepts everything, false nothing)
  if (typeof node === "boolean") return [];
  if (!isJsonObject(node)) return [`${path} must be a schema object or boolean`];

  const issues: string[] = [];

  if (node.type !== undefined) {
    const types = Array.isArray(node.type) ? node.type : [node.type];
    if (types.length === 0) issues.push(`${path}.type must not be empty`);
    for (const t of types) {
      if (typeof t !== "string" || !SCHEMA_TYPES.has(t)) {
        issues.push(`${path}.type has unknown type ${JSON.stringify(t)}`);
      }
    }
  }

  for (const keyword of SCHEMA_MAP_KEYWORDS) {
    const map = node[keyword];
    if (map === undefined) continue;
    if (!isJsonObject(map)) {
      issues.push(`${path}.${keyword} must be an object`);
      continue;
    }
    for (const [name, sub] of Object.entries(map)) {
      issues.push(...validateSchemaNode(sub, `${path}.${keyword}.${name}`));
    }
  }

  for (const keyword of SCHEMA_LIST_KEYWORDS) {
    const list = node[keyword];
    if (list === undefined) continue;
    if (!Array.isArray(list) || list.length === 0) {
      issues.push(`${path}.${keyword} must be a non-empty array`);
      continue;
    }
    list.forEach((sub, i) => issues.push(...validateSchemaNode(sub, `${path}.${keyword}[${i}]`)));
  }

  for (const keyword of SCHEMA_SINGLE_KEYWORDS) {
    const sub = node[keyword];
    if (sub !== undefined) issues.push(...validateSchemaNode(sub, `${path}.${keyword}`));
  }

  if (node.items !== undefined) {
    if (Array.isArray(node.items)) {
      node.items.forEach((sub, i) => issues.push(...validateSchemaNode(sub, `${path}.items[${i}]`)));
    } else {
      issues.push(...validateSchemaNode(node.items, `${path}.items`));
    }
  }

  if (node.additionalProperties !== undefined) {
    issues.push(...validateSchemaNode(node.additionalProperties, `${path}.additionalProperties`));
  }

  if (node.required !== undefined) {
    const req = node.required;
    if (!Array.isArray(req) || req.some((r) => typeof r !== "string")) {
      issues.push(`${path}.required must be an array of strings`);
    } else if (new Set(req).size !== req.length) {
      issues.push(`${path}.required must not repeat names`);
    }
  }

  if (node.enum !== undefined && (!Array.isArray(node.enum) || node.enum.length === 0)) {
    issues.push(`${path}.enum must be a non-empty array`);
  }

  return issues;
}

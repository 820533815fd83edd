import type { SchemaObject } from 'ajv';
import { joinPath } from '../tree/document-tree.js';
import { schemaParseError, ValuesCheckError } from './errors.js';

export type SchemaDocument = SchemaObject | boolean;

/** Allowed schema `type` names per declared property path. */
export type SchemaTypeMap = ReadonlyMap<string, readonly string[]>;

export interface SchemaIntrospection {
  /** Parsed schema; `null` when no schema was supplied. */
  readonly document: SchemaDocument | null;
  readonly typesByPath: SchemaTypeMap;
  readonly keysByPath: ReadonlySet<string>;
  /** Deprecated property paths mapped to their guidance text (from `description`). */
  readonly deprecatedByPath: ReadonlyMap<string, string | undefined>;
  /**
   * First `$ref` pointing outside the schema document. When set, only `keysByPath`
   * is filled; type and deprecation facts are not read from an untrusted schema.
   */
  readonly blockedReference?: string;
}

export const EMPTY_SCHEMA_INTROSPECTION: SchemaIntrospection = {
  document: null,
  typesByPath: new Map(),
  keysByPath: new Set(),
  deprecatedByPath: new Map(),
};

/**
 * Parse raw schema bytes and extract the property facts the tree comparators use.
 *
 * Throws `SCHEMA_PARSE_FAILED` for bytes that are not JSON and `SCHEMA_INVALID`
 * for a root that is neither an object nor a boolean.
 */
export function introspectSchema(schemaBytes: Uint8Array | string | undefined): SchemaIntrospection {
  if (schemaBytes === undefined) {
    return EMPTY_SCHEMA_INTROSPECTION;
  }

  const text = typeof schemaBytes === 'string' ? schemaBytes : Buffer.from(schemaBytes).toString('utf8');
  if (text.trim() === '') {
    return EMPTY_SCHEMA_INTROSPECTION;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw schemaParseError(`Schema is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, error);
  }

  if (typeof parsed === 'boolean') {
    return { ...EMPTY_SCHEMA_INTROSPECTION, document: parsed };
  }
  if (!isSchemaObject(parsed)) {
    throw new ValuesCheckError('SCHEMA_INVALID', 'Schema root must be a JSON object or boolean.', {
      rootType: Array.isArray(parsed) ? 'array' : typeof parsed,
    });
  }

  const typesByPath = new Map<string, readonly string[]>();
  const keysByPath = new Set<string>();
  const deprecatedByPath = new Map<string, string | undefined>();
  walkProperties(parsed, '', typesByPath, keysByPath, deprecatedByPath);

  const blockedReference = findExternalReference(parsed);
  if (blockedReference !== undefined) {
    return { ...EMPTY_SCHEMA_INTROSPECTION, document: parsed, keysByPath, blockedReference };
  }
  return { document: parsed, typesByPath, keysByPath, deprecatedByPath };
}

/**
 * Find the first `$ref` (depth-first, document order) whose target lies outside
 * the schema document. Only same-document fragments (`#...`) are allowed.
 */
export function findExternalReference(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    for (const item of value) {
      const found = findExternalReference(item);
      if (found !== undefined) {
        return found;
      }
    }
    return undefined;
  }

  if (!isPlainObject(value)) {
    return undefined;
  }

  for (const [key, child] of Object.entries(value)) {
    if (key === '$ref' && typeof child === 'string' && !child.startsWith('#')) {
      return child;
    }
    const found = findExternalReference(child);
    if (found !== undefined) {
      return found;
    }
  }
  return undefined;
}

function walkProperties(
  schema: Readonly<Record<string, unknown>>,
  path: string,
  typesByPath: Map<string, readonly string[]>,
  keysByPath: Set<string>,
  deprecatedByPath: Map<string, string | undefined>,
): void {
  const properties = schema.properties;
  if (!isPlainObject(properties)) {
    return;
  }

  for (const [name, definition] of Object.entries(properties)) {
    const fullPath = joinPath(path, name);
    keysByPath.add(fullPath);

    if (!isPlainObject(definition)) {
      continue;
    }

    const types = readTypeList(definition.type);
    if (types.length > 0) {
      typesByPath.set(fullPath, types);
    }

    if (Boolean(definition.deprecated)) {
      const description = definition.description;
      deprecatedByPath.set(fullPath, typeof description === 'string' && description !== '' ? description : undefined);
    }

    walkProperties(definition, fullPath, typesByPath, keysByPath, deprecatedByPath);
  }
}

function readTypeList(type: unknown): readonly string[] {
  if (typeof type === 'string') {
    return [type];
  }
  if (Array.isArray(type)) {
    return type.filter((item): item is string => typeof item === 'string');
  }
  return [];
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return isPlainObject(value);
}

export function isPlainObject(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

import type { NodeType } from '../tree/document-tree.js';

const NUMERIC_TYPES: ReadonlySet<NodeType> = new Set<NodeType>(['integer', 'float']);
const QUANTITY_SECTIONS: ReadonlySet<string> = new Set(['limits', 'requests']);

const SCHEMA_TYPE_TO_NODE_TYPES: Readonly<Record<string, readonly NodeType[]>> = {
  string: ['string'],
  integer: ['integer'],
  number: ['integer', 'float'],
  boolean: ['boolean'],
  null: ['null'],
  array: ['sequence'],
  object: ['mapping'],
};

const FRIENDLY_TYPE_NAMES: Readonly<Record<NodeType, string>> = {
  string: 'string',
  integer: 'int',
  float: 'float',
  boolean: 'bool',
  null: 'null',
  sequence: 'list',
  mapping: 'map',
};

export interface SchemaTypeCheck {
  readonly compatible: boolean;
  /** Node types the schema allows, in schema order (possibly with repeats). */
  readonly allowed: readonly NodeType[];
}

/** Identical types, or integer/float in either direction. */
export function typesCompatible(userType: NodeType, expectedType: NodeType): boolean {
  if (userType === expectedType) {
    return true;
  }
  return NUMERIC_TYPES.has(userType) && NUMERIC_TYPES.has(expectedType);
}

/**
 * Resource quantities (`...resources.limits.cpu`, `...resources.requests.memory`)
 * may be written as unit-suffixed strings or as bare numbers.
 */
export function isQuantityLikePath(path: string): boolean {
  const segments = path.split('.');
  if (segments.length < 3) {
    return false;
  }
  const section = segments[segments.length - 2] ?? '';
  const group = segments[segments.length - 3] ?? '';
  return group === 'resources' && QUANTITY_SECTIONS.has(section);
}

/** One side is a string and the other a number. */
export function isQuantityInterchange(left: NodeType, right: NodeType): boolean {
  return (left === 'string' && NUMERIC_TYPES.has(right)) || (right === 'string' && NUMERIC_TYPES.has(left));
}

export function compatibleWith(userType: NodeType, expectedType: NodeType, path: string): boolean {
  if (typesCompatible(userType, expectedType)) {
    return true;
  }
  return isQuantityLikePath(path) && isQuantityInterchange(userType, expectedType);
}

export function schemaTypesToNodeTypes(schemaTypes: readonly string[]): readonly NodeType[] {
  return schemaTypes.flatMap((schemaType) =>
    Object.hasOwn(SCHEMA_TYPE_TO_NODE_TYPES, schemaType) ? SCHEMA_TYPE_TO_NODE_TYPES[schemaType] ?? [] : [],
  );
}

/**
 * Check a value type against a schema `type` list. Schema type names with no node
 * equivalent are ignored; when none remain the check passes.
 */
export function compatibleWithSchemaTypes(
  userType: NodeType,
  schemaTypes: readonly string[],
  path: string,
): SchemaTypeCheck {
  const allowed = schemaTypesToNodeTypes(schemaTypes);
  if (allowed.length === 0) {
    return { compatible: true, allowed };
  }
  return {
    compatible: allowed.some((expected) => compatibleWith(userType, expected, path)),
    allowed,
  };
}

export function friendlyTypeName(type: NodeType): string {
  return FRIENDLY_TYPE_NAMES[type];
}

/** Human-readable type list, e.g. "int, float, or null". */
export function describeTypes(types: readonly NodeType[]): string {
  const unique = [...new Set(types.map((type) => friendlyTypeName(type)))];

  switch (unique.length) {
    case 0:
      return 'unknown';
    case 1:
      return unique[0] ?? 'unknown';
    case 2:
      return `${unique[0]} or ${unique[1]}`;
    default:
      return `${unique.slice(0, -1).join(', ')}, or ${unique[unique.length - 1]}`;
  }
}

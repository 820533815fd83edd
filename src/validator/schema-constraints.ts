import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';
import { Ajv2019 } from 'ajv/dist/2019.js';
import { Ajv2020 } from 'ajv/dist/2020.js';
import AjvDraft04Module from 'ajv-draft-04';
import {
  findEntry,
  findLineForPath,
  indexPath,
  joinPath,
  toPlainValue,
  type MappingNode,
  type TreeNode,
} from '../tree/document-tree.js';
import { schemaCompileError, ValuesCheckError } from './errors.js';
import { createFinding, type Finding } from './findings.js';
import { isIgnoredPath } from './glob.js';
import type { SchemaDocument, SchemaIntrospection } from './schema-introspect.js';

const DRAFT_2020_PATTERN = /json-schema\.org\/draft\/2020-12\//;
const DRAFT_2019_PATTERN = /json-schema\.org\/draft\/2019-09\//;
const DRAFT_04_PATTERN = /json-schema\.org\/draft-04\//;

// CommonJS package: the class sits on `default` of the module object.
const AjvDraft04 = AjvDraft04Module.default;

interface ResolvedInstancePath {
  readonly path: string;
  readonly node: TreeNode | undefined;
}

/**
 * Run the schema against the user document and report constraint violations and
 * deprecated keys.
 *
 * A schema with an external `$ref` is never evaluated: the result is a single
 * blocked-reference error. `type` violations are dropped when the schema type map
 * is non-empty, since the type-mismatch pass already reports them per path.
 * Throws `SCHEMA_COMPILE_FAILED` when the evaluator rejects the schema.
 */
export function checkSchemaConstraints(
  user: MappingNode,
  schema: SchemaIntrospection,
  ignorePatterns: readonly string[],
): Finding[] {
  if (schema.blockedReference !== undefined) {
    return [
      createFinding(
        'VALUES_SCHEMA_REF_BLOCKED',
        'error',
        0,
        '',
        `Schema reference ${JSON.stringify(schema.blockedReference)} points outside the schema document; external references are not resolved`,
      ),
    ];
  }
  if (schema.document === null) {
    return [];
  }

  const findings: Finding[] = [];
  const validate = compileSchema(schema.document);
  const instance = convertForEvaluation(user);
  if (!validate(instance)) {
    for (const error of validate.errors ?? []) {
      if (error.keyword === 'type' && schema.typesByPath.size > 0) {
        continue;
      }
      const finding = violationFinding(user, error);
      if (isIgnoredPath(finding.path, ignorePatterns)) {
        continue;
      }
      findings.push(finding);
    }
  }

  findings.push(...checkDeprecated(user, schema.deprecatedByPath, ignorePatterns));
  return findings;
}

function compileSchema(document: SchemaDocument): ValidateFunction {
  const options = { allErrors: true, strict: false, validateSchema: false, logger: false } as const;
  const dialect = typeof document === 'boolean' || typeof document.$schema !== 'string' ? '' : document.$schema;
  const ajv = DRAFT_2020_PATTERN.test(dialect)
    ? new Ajv2020(options)
    : DRAFT_2019_PATTERN.test(dialect)
      ? new Ajv2019(options)
      : DRAFT_04_PATTERN.test(dialect)
        ? new AjvDraft04(options)
        : new Ajv(options);

  try {
    return ajv.compile(document);
  } catch (error) {
    throw schemaCompileError(
      `Schema could not be compiled: ${error instanceof Error ? error.message : String(error)}`,
      error,
    );
  }
}

function convertForEvaluation(user: MappingNode): unknown {
  try {
    return toPlainValue(user);
  } catch (error) {
    throw new ValuesCheckError(
      'VALUES_CONVERSION_FAILED',
      `Values could not be converted for schema evaluation: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { cause: error },
    );
  }
}

function violationFinding(user: MappingNode, error: ErrorObject): Finding {
  const resolved = resolveInstancePath(user, error.instancePath);
  const message = `Schema validation: ${error.message ?? error.keyword}`;

  const missingProperty = error.keyword === 'required' ? error.params.missingProperty : undefined;
  if (typeof missingProperty === 'string') {
    return createFinding(
      'VALUES_SCHEMA_VIOLATION',
      'error',
      resolved.node?.line ?? 0,
      joinPath(resolved.path, missingProperty),
      message,
    );
  }

  return createFinding(
    'VALUES_SCHEMA_VIOLATION',
    'error',
    resolved.path === '' ? user.line : findLineForPath(user, resolved.path),
    resolved.path,
    message,
  );
}

/** Translate a JSON pointer into a dot-path, using `[i]` where the tree holds a sequence. */
function resolveInstancePath(user: MappingNode, instancePath: string): ResolvedInstancePath {
  if (instancePath === '') {
    return { path: '', node: user };
  }

  let path = '';
  let node: TreeNode | undefined = user;
  for (const rawSegment of instancePath.slice(1).split('/')) {
    const segment = rawSegment.replace(/~1/g, '/').replace(/~0/g, '~');
    if (node?.kind === 'sequence' && /^\d+$/.test(segment)) {
      const index = Number(segment);
      path = indexPath(path, index);
      node = node.items[index];
      continue;
    }

    path = joinPath(path, segment);
    node = node?.kind === 'mapping' ? findEntry(node, segment)?.value : undefined;
  }
  return { path, node };
}

function checkDeprecated(
  user: MappingNode,
  deprecatedByPath: ReadonlyMap<string, string | undefined>,
  ignorePatterns: readonly string[],
): Finding[] {
  const findings: Finding[] = [];
  for (const [path, guidance] of deprecatedByPath) {
    if (isIgnoredPath(path, ignorePatterns)) {
      continue;
    }
    const line = findLineForPath(user, path);
    if (line === 0) {
      continue;
    }
    const message = guidance === undefined ? `Deprecated key ${JSON.stringify(path)}` : `Deprecated key ${JSON.stringify(path)} - ${guidance}`;
    findings.push(createFinding('VALUES_DEPRECATED_KEY', 'warning', line, path, message));
  }
  return findings;
}

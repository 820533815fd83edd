import type { MappingNode } from '../tree/document-tree.js';
import { isValuesCheckError, ValidationRunError, type ValuesCheckError } from './errors.js';
import type { Finding } from './findings.js';
import { buildPathIndex } from './path-index.js';
import { checkSchemaConstraints } from './schema-constraints.js';
import { EMPTY_SCHEMA_INTROSPECTION, introspectSchema, type SchemaIntrospection } from './schema-introspect.js';
import { detectTypeMismatches } from './type-mismatch.js';
import { detectUnknownKeys } from './unknown-keys.js';
import type { ValidationResult } from './validation-result.js';

/** Everything the engine needs from a chart; produced by a loader such as `loadLocalChart`. */
export interface ChartDefaults {
  readonly name: string;
  readonly version: string;
  readonly defaults: MappingNode;
  /** Raw `values.schema.json` contents, if the chart ships one. */
  readonly schemaBytes?: Uint8Array | string;
  readonly subcomponents: ReadonlyMap<string, MappingNode>;
}

export interface ValidateValuesInput {
  /** Identifies the values document in results and errors, usually its file path. */
  readonly sourceId: string;
  readonly values: MappingNode;
  readonly chart: ChartDefaults;
  /** Dot-path globs whose findings are suppressed (`*` one segment, `**` any). */
  readonly ignorePatterns?: readonly string[];
}

/**
 * Validate one values document against a chart in three passes: unknown keys,
 * type mismatches, then schema constraints and deprecations.
 *
 * Schema failures (unparseable bytes, a schema the evaluator rejects) do not stop
 * the first two passes; the run then throws `ValidationRunError` carrying their
 * findings on `partial`.
 */
export function validateValues(input: ValidateValuesInput): ValidationResult {
  const ignorePatterns = input.ignorePatterns ?? [];
  const { chart, values } = input;

  let schema: SchemaIntrospection = EMPTY_SCHEMA_INTROSPECTION;
  let schemaError: ValuesCheckError | undefined;
  try {
    schema = introspectSchema(chart.schemaBytes);
  } catch (error) {
    if (!isValuesCheckError(error)) {
      throw error;
    }
    schemaError = error;
  }

  const findings: Finding[] = [];
  findings.push(
    ...detectUnknownKeys(values, chart.defaults, {
      schemaKeys: schema.keysByPath,
      subcomponents: chart.subcomponents,
      ignorePatterns,
      pathIndex: buildPathIndex(chart.defaults),
    }),
  );
  findings.push(
    ...detectTypeMismatches(values, chart.defaults, {
      ignorePatterns,
      schemaTypes: schema.typesByPath,
      subcomponents: chart.subcomponents,
    }),
  );

  const result = (): ValidationResult => ({
    sourceId: input.sourceId,
    chartName: chart.name,
    chartVersion: chart.version,
    findings: [...findings],
  });

  if (schemaError !== undefined) {
    throw new ValidationRunError(schemaError, result());
  }

  try {
    findings.push(...checkSchemaConstraints(values, schema, ignorePatterns));
  } catch (error) {
    if (!isValuesCheckError(error)) {
      throw error;
    }
    throw new ValidationRunError(error, result());
  }

  return result();
}

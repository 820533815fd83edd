import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { MappingNode } from '../tree/document-tree.js';
import { chartLoadError, isValuesCheckError } from '../validator/errors.js';
import type { ChartDefaults } from '../validator/validate.js';
import { parseValuesMapping } from './load-values-file.js';

const CHART_FILE = 'Chart.yaml';
const VALUES_FILES = ['values.yaml', 'values.yml'] as const;
const SCHEMA_FILE = 'values.schema.json';
const SUBCHART_DIR = 'charts';

export const ChartMetadataSchema = z
  .object({
    name: z.string().min(1),
    version: z.union([z.string().min(1), z.number()]).transform((value) => String(value)),
    description: z.string().optional(),
  })
  .passthrough();

export type ChartMetadata = z.infer<typeof ChartMetadataSchema>;

export interface LoadedChart extends ChartDefaults {
  readonly directory: string;
  /** Subchart directories that were skipped because their values failed to parse. */
  readonly skippedSubcharts: readonly string[];
}

/**
 * Load a chart from an unpacked directory: `Chart.yaml`, default values, an optional
 * `values.schema.json`, and unpacked subcharts under `charts/` (sorted by directory
 * name). Packaged subchart archives are not read.
 */
export function loadLocalChart(directory: string): LoadedChart {
  const metadata = readChartMetadata(directory);
  const defaults = readDefaults(directory);
  const schemaPath = join(directory, SCHEMA_FILE);

  const subcomponents = new Map<string, MappingNode>();
  const skippedSubcharts: string[] = [];
  const subchartRoot = join(directory, SUBCHART_DIR);
  if (existsSync(subchartRoot)) {
    const subchartDirs = readdirSync(subchartRoot, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && existsSync(join(subchartRoot, entry.name, CHART_FILE)))
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));

    for (const subchartDir of subchartDirs) {
      const subchartPath = join(subchartRoot, subchartDir);
      try {
        const subchartMetadata = readChartMetadata(subchartPath);
        subcomponents.set(subchartMetadata.name, readDefaults(subchartPath));
      } catch (error) {
        if (!isValuesCheckError(error)) {
          throw error;
        }
        skippedSubcharts.push(subchartDir);
      }
    }
  }

  return {
    directory,
    name: metadata.name,
    version: metadata.version,
    defaults,
    ...(existsSync(schemaPath) ? { schemaBytes: readFileSync(schemaPath) } : {}),
    subcomponents,
    skippedSubcharts,
  };
}

export function readChartMetadata(directory: string): ChartMetadata {
  const chartPath = join(directory, CHART_FILE);
  if (!existsSync(chartPath)) {
    throw chartLoadError(`No ${CHART_FILE} found in chart directory: ${directory}`, { directory });
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(chartPath, 'utf8'));
  } catch (error) {
    throw chartLoadError(`Could not parse ${chartPath}.`, { directory }, error);
  }

  const parsed = ChartMetadataSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw chartLoadError(`Invalid ${chartPath}: ${issues.join('; ')}`, { directory });
  }
  return parsed.data;
}

function readDefaults(directory: string): MappingNode {
  for (const fileName of VALUES_FILES) {
    const valuesPath = join(directory, fileName);
    if (existsSync(valuesPath)) {
      return parseValuesMapping(readFileSync(valuesPath, 'utf8'), valuesPath);
    }
  }
  return { kind: 'mapping', entries: [], line: 0 };
}

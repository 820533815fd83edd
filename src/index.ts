export * from './tree/document-tree.js';
export * from './tree/parse-values.js';
export * from './validator/errors.js';
export * from './validator/findings.js';
export * from './validator/glob.js';
export * from './validator/path-index.js';
export * from './validator/suggest.js';
export * from './validator/type-compat.js';
export * from './validator/schema-introspect.js';
export * from './validator/unknown-keys.js';
export * from './validator/type-mismatch.js';
export * from './validator/schema-constraints.js';
export * from './validator/validation-result.js';
export * from './validator/validate.js';
export * from './chart/load-values-file.js';
export * from './chart/load-local-chart.js';

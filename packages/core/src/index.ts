// Manifest model
export type { Component, ComponentList, Manifest } from './manifest/manifest-types.js';
export { parseManifest, MANIFEST_NAMESPACE, MANIFEST_ROOT } from './manifest/parser.js';
export { sortComponents, compareCodePoints } from './manifest/sorter.js';

// Rendering (plain text, no chalk)
export { renderComponents, renderTable, renderCsv, renderTsv } from './render/renderer.js';
export type { RenderOptions } from './render/renderer.js';
export { splitParent, SPLITTABLE_BY_DOT, SPLITTABLE_BY_HYPHEN } from './render/parent-split.js';
export type { ParentSplit } from './render/parent-split.js';

// Config
export { getConfig, createConfig } from './utils/config.js';
export type { Config } from './utils/config.js';

// Errors
export {
  PkgviewError,
  ConfigurationError,
  ManifestParseError,
  FileReadError,
  RenderError,
  ErrorCode,
} from './errors.js';
export type { ManifestParseErrorKind } from './errors.js';

// Validation and file loading
export { validate, validatePath } from './utils/validation.js';
export { readManifestFile, decodeManifest } from './utils/manifest-file.js';

// Schemas
export { PackageJsonSchema } from './schemas/package.schema.js';
export { OutputFormatSchema, SortPolicySchema } from './schemas/view-options.schema.js';
export type { OutputFormat, SortPolicy } from './schemas/view-options.schema.js';

// Pipelines
export { viewManifest, runView } from './pipelines/view.js';
export type { ViewOptions, ViewResult, RunViewOptions } from './pipelines/view.js';
export type { ProgressReporter } from './pipelines/progress.js';
export { SilentProgress } from './pipelines/progress.js';

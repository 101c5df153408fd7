/**
 * Splicer - composable @[placeholder]@ templates
 *
 * @packageDocumentation
 */

// Templates
export {
  Template,
  TemplateHandle,
  Assembler,
  OPEN_DELIMITER,
  CLOSE_DELIMITER,
  PLACEHOLDER_PATTERN,
  placeholderPattern,
  scanMarkers,
  findSyntaxIssue,
  markerFor,
  loadTemplate,
  loadHandle,
  readTemplateText,
} from "./templates/index.js";

export type {
  TemplateOptions,
  Renderable,
  ScannedMarker,
  SyntaxIssue,
  LoadOptions,
} from "./templates/index.js";

// Manifests
export {
  ManifestSchema,
  ManifestTemplateSchema,
  parseManifest,
  loadManifest,
  buildAssembly,
  assembleManifestFile,
} from "./manifest/index.js";

export type {
  Manifest,
  ManifestInput,
  ManifestTemplate,
  Assembly,
  BuildOptions,
} from "./manifest/index.js";

// Execution
export {
  ScriptRunner,
  createRunner,
  buildScript,
  spawnProcess,
  DEFAULT_RUNNER_CONFIG,
  PREAMBLE_STYLES,
} from "./execution/index.js";

export type {
  PreambleStyle,
  RunnerConfig,
  ProcessOutput,
  ProcessExecutor,
} from "./execution/index.js";

// Library utilities
export {
  // Errors
  SplicerError,
  ValidationError,
  ConfigError,
  TemplateLoadError,
  InvalidSyntaxError,
  MissingPlaceholderError,
  CompositionError,
  ExecutionError,
  // Result utilities
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  all,
  tryCatch,
  tryCatchAsync,
  // Logger
  logger,
} from "./lib/index.js";

export type { Result, LogLevel, MissingReason } from "./lib/index.js";

export { VERSION } from "./version.js";

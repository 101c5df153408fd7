export {
  ManifestSchema,
  ManifestTemplateSchema,
  type Manifest,
  type ManifestInput,
  type ManifestTemplate,
} from "./schema.js";
export {
  parseManifest,
  loadManifest,
  buildAssembly,
  assembleManifestFile,
  type Assembly,
  type BuildOptions,
} from "./builder.js";

export {
  compileTools,
  describeApi,
  describeOperation,
  preferredMediaType,
  type ApiInfo,
  type CompileOptions,
} from "./openapi.js";

export {
  NameRegistry,
  rawNameFromRoute,
  sanitizeToolName,
  simplifyToolName,
  toSnakeCase,
  type SimplifyOptions,
} from "./naming.js";

export {
  createSchemaResolver,
  unescapePointerSegment,
  type SchemaResolver,
  type SchemaResolverOptions,
} from "./schema-resolver.js";

export {
  SPEC_FETCH_TIMEOUT_MS,
  isApiDescription,
  loadSpec,
  parseSpecText,
  type FetchedText,
  type LoadSpecOptions,
  type SpecSource,
} from "./spec-loader.js";

export {
  COMMON_SPEC_ENDPOINTS,
  findConfigScripts,
  findSpecUrl,
  isLikelySpecUrl,
} from "./spec-discovery.js";

export { validateSpec, type SpecValidation } from "./spec-validate.js";

export {
  jsonSchemaToTypeString,
  jsonSchemaToZod,
  type SchemaRenderOptions,
} from "./json-schema-to-ts.js";

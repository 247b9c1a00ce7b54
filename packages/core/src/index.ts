// Tool model
export {
  defineTool,
  pathPlaceholders,
  HTTP_METHODS,
  type BodyPropertySpec,
  type DefineToolInput,
  type HttpMethod,
  type InvocationFailure,
  type InvocationFailureKind,
  type InvocationResult,
  type InvocationSuccess,
  type ParameterLocation,
  type ParameterSpec,
  type RequestBodySpec,
  type Schema,
  type ToolDefinition,
} from "./tools.js";

// Errors
export {
  ConfigError,
  MissingRequiredParameterError,
  SpecLoadError,
  ToolNameCollisionError,
  ToolNotFoundError,
  UnresolvedReferenceError,
  errorMessage,
  type DispatchError,
} from "./errors.js";

// Dispatch
export {
  DEFAULT_TIMEOUT_MS,
  buildAuthHeaders,
  buildRequest,
  createDispatcher,
  toEnvelope,
  type Dispatcher,
  type DispatcherOptions,
  type HttpAuth,
  type InvokeOptions,
  type PreparedRequest,
} from "./dispatcher.js";

// Catalog
export { createToolCatalog, type ToolCatalog } from "./catalog.js";
export { describeTool, firstLine, groupByTag, summarizeCatalog, typeLabel } from "./summary.js";

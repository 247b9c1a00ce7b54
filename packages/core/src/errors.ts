import { TaggedError } from "better-result";
import type { ParameterLocation } from "./tools.js";

// ---------------------------------------------------------------------------
// Loading and compilation (fatal: thrown to the caller)
// ---------------------------------------------------------------------------

/** Missing file, unreachable URL, or content that is not an API description. */
export class SpecLoadError extends TaggedError("SpecLoadError")<{
  source: string;
  message: string;
}>() {}

export class UnresolvedReferenceError extends TaggedError("UnresolvedReferenceError")<{
  ref: string;
  reason: "missing" | "external" | "cycle";
  message: string;
}>() {}

export class ToolNameCollisionError extends TaggedError("ToolNameCollisionError")<{
  toolName: string;
  message: string;
}>() {}

export class ConfigError extends TaggedError("ConfigError")<{
  path: string;
  message: string;
}>() {}

// ---------------------------------------------------------------------------
// Dispatch pre-flight (returned as Result errors, before any network call)
// ---------------------------------------------------------------------------

export class ToolNotFoundError extends TaggedError("ToolNotFoundError")<{
  toolName: string;
  message: string;
}>() {}

export class MissingRequiredParameterError extends TaggedError("MissingRequiredParameterError")<{
  toolName: string;
  parameter: string;
  location: ParameterLocation | "body";
  message: string;
}>() {}

export type DispatchError = ToolNotFoundError | MissingRequiredParameterError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

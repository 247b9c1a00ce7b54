/**
 * Internal `$ref` resolution against one loaded API description.
 *
 * Only document-local pointers (`#/...`) are followed. In lenient mode an
 * unresolvable pointer (missing target, external document, reference loop)
 * yields an empty schema; in strict mode it throws UnresolvedReferenceError.
 */

import { UnresolvedReferenceError, type Schema } from "@apitools/core";
import { Result } from "better-result";
import { asString, isRecord } from "./object.js";

export interface SchemaResolverOptions {
  readonly strict?: boolean | undefined;
}

export interface SchemaResolver {
  readonly strict: boolean;
  /** Resolve a pointer such as `#/components/schemas/Order`, following chained references. */
  resolve(pointer: string): Schema;
  /** `resolve(schema.$ref)` for a reference object, otherwise the value itself as a record. */
  deref(schema: unknown): Schema;
}

/** Decode one JSON pointer segment (`~1` → `/`, `~0` → `~`, percent escapes). */
export function unescapePointerSegment(segment: string): string {
  const decoded = Result.try(() => decodeURIComponent(segment)).unwrapOr(segment);
  return decoded.replaceAll("~1", "/").replaceAll("~0", "~");
}

function walkPointer(document: Schema, pointer: string): unknown {
  if (pointer === "#" || pointer === "#/") return document;

  let current: unknown = document;
  for (const raw of pointer.slice(2).split("/")) {
    const segment = unescapePointerSegment(raw);
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
    } else if (isRecord(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

export function createSchemaResolver(document: Schema, options: SchemaResolverOptions = {}): SchemaResolver {
  const strict = options.strict ?? false;

  function unresolved(ref: string, reason: UnresolvedReferenceError["reason"]): Schema {
    if (strict) {
      const detail = reason === "missing"
        ? "target does not exist"
        : reason === "external"
          ? "only document-local references are supported"
          : "reference loop";
      throw new UnresolvedReferenceError({ ref, reason, message: `Cannot resolve '${ref}': ${detail}` });
    }
    return {};
  }

  function resolve(pointer: string): Schema {
    const seen = new Set<string>();
    let ref = pointer;

    for (;;) {
      if (ref !== "#" && !ref.startsWith("#/")) return unresolved(ref, "external");
      if (seen.has(ref)) return unresolved(pointer, "cycle");
      seen.add(ref);

      const target = walkPointer(document, ref);
      if (!isRecord(target)) return unresolved(ref, "missing");

      const next = asString(target["$ref"]);
      if (next === undefined) return target;
      ref = next;
    }
  }

  function deref(schema: unknown): Schema {
    if (!isRecord(schema)) return {};
    const ref = asString(schema["$ref"]);
    return ref === undefined ? schema : resolve(ref);
  }

  return { strict, resolve, deref };
}

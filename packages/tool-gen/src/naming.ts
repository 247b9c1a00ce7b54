/**
 * Tool name derivation.
 *
 * Framework-generated operation identifiers tend to repeat the route in the
 * name (`get_supplier_detail_api_suppliers__supplier_id__get`). The
 * simplifier cuts such names back to their leading verb phrase
 * (`get_supplier_detail`) and is idempotent.
 */

const HTTP_METHOD_SUFFIX = /_(get|post|put|patch|delete)$/;

const VERBS = ["get", "create", "update", "delete", "approve", "reject", "list", "query"] as const;

export interface SimplifyOptions {
  /** Normalize camelCase and kebab-case to snake_case. Defaults to true. */
  readonly snakeCase?: boolean | undefined;
  /** Apply the redundancy heuristics. Defaults to true. */
  readonly simplify?: boolean | undefined;
}

function isSnakeCase(name: string): boolean {
  return name.includes("_") && name === name.toLowerCase() && /[a-z]/.test(name);
}

export function toSnakeCase(name: string): string {
  if (isSnakeCase(name)) return name;

  return name
    .replace(/(.)([A-Z][a-z]+)/g, "$1_$2")
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .toLowerCase()
    .replaceAll("-", "_")
    .replaceAll("__", "_");
}

function stripVerb(prefix: string): string {
  for (const verb of VERBS) {
    if (prefix.startsWith(`${verb}_`)) return prefix.slice(verb.length + 1);
  }
  return prefix;
}

/**
 * Cut the name at the first split point where the tail restates the head,
 * e.g. `get_supplier_detail` + `suppliers_supplier_id`.
 */
function collapseRedundantTail(name: string): string {
  const parts = name.split("_");

  for (let i = 2; i < parts.length; i++) {
    const prefix = parts.slice(0, i).join("_");
    const suffix = parts.slice(i).join("_");
    const bare = stripVerb(prefix);
    if (!bare) continue;

    const first = bare.split("_")[0] ?? "";
    if (suffix.startsWith(`${first}s_`) || suffix.startsWith(`${first}_`) || suffix.startsWith(bare)) {
      return prefix;
    }
  }

  return name;
}

function simplifyOnce(name: string): string {
  let result = name.replace(HTTP_METHOD_SUFFIX, "");
  result = result.replace(/_api(?=_)/g, "");
  result = collapseRedundantTail(result);
  return result.replace(/_+/g, "_").replace(/^_+|_+$/g, "");
}

export function simplifyToolName(name: string, options: SimplifyOptions = {}): string {
  let result = options.snakeCase === false ? name : toSnakeCase(name);
  if (options.simplify === false) return result;

  for (;;) {
    const next = simplifyOnce(result);
    if (next === result) return result;
    result = next;
  }
}

/** Replace characters that are not valid in a tool identifier. */
export function sanitizeToolName(name: string): string {
  return name
    .replace(/[^a-zA-Z0-9_]/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_|_$/g, "");
}

/**
 * Fallback raw name for operations without an identifier:
 * `get` + `/items/{id}` → `get_items_{id}`.
 */
export function rawNameFromRoute(method: string, path: string): string {
  const route = path.replaceAll("/", "_").replaceAll("-", "_").replace(/^_+|_+$/g, "");
  return `${method.toLowerCase()}_${route}`;
}

// ---------------------------------------------------------------------------
// Collision handling
// ---------------------------------------------------------------------------

export class NameRegistry {
  private readonly taken: Set<string>;

  constructor(reserved: Iterable<string> = []) {
    this.taken = new Set(reserved);
  }

  /** Claim `name`, or the first free `name_2`, `name_3`, … when it is taken. */
  claim(name: string): string {
    let candidate = name;
    for (let n = 2; this.taken.has(candidate); n++) {
      candidate = `${name}_${n}`;
    }
    if (candidate !== name) {
      console.warn(`[apitools] tool name '${name}' is already taken, using '${candidate}'`);
    }
    this.taken.add(candidate);
    return candidate;
  }
}

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { ConfigError } from "@apitools/core";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { expandEnv, loadConfig, parseConfig, resolveConfigPath } from "./config.js";

const minimal = `
sources:
  - name: procurement
    openapi:
      url: http://localhost:8000/openapi.json
`;

describe("parseConfig", () => {
  it("fills in defaults", () => {
    const config = parseConfig(minimal, "apitools.yaml", {});
    expect(config.name).toBe("apitools");
    expect(config.sources).toEqual([
      {
        name: "procurement",
        type: "openapi",
        enabled: true,
        openapi: { url: "http://localhost:8000/openapi.json", headers: {} },
        toolGeneration: {
          includeAll: true,
          includeEndpoints: [],
          excludeEndpoints: [],
          snakeCaseNames: true,
          simplifiedNames: true,
          toolPrefix: "",
          strictRefs: false,
        },
      },
    ]);
  });

  it("expands environment references", () => {
    const text = `
sources:
  - name: procurement
    openapi:
      url: http://localhost:8000/openapi.json
      headers:
        X-Tenant: "\${TENANT_ID}"
        X-Trace: "\${UNSET_VARIABLE}"
        X-Literal: "prefix-\${TENANT_ID}"
      auth:
        type: bearer
        token: "\${API_TOKEN}"
`;
    const [source] = parseConfig(text, "apitools.yaml", { TENANT_ID: "acme", API_TOKEN: "test-secret" }).sources;
    expect(source?.openapi.headers).toEqual({
      "X-Tenant": "acme",
      "X-Trace": "",
      "X-Literal": "prefix-${TENANT_ID}",
    });
    expect(source?.openapi.auth).toEqual({ type: "bearer", token: "test-secret" });
  });

  it("normalizes the single-source layout", () => {
    const text = `
name: Procurement Assistant
api:
  file: ./openapi.yaml
  baseUrl: http://localhost:8000
toolGeneration:
  toolPrefix: proc_
`;
    const config = parseConfig(text, "apitools.yaml", {});
    expect(config.name).toBe("Procurement Assistant");
    expect(config.sources).toHaveLength(1);
    expect(config.sources[0]?.name).toBe("Procurement Assistant");
    expect(config.sources[0]?.openapi.file).toBe("./openapi.yaml");
    expect(config.sources[0]?.toolGeneration.toolPrefix).toBe("proc_");
  });

  it("requires exactly one of url and file", () => {
    const text = `
sources:
  - name: procurement
    openapi:
      baseUrl: http://localhost:8000
`;
    expect(() => parseConfig(text, "apitools.yaml", {})).toThrow(
      "Invalid config apitools.yaml: sources.0.openapi: Set exactly one of 'url' or 'file'",
    );
  });

  it("rejects duplicate source names", () => {
    const text = `${minimal}  - name: procurement
    openapi:
      file: ./other.yaml
`;
    expect(() => parseConfig(text, "apitools.yaml", {})).toThrow("duplicate source name 'procurement'");
  });

  it("rejects invalid YAML", () => {
    expect(() => parseConfig("sources: [", "apitools.yaml", {})).toThrow(ConfigError);
  });

  it("rejects an empty config", () => {
    expect(() => parseConfig("", "apitools.yaml", {})).toThrow("Invalid config apitools.yaml");
  });
});

describe("expandEnv", () => {
  it("walks arrays and objects", () => {
    expect(expandEnv({ list: ["${A}", 1, { b: "${B}" }] }, { A: "a", B: "b" })).toEqual({
      list: ["a", 1, { b: "b" }],
    });
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "apitools-config-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("resolves relative files against the config directory", async () => {
    const path = join(dir, "apitools.yaml");
    await writeFile(path, "sources:\n  - name: local\n    openapi:\n      file: specs/openapi.yaml\n");

    const config = await loadConfig(path, {});
    expect(config.sources[0]?.openapi.file).toBe(join(dir, "specs", "openapi.yaml"));
  });

  it("fails for a missing file", async () => {
    await expect(loadConfig(join(dir, "missing.yaml"), {})).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("resolveConfigPath", () => {
  it("prefers --config, then the environment, then the default", () => {
    expect(resolveConfigPath(["--config", "conf/tools.yaml"], { APITOOLS_CONFIG: "env.yaml" }, "/work")).toBe(
      resolve("/work", "conf/tools.yaml"),
    );
    expect(resolveConfigPath([], { APITOOLS_CONFIG: "env.yaml" }, "/work")).toBe(resolve("/work", "env.yaml"));
    expect(resolveConfigPath([], {}, "/work")).toBe(resolve("/work", "apitools.yaml"));
  });

  it("requires a value after --config", () => {
    expect(() => resolveConfigPath(["--config"], {}, "/work")).toThrow("Missing value for --config");
  });
});

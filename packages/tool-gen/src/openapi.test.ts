import { UnresolvedReferenceError, type ToolDefinition } from "@apitools/core";
import { afterEach, describe, expect, it, vi } from "vitest";
import { compileTools, describeApi, preferredMediaType } from "./openapi.js";
import { simplifyToolName } from "./naming.js";

const supplierSchema = {
  type: "object",
  properties: { id: { type: "integer" }, name: { type: "string" } },
  required: ["id", "name"],
};

const orderSchema = {
  type: "object",
  properties: { id: { type: "integer" }, status: { type: "string" } },
};

const procurement = {
  openapi: "3.1.0",
  info: { title: "Procurement API", version: "2.1.0", description: "Suppliers and orders" },
  servers: [{ url: "http://localhost:8000" }, { url: "https://procurement.example.com" }],
  paths: {
    "/api/suppliers": {
      get: {
        operationId: "list_suppliers_api_suppliers_get",
        tags: ["suppliers"],
        summary: "List suppliers",
        parameters: [
          { name: "status", in: "query", schema: { type: "string", enum: ["active", "paused"] } },
          { name: "limit", in: "query", schema: { type: "integer", default: 20 }, description: "Page size" },
        ],
        responses: { "200": { description: "OK" } },
      },
    },
    "/api/suppliers/{supplier_id}": {
      parameters: [{ name: "supplier_id", in: "path", required: true, schema: { type: "integer" } }],
      get: {
        operationId: "get_supplier_detail_api_suppliers__supplier_id__get",
        tags: ["suppliers"],
        summary: "Get supplier detail",
        description: "Includes contact info.",
        responses: {
          "200": {
            description: "OK",
            content: { "application/json": { schema: { $ref: "#/components/schemas/Supplier" } } },
          },
        },
      },
    },
    "/api/orders": {
      post: {
        operationId: "create_order_api_orders_post",
        tags: ["orders"],
        summary: "Create order",
        requestBody: {
          required: true,
          content: { "application/json": { schema: { $ref: "#/components/schemas/OrderCreate" } } },
        },
        responses: {
          "201": {
            description: "Created",
            content: { "application/json": { schema: { $ref: "#/components/schemas/Order" } } },
          },
        },
      },
    },
    "/items/{id}": {
      get: { operationId: "getItemById", tags: ["items"], summary: "Fetch one item", responses: {} },
    },
    "/health": {
      get: { summary: "Health check", responses: {} },
    },
    "/batch": {
      put: {
        requestBody: {
          content: {
            "multipart/form-data": { schema: { type: "object" } },
            "application/vnd.api+json": { schema: { type: "array", items: { type: "string" } } },
          },
        },
        responses: {},
      },
    },
    "/orders/{order_id}/approve": {
      post: {
        operationId: "approve_order_api_orders__order_id__approve_post",
        tags: ["orders"],
        parameters: [
          { $ref: "#/components/parameters/OrderId" },
          { name: "X-Request-Id", in: "header", schema: { type: "string" } },
          { name: "session", in: "cookie", schema: { type: "string" } },
        ],
        responses: {},
      },
    },
  },
  components: {
    parameters: {
      OrderId: { name: "order_id", in: "path", required: true, schema: { type: "string" } },
    },
    schemas: {
      Supplier: supplierSchema,
      Order: orderSchema,
      Priority: { type: "string", enum: ["low", "high"], description: "Order priority" },
      OrderCreate: {
        type: "object",
        required: ["supplier_name"],
        properties: {
          supplier_name: { type: "string", description: "Registered supplier name" },
          quantity: { type: "integer", default: 1 },
          priority: { $ref: "#/components/schemas/Priority" },
        },
      },
    },
  },
};

function byName(tools: readonly ToolDefinition[], name: string): ToolDefinition | undefined {
  return tools.find((tool) => tool.name === name);
}

describe("compileTools", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("names every operation in document order", () => {
    expect(compileTools(procurement).map((tool) => tool.name)).toEqual([
      "list_suppliers",
      "get_supplier_detail",
      "create_order",
      "get_item_by_id",
      "get_health",
      "put_batch",
      "approve_order",
    ]);
  });

  it("keeps the raw name and declared identifier", () => {
    const tool = byName(compileTools(procurement), "get_supplier_detail");
    expect(tool?.rawName).toBe("get_supplier_detail_api_suppliers__supplier_id__get");
    expect(tool?.operationId).toBe("get_supplier_detail_api_suppliers__supplier_id__get");

    const health = byName(compileTools(procurement), "get_health");
    expect(health?.rawName).toBe("get_health");
    expect(health?.operationId).toBeUndefined();
  });

  it("extracts query parameters with hints, defaults and enums", () => {
    const tool = byName(compileTools(procurement), "list_suppliers");
    expect(tool?.parameters).toEqual([
      {
        name: "status",
        location: "query",
        required: false,
        description: "",
        typeHint: "string",
        default: undefined,
        enum: ["active", "paused"],
        schema: { type: "string", enum: ["active", "paused"] },
      },
      {
        name: "limit",
        location: "query",
        required: false,
        description: "Page size",
        typeHint: "integer",
        default: 20,
        enum: undefined,
        schema: { type: "integer", default: 20 },
      },
    ]);
    expect(tool?.description).toBe("List suppliers");
    expect(tool?.responseSchema).toBeUndefined();
  });

  it("merges path-item parameters and resolves the response schema", () => {
    const tool = byName(compileTools(procurement), "get_supplier_detail");
    expect(tool?.parameters.map((parameter) => [parameter.name, parameter.location, parameter.required, parameter.typeHint]))
      .toEqual([["supplier_id", "path", true, "integer"]]);
    expect(tool?.responseSchema).toBe(supplierSchema);
    expect(tool?.description).toBe("Get supplier detail\n\nIncludes contact info.");
  });

  it("flattens the request body one level, resolving property references", () => {
    const tool = byName(compileTools(procurement), "create_order");
    expect(tool?.requestBody?.mode).toBe("properties");
    expect(tool?.requestBody?.required).toBe(true);
    expect(tool?.requestBody?.contentType).toBe("application/json");
    expect(tool?.requestBody?.properties).toEqual([
      {
        name: "supplier_name",
        required: true,
        description: "Registered supplier name",
        typeHint: "string",
        default: undefined,
        enum: undefined,
      },
      { name: "quantity", required: false, description: "", typeHint: "integer", default: 1, enum: undefined },
      {
        name: "priority",
        required: false,
        description: "Order priority",
        typeHint: "string",
        default: undefined,
        enum: ["low", "high"],
      },
    ]);
    expect(tool?.responseSchema).toBe(orderSchema);
  });

  it("synthesizes undeclared path placeholders as required strings", () => {
    const tool = byName(compileTools(procurement), "get_item_by_id");
    expect(tool?.parameters).toEqual([
      { name: "id", location: "path", required: true, description: "", typeHint: "string", schema: { type: "string" } },
    ]);
  });

  it("compiles an operation without inputs to empty lists", () => {
    const tool = byName(compileTools(procurement), "get_health");
    expect(tool?.parameters).toEqual([]);
    expect(tool?.requestBody).toBeUndefined();
    expect(tool?.tags).toEqual([]);
  });

  it("uses raw mode for bodies without properties", () => {
    const tool = byName(compileTools(procurement), "put_batch");
    expect(tool?.requestBody).toEqual({
      required: false,
      description: "",
      contentType: "application/vnd.api+json",
      schema: { type: "array", items: { type: "string" } },
      mode: "raw",
      properties: [{ name: "body", required: false, description: "", typeHint: "array" }],
    });
  });

  it("resolves parameter references and drops cookie parameters", () => {
    const tool = byName(compileTools(procurement), "approve_order");
    expect(tool?.parameters.map((parameter) => `${parameter.location}:${parameter.name}`)).toEqual([
      "path:order_id",
      "header:X-Request-Id",
    ]);
  });

  it("lets operation parameters override path-item parameters", () => {
    const tools = compileTools({
      openapi: "3.0.3",
      paths: {
        "/reports": {
          parameters: [{ name: "format", in: "query", schema: { type: "string" } }],
          get: {
            operationId: "getReports",
            parameters: [{ name: "format", in: "query", required: true, schema: { type: "string", enum: ["csv"] } }],
          },
        },
      },
    });
    expect(tools[0]?.parameters).toHaveLength(1);
    expect(tools[0]?.parameters[0]?.required).toBe(true);
    expect(tools[0]?.parameters[0]?.enum).toEqual(["csv"]);
  });

  it("is deterministic", () => {
    expect(compileTools(procurement)).toEqual(compileTools(procurement));
  });

  describe("inclusion", () => {
    it("keeps only listed endpoints when includeAll is off", () => {
      const tools = compileTools(procurement, { includeAll: false, includeEndpoints: ["getItemById", "/health"] });
      expect(tools.map((tool) => tool.name)).toEqual(["get_item_by_id", "get_health"]);
    });

    it("lets exclusion win over inclusion", () => {
      const tools = compileTools(procurement, {
        includeAll: false,
        includeEndpoints: ["getItemById", "/health"],
        excludeEndpoints: ["/health"],
      });
      expect(tools.map((tool) => tool.name)).toEqual(["get_item_by_id"]);
    });

    it("excludes by operation id", () => {
      const tools = compileTools(procurement, { excludeEndpoints: ["create_order_api_orders_post"] });
      expect(byName(tools, "create_order")).toBeUndefined();
      expect(tools).toHaveLength(6);
    });
  });

  describe("naming options", () => {
    it("applies the prefix after simplification", () => {
      const tools = compileTools(procurement, { toolPrefix: "proc_" });
      expect(tools[0]?.name).toBe("proc_list_suppliers");
    });

    it("can keep declared identifiers as they are", () => {
      const tools = compileTools(procurement, { simplifiedNames: false, snakeCaseNames: false });
      expect(tools[0]?.name).toBe("list_suppliers_api_suppliers_get");
      expect(tools[3]?.name).toBe("getItemById");
    });

    it("sanitizes identifiers before simplifying them", () => {
      const document = {
        openapi: "3.0.0",
        paths: { "/item": { get: { operationId: "get_item.item" } } },
      };

      const [tool] = compileTools(document);
      expect(tool?.name).toBe("get_item");
      expect(tool?.rawName).toBe("get_item.item");
      expect(simplifyToolName(tool?.name ?? "")).toBe("get_item");
    });

    it("disambiguates collisions in build order", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const document = {
        openapi: "3.0.0",
        paths: {
          "/a": { get: { operationId: "getItems" } },
          "/b": { get: { operationId: "get_items" } },
        },
      };

      expect(compileTools(document).map((tool) => tool.name)).toEqual(["get_items", "get_items_2"]);
      expect(compileTools(document, { reservedNames: ["get_items"] }).map((tool) => tool.name)).toEqual([
        "get_items_2",
        "get_items_3",
      ]);
      expect(warn).toHaveBeenCalled();
    });
  });

  describe("references", () => {
    const broken = {
      openapi: "3.0.0",
      paths: {
        "/orders": {
          post: {
            operationId: "createOrder",
            requestBody: { content: { "application/json": { schema: { $ref: "#/components/schemas/Missing" } } } },
          },
        },
      },
    };

    it("treats unresolved references as empty schemas by default", () => {
      const [tool] = compileTools(broken);
      expect(tool?.requestBody?.schema).toEqual({});
      expect(tool?.requestBody?.mode).toBe("raw");
    });

    it("fails compilation in strict mode", () => {
      expect(() => compileTools(broken, { strictRefs: true })).toThrow(UnresolvedReferenceError);
    });
  });

  describe("Swagger 2.0", () => {
    const petstore = {
      swagger: "2.0",
      info: { title: "Pets", version: "1.0" },
      host: "pets.test",
      basePath: "/v1",
      schemes: ["http"],
      paths: {
        "/pets/{petId}": {
          get: {
            operationId: "getPetById",
            parameters: [{ name: "petId", in: "path", required: true, type: "integer" }],
            responses: { "200": { description: "OK", schema: { $ref: "#/definitions/Pet" } } },
          },
        },
        "/pets": {
          post: {
            operationId: "addPet",
            parameters: [{ name: "body", in: "body", required: true, schema: { $ref: "#/definitions/Pet" } }],
            responses: {},
          },
        },
      },
      definitions: {
        Pet: { type: "object", required: ["name"], properties: { name: { type: "string" } } },
      },
    };

    it("reads top-level parameter types and body parameters", () => {
      const [getPet, addPet] = compileTools(petstore);
      expect(getPet?.name).toBe("get_pet_by_id");
      expect(getPet?.parameters[0]?.typeHint).toBe("integer");
      expect(getPet?.responseSchema).toBe(petstore.definitions.Pet);

      expect(addPet?.name).toBe("add_pet");
      expect(addPet?.parameters).toEqual([]);
      expect(addPet?.requestBody?.contentType).toBe("application/json");
      expect(addPet?.requestBody?.properties.map((property) => [property.name, property.required])).toEqual([
        ["name", true],
      ]);
    });

    it("derives the base URL from host and basePath", () => {
      expect(describeApi(petstore).baseUrl).toBe("http://pets.test/v1");
    });
  });
});

describe("describeApi", () => {
  it("reads info and the first server", () => {
    expect(describeApi(procurement)).toEqual({
      title: "Procurement API",
      version: "2.1.0",
      description: "Suppliers and orders",
      baseUrl: "http://localhost:8000",
    });
  });

  it("has no base URL without servers", () => {
    expect(describeApi({ openapi: "3.0.0" })).toEqual({
      title: "API",
      version: "1.0.0",
      description: "",
      baseUrl: undefined,
    });
  });
});

describe("preferredMediaType", () => {
  it("prefers application/json, then json flavors, then */*", () => {
    expect(preferredMediaType({ "*/*": {}, "application/problem+json": {}, "application/json": {} })?.[0]).toBe(
      "application/json",
    );
    expect(preferredMediaType({ "*/*": {}, "application/problem+json": {} })?.[0]).toBe("application/problem+json");
    expect(preferredMediaType({ "*/*": {} })?.[0]).toBe("*/*");
    expect(preferredMediaType({ "text/csv": {} })).toBeUndefined();
  });
});

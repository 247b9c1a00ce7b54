import { describe, expect, it } from "vitest";
import { describeTool, summarizeCatalog, typeLabel } from "./summary.js";
import { defineTool } from "./tools.js";

const listSuppliers = defineTool({
  name: "list_suppliers",
  httpMethod: "GET",
  pathTemplate: "/suppliers",
  parameters: [
    {
      name: "status",
      location: "query",
      required: false,
      description: "Filter by status",
      typeHint: "string",
      enum: ["active", "paused"],
      schema: { type: "string", enum: ["active", "paused"] },
    },
  ],
  tags: ["suppliers"],
  description: "List suppliers\n\nReturns every supplier visible to the caller.",
});

const createOrder = defineTool({
  name: "create_order",
  httpMethod: "POST",
  pathTemplate: "/suppliers/{supplier_id}/orders",
  parameters: [
    { name: "supplier_id", location: "path", required: true, description: "", typeHint: "integer", schema: {} },
  ],
  requestBody: {
    required: true,
    description: "",
    contentType: "application/json",
    schema: {},
    mode: "properties",
    properties: [{ name: "quantity", required: true, description: "How many units", typeHint: "integer" }],
  },
  tags: ["orders", "suppliers"],
  description: "Create an order",
});

const health = defineTool({
  name: "health",
  httpMethod: "GET",
  pathTemplate: "/health",
  parameters: [],
  tags: [],
  description: "",
});

describe("summarizeCatalog", () => {
  it("groups by tag in first-seen order", () => {
    expect(summarizeCatalog([listSuppliers, createOrder, health])).toBe(
      [
        "### suppliers",
        "- `list_suppliers` (GET): List suppliers",
        "- `create_order` (POST): Create an order",
        "",
        "### orders",
        "- `create_order` (POST): Create an order",
        "",
        "### misc",
        "- `health` (GET)",
      ].join("\n"),
    );
  });

  it("is empty for an empty catalog", () => {
    expect(summarizeCatalog([])).toBe("");
  });
});

describe("describeTool", () => {
  it("lists parameters and body properties with types", () => {
    expect(describeTool(createOrder)).toBe(
      [
        "`create_order` POST /suppliers/{supplier_id}/orders",
        "  Create an order",
        "  - `supplier_id` (path, required): number",
        "  - `quantity` (body, required): number. How many units",
      ].join("\n"),
    );
  });

  it("renders enums as literal unions", () => {
    expect(describeTool(listSuppliers)).toBe(
      [
        "`list_suppliers` GET /suppliers",
        "  List suppliers",
        '  - `status` (query, optional): "active" | "paused". Filter by status',
      ].join("\n"),
    );
  });

  it("marks argument-less tools", () => {
    expect(describeTool(health)).toBe("`health` GET /health\n  (no arguments)");
  });
});

describe("typeLabel", () => {
  it("maps JSON schema types", () => {
    expect(typeLabel("integer")).toBe("number");
    expect(typeLabel("array")).toBe("unknown[]");
    expect(typeLabel("object")).toBe("Record<string, unknown>");
    expect(typeLabel("file")).toBe("unknown");
  });
});

import { describe, expect, test } from "vitest";
import { jsonSchemaToTypeString, jsonSchemaToZod } from "./json-schema-to-ts.js";
import { createSchemaResolver } from "./schema-resolver.js";

describe("jsonSchemaToTypeString", () => {
  test("primitives", () => {
    expect(jsonSchemaToTypeString({ type: "string" })).toBe("string");
    expect(jsonSchemaToTypeString({ type: "number" })).toBe("number");
    expect(jsonSchemaToTypeString({ type: "integer" })).toBe("number");
    expect(jsonSchemaToTypeString({ type: "boolean" })).toBe("boolean");
    expect(jsonSchemaToTypeString({ type: "null" })).toBe("null");
  });

  test("object with properties", () => {
    const schema = {
      type: "object",
      properties: {
        name: { type: "string" },
        "unit-price": { type: "number" },
      },
      required: ["name"],
    };
    expect(jsonSchemaToTypeString(schema)).toBe('{ name: string; "unit-price"?: number }');
  });

  test("object with no properties", () => {
    expect(jsonSchemaToTypeString({ type: "object" })).toBe("Record<string, unknown>");
    expect(
      jsonSchemaToTypeString({ type: "object", additionalProperties: { type: "integer" } }),
    ).toBe("Record<string, number>");
  });

  test("array", () => {
    expect(jsonSchemaToTypeString({ type: "array", items: { type: "string" } })).toBe("Array<string>");
    expect(jsonSchemaToTypeString({ type: "array" })).toBe("Array<unknown>");
  });

  test("enum", () => {
    expect(jsonSchemaToTypeString({ enum: ["a", "b", 3] })).toBe('"a" | "b" | 3');
  });

  test("anyOf collapses duplicate members", () => {
    expect(
      jsonSchemaToTypeString({ anyOf: [{ type: "integer" }, { type: "number" }, { type: "null" }] }),
    ).toBe("number | null");
  });

  test("nullable type arrays use the non-null entry", () => {
    expect(jsonSchemaToTypeString({ type: ["null", "string"] })).toBe("string");
  });

  test("implicit object (no type but has properties)", () => {
    const schema = { properties: { query: { type: "string" } }, required: ["query"] };
    expect(jsonSchemaToTypeString(schema)).toBe("{ query: string }");
  });

  test("references need a resolver", () => {
    const document = {
      components: {
        schemas: {
          Supplier: { type: "object", properties: { id: { type: "integer" } }, required: ["id"] },
        },
      },
    };
    const schema = { type: "array", items: { $ref: "#/components/schemas/Supplier" } };

    expect(jsonSchemaToTypeString(schema)).toBe("Array<unknown>");
    expect(jsonSchemaToTypeString(schema, { resolver: createSchemaResolver(document) })).toBe(
      "Array<{ id: number }>",
    );
  });

  test("recursive references stop at the cycle", () => {
    const document = {
      components: {
        schemas: {
          Node: { type: "object", properties: { next: { $ref: "#/components/schemas/Node" } } },
        },
      },
    };
    expect(
      jsonSchemaToTypeString({ $ref: "#/components/schemas/Node" }, { resolver: createSchemaResolver(document) }),
    ).toBe("{ next?: unknown }");
  });
});

describe("jsonSchemaToZod", () => {
  test("string validates correctly", () => {
    const schema = jsonSchemaToZod({ type: "string" });
    expect(schema.safeParse("hello").success).toBe(true);
    expect(schema.safeParse(123).success).toBe(false);
  });

  test("integer rejects fractions", () => {
    const schema = jsonSchemaToZod({ type: "integer" });
    expect(schema.safeParse(42).success).toBe(true);
    expect(schema.safeParse(4.2).success).toBe(false);
  });

  test("object with required fields", () => {
    const schema = jsonSchemaToZod({
      type: "object",
      properties: {
        name: { type: "string" },
        age: { type: "number" },
      },
      required: ["name"],
    });

    expect(schema.safeParse({ name: "Alice" }).success).toBe(true);
    expect(schema.safeParse({ name: "Alice", age: 30 }).success).toBe(true);
    expect(schema.safeParse({}).success).toBe(false);
  });

  test("array of strings", () => {
    const schema = jsonSchemaToZod({ type: "array", items: { type: "string" } });
    expect(schema.safeParse(["a", "b"]).success).toBe(true);
    expect(schema.safeParse([1, 2]).success).toBe(false);
  });

  test("enum", () => {
    const schema = jsonSchemaToZod({ enum: ["a", "b", "c"] });
    expect(schema.safeParse("a").success).toBe(true);
    expect(schema.safeParse("d").success).toBe(false);
  });

  test("nullable and description", () => {
    const schema = jsonSchemaToZod({ type: "string", nullable: true, description: "Supplier name" });
    expect(schema.safeParse(null).success).toBe(true);
    expect(schema.description).toBe("Supplier name");
  });

  test("unions", () => {
    const schema = jsonSchemaToZod({ oneOf: [{ type: "string" }, { type: "boolean" }] });
    expect(schema.safeParse(true).success).toBe(true);
    expect(schema.safeParse(1).success).toBe(false);
  });
});

import { describe, it, expect } from "vitest";
import { GenerationInvariantError } from "../errors.js";
import { parseSchema } from "../parser/parser.js";
import type { Module } from "../schema/ir.js";
import { generate, generateToolSpecs } from "./generate.js";
import type { ToolSpec } from "./tool-spec.js";

const ROUTER_NAME = {
  name: "router_name",
  type: "string",
  description: "Name of the device the operation targets",
  required: true,
};

function moduleOf(text: string): Module {
  return parseSchema(text).module;
}

function tool(tools: ToolSpec[], name: string): ToolSpec {
  const found = tools.find((t) => t.name === name);
  if (!found) throw new Error(`no tool named ${name}`);
  return found;
}

const SERVICE = `
  module m {
    container service {
      leaf service-name { type string; mandatory true; }
      leaf enabled { type boolean; default true; }
    }
  }
`;

const ENDPOINT = `
  module m {
    list endpoint {
      key address;
      leaf address { type string; }
      leaf port { type uint16; default 80; }
    }
  }
`;

describe("generate", () => {
  it("builds get, create and delete for a container", () => {
    const tools = generate(moduleOf(SERVICE));

    expect(tools.map((t) => [t.name, t.operation])).toEqual([
      ["get_m_service", "get"],
      ["create_m_service", "create"],
      ["delete_m_service", "delete"],
    ]);
    expect(tool(tools, "get_m_service").parameters).toEqual([ROUTER_NAME]);
    expect(tool(tools, "create_m_service").parameters).toEqual([
      ROUTER_NAME,
      {
        name: "service_name",
        schemaName: "service-name",
        type: "string",
        description: "",
        required: true,
      },
      {
        name: "enabled",
        schemaName: "enabled",
        type: "boolean",
        description: "",
        required: false,
        default: true,
      },
    ]);
  });

  it("builds get, add-item and delete for a keyed list", () => {
    const tools = generate(moduleOf(ENDPOINT));

    expect(tools.map((t) => t.name)).toEqual([
      "get_m_endpoint",
      "add_m_endpoint_item",
      "delete_m_endpoint",
    ]);
    expect(
      tool(tools, "add_m_endpoint_item").parameters.map((p) => [p.name, p.required, p.default]),
    ).toEqual([
      ["router_name", true, undefined],
      ["address", true, undefined],
      ["port", false, 80],
    ]);
    expect(tool(tools, "delete_m_endpoint").parameters).toEqual([
      ROUTER_NAME,
      {
        name: "confirm",
        type: "boolean",
        description: "Must be true to carry out the deletion",
        required: true,
        default: false,
      },
    ]);
  });

  it("exposes rpc input but not output as parameters", () => {
    const tools = generate(
      moduleOf(`
        module m {
          rpc start-service {
            input { leaf service-name { type string; mandatory true; } }
            output { leaf status { type string; } }
          }
        }
      `),
    );

    expect(tools).toHaveLength(1);
    expect(tools[0].name).toBe("invoke_m_start-service");
    expect(tools[0].operation).toBe("invoke");
    expect(tools[0].description).toBe("Invoke m/start-service. Returns status.");
    expect(tools[0].parameters.map((p) => p.name)).toEqual(["router_name", "service_name"]);
  });

  it("qualifies names with the enclosing scope", () => {
    const tools = generate(
      moduleOf(`
        module m {
          container a { container status { leaf up { type boolean; } } }
          container b { container status { leaf up { type boolean; } } }
        }
      `),
    );

    expect(tools.map((t) => t.name)).toEqual([
      "get_m_a",
      "create_m_a",
      "delete_m_a",
      "get_m_a_status",
      "create_m_a_status",
      "delete_m_a_status",
      "get_m_b",
      "create_m_b",
      "delete_m_b",
      "get_m_b_status",
      "create_m_b_status",
      "delete_m_b_status",
    ]);
  });

  it("visits nested containers before nested lists, and rpcs last", () => {
    const tools = generate(
      moduleOf(`
        module m {
          rpc reboot { }
          container top {
            list entry { key id; leaf id { type string; } }
            container inner { }
          }
        }
      `),
    );

    expect(tools.filter((t) => t.operation === "get").map((t) => t.name)).toEqual([
      "get_m_top",
      "get_m_top_inner",
      "get_m_top_entry",
    ]);
    expect(tools[tools.length - 1].name).toBe("invoke_m_reboot");
  });

  it("puts required parameters before optional ones", () => {
    const tools = generate(
      moduleOf(`
        module m {
          container c {
            leaf first { type string; }
            leaf second { type string; mandatory true; }
            leaf third { type int32; default 3; }
            leaf fourth { type string; mandatory true; }
          }
        }
      `),
    );

    expect(tool(tools, "create_m_c").parameters.map((p) => p.name)).toEqual([
      "router_name",
      "second",
      "fourth",
      "first",
      "third",
    ]);
    for (const spec of tools) {
      const firstOptional = spec.parameters.findIndex((p) => !p.required);
      const lastRequired = spec.parameters.map((p) => p.required).lastIndexOf(true);
      if (firstOptional !== -1) expect(lastRequired).toBeLessThan(firstOptional);
    }
  });

  it("suffixes colliding tool names", () => {
    const { tools, diagnostics } = generateToolSpecs(
      moduleOf(`
        module m {
          container a { container b { } }
          container a_b { }
        }
      `),
    );

    expect(tools.map((t) => t.name)).toEqual([
      "get_m_a",
      "create_m_a",
      "delete_m_a",
      "get_m_a_b",
      "create_m_a_b",
      "delete_m_a_b",
      "get_m_a_b_2",
      "create_m_a_b_2",
      "delete_m_a_b_2",
    ]);
    expect(new Set(tools.map((t) => t.name)).size).toBe(tools.length);
    expect(diagnostics.map((d) => d.code)).toEqual([
      "duplicate-name",
      "duplicate-name",
      "duplicate-name",
    ]);
  });

  it("skips a leaf that clashes with the identity parameter", () => {
    const { tools, diagnostics } = generateToolSpecs(
      moduleOf(`
        module m {
          container c {
            leaf router-name { type string; }
            leaf mtu { type uint16; }
          }
        }
      `),
    );

    expect(tool(tools, "create_m_c").parameters.map((p) => p.name)).toEqual([
      "router_name",
      "mtu",
    ]);
    expect(diagnostics).toEqual([
      {
        code: "duplicate-name",
        severity: "warning",
        message: 'parameter "router-name" clashes with "router_name" and is skipped',
        path: ["m", "c"],
      },
    ]);
  });

  it("renames or drops the identity parameter on request", () => {
    const renamed = generate(moduleOf(SERVICE), { identity: { name: "device" } });
    expect(tool(renamed, "get_m_service").parameters).toEqual([
      { ...ROUTER_NAME, name: "device" },
    ]);

    const dropped = generate(moduleOf(SERVICE), { identity: false });
    expect(tool(dropped, "get_m_service").parameters).toEqual([]);
    expect(tool(dropped, "create_m_service").parameters.map((p) => p.name)).toEqual([
      "service_name",
      "enabled",
    ]);
  });

  it("adds update tools on request", () => {
    const tools = generate(moduleOf(ENDPOINT), { includeUpdate: true });

    expect(tools.map((t) => t.name)).toEqual([
      "get_m_endpoint",
      "add_m_endpoint_item",
      "update_m_endpoint",
      "delete_m_endpoint",
    ]);
    expect(
      tool(tools, "update_m_endpoint").parameters.map((p) => [p.name, p.required, p.default]),
    ).toEqual([
      ["router_name", true, undefined],
      ["address", true, undefined],
      ["port", false, undefined],
    ]);
  });

  it("reports an unkeyed list, or throws in strict mode", () => {
    const module = moduleOf(`
      module m {
        list neighbor { leaf address { type string; } }
      }
    `);

    const { tools, diagnostics } = generateToolSpecs(module);
    expect(tools.map((t) => t.name)).toEqual([
      "get_m_neighbor",
      "add_m_neighbor_item",
      "delete_m_neighbor",
    ]);
    expect(diagnostics).toEqual([
      {
        code: "generation-invariant-violation",
        severity: "warning",
        message: 'list "neighbor" has no key; entries cannot be addressed',
        path: ["m", "neighbor"],
      },
    ]);

    expect(() => generate(module, { mode: "strict" })).toThrow(GenerationInvariantError);
  });

  it("marks read-only and destructive tools", () => {
    const tools = generate(moduleOf(SERVICE));
    expect(tool(tools, "get_m_service").annotations).toEqual({ readOnlyHint: true });
    expect(tool(tools, "delete_m_service").annotations).toEqual({ destructiveHint: true });
  });

  it("returns no tools for an empty module", () => {
    expect(generate(moduleOf("module m { }"))).toEqual([]);
  });

  it("produces equal output for structurally equal modules", () => {
    const first = generate(moduleOf(SERVICE));
    const second = generate(moduleOf(SERVICE));
    expect(second).toEqual(first);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it("throws a TypeError without a module", () => {
    expect(() => generate(null)).toThrow(TypeError);
  });
});

import { describe, it, expect } from "vitest";
import { analyzeModel, fragmentsToModule } from "./analyzer.js";
import type { NavigableNode } from "./navigable.js";
import { snapshotNode, type SnapshotNodeData } from "./snapshot.js";

const tree: SnapshotNodeData = {
  name: "root",
  children: [
    {
      name: "vpn",
      keyed: true,
      create: true,
      delete: true,
      key: "name",
      entries: [
        {
          name: "blue",
          children: [
            { name: "name", value: "blue" },
            { name: "mtu", value: 1500 },
            { name: "enabled", value: "true" },
          ],
        },
      ],
    },
    {
      name: "system",
      children: [
        { name: "hostname", value: "r1" },
        { name: "ntp", children: [{ name: "server", value: "10.0.0.1" }] },
      ],
    },
    { name: "version", value: "7.1" },
    { name: "log", children: [{ name: "entry", value: "boot" }] },
  ],
};

function fakeNode(
  name: string,
  overrides: Partial<Omit<NavigableNode, "name">> = {},
): NavigableNode {
  return {
    name,
    children: () => [],
    isKeyed: () => false,
    supportsCreate: () => false,
    supportsDelete: () => false,
    scalarValue: () => undefined,
    ...overrides,
  };
}

describe("analyzeModel", () => {
  it("classifies lists, containers and scalar leafs", () => {
    const result = analyzeModel(snapshotNode(tree));

    expect([...result.fragments.keys()]).toEqual(["vpn", "system"]);
    expect(result.diagnostics).toEqual([]);
    expect(result.parameters).toEqual([
      {
        name: "version",
        type: "string",
        schemaType: "string",
        description: "",
        required: false,
      },
    ]);

    const vpn = result.fragments.get("vpn");
    expect(vpn?.kind).toBe("service");
    expect(vpn?.entity).toEqual({
      kind: "list",
      node: {
        name: "vpn",
        description: "",
        key: "name",
        parameters: [
          { name: "name", type: "string", schemaType: "string", description: "", required: true },
          { name: "mtu", type: "integer", schemaType: "number", description: "", required: false },
          { name: "enabled", type: "boolean", schemaType: "string", description: "", required: false },
        ],
        containers: [],
        lists: [],
      },
    });

    const system = result.fragments.get("system");
    expect(system?.kind).toBe("config");
    expect(system?.entity.kind).toBe("container");
    expect(system?.entity.node.parameters.map((p) => p.name)).toEqual(["hostname"]);
    if (system?.entity.kind === "container") {
      expect(system.entity.node.containers.map((c) => c.name)).toEqual(["ntp"]);
    }
  });

  it("skips ignored children", () => {
    const result = analyzeModel(snapshotNode(tree));
    expect(result.fragments.has("log")).toBe(false);

    const kept = analyzeModel(snapshotNode(tree), { ignore: [] });
    expect(kept.fragments.get("log")?.kind).toBe("config");
  });

  it("takes the service predicate as an option", () => {
    const result = analyzeModel(snapshotNode(tree), {
      isService: (node) => node.name === "system",
    });
    expect(result.fragments.get("vpn")?.kind).toBe("config");
    expect(result.fragments.get("system")?.kind).toBe("service");
  });

  it("records a throwing probe and keeps walking siblings", () => {
    const root = fakeNode("root", {
      children: () => [
        fakeNode("broken", {
          isKeyed: () => {
            throw new Error("permission denied");
          },
        }),
        fakeNode("mtu", { scalarValue: () => 9000 }),
      ],
    });

    const result = analyzeModel(root);

    expect(result.parameters.map((p) => p.name)).toEqual(["mtu"]);
    expect(result.parameters[0].type).toBe("integer");
    expect(result.diagnostics).toEqual([
      {
        code: "reflection-access-error",
        severity: "error",
        message: "isKeyed() failed: permission denied",
        path: ["root", "broken"],
      },
    ]);
  });

  it("returns an empty result when the root cannot be listed", () => {
    const root = fakeNode("root", {
      children: () => {
        throw new Error("session closed");
      },
    });

    const result = analyzeModel(root);

    expect(result.fragments.size).toBe(0);
    expect(result.parameters).toEqual([]);
    expect(result.diagnostics.map((d) => d.message)).toEqual([
      "listing children failed: session closed",
    ]);
  });

  it("types a leaf without a sample value as string", () => {
    const root = fakeNode("root", { children: () => [fakeNode("description")] });

    const result = analyzeModel(root);

    expect(result.parameters).toEqual([
      {
        name: "description",
        type: "string",
        schemaType: "undefined",
        description: "",
        required: false,
      },
    ]);
    expect(result.diagnostics).toEqual([
      {
        code: "unknown-type",
        severity: "warning",
        message: '"description" has no sample value; using string',
        path: ["root", "description"],
      },
    ]);
  });

  it("skips a keyed node that does not support create", () => {
    const result = analyzeModel(
      snapshotNode({
        name: "root",
        children: [
          {
            name: "arp",
            keyed: true,
            key: "ip",
            entries: [{ name: "e1", children: [{ name: "ip", value: "10.0.0.1" }] }],
          },
          { name: "hostname", value: "r1" },
        ],
      }),
    );

    expect([...result.fragments.keys()]).toEqual([]);
    expect(result.parameters.map((p) => p.name)).toEqual(["hostname"]);
    expect(result.diagnostics).toEqual([
      {
        code: "unknown-type",
        severity: "info",
        message: '"arp" is keyed but entries cannot be created; skipped',
        path: ["root", "arp"],
      },
    ]);
  });

  it("does not follow a node that contains itself", () => {
    const loop: NavigableNode = fakeNode("loop", { children: () => [loop] });
    const root = fakeNode("root", { children: () => [loop] });

    const result = analyzeModel(root);

    expect(result.fragments.get("loop")?.entity.node).toEqual({
      name: "loop",
      description: "",
      parameters: [],
      containers: [],
      lists: [],
    });
    expect(result.diagnostics.map((d) => d.path)).toEqual([["root", "loop", "loop"]]);
  });

  it("stops at the depth limit", () => {
    const result = analyzeModel(snapshotNode(tree), { maxDepth: 1 });

    const system = result.fragments.get("system");
    if (system?.entity.kind !== "container") {
      throw new Error("expected system to be a container");
    }
    expect(system.entity.node.containers).toEqual([]);
    expect(result.diagnostics).toEqual([
      {
        code: "depth-limit-exceeded",
        severity: "error",
        message: '"ntp" is nested deeper than 1 levels and is skipped',
        path: ["root", "system", "ntp"],
      },
    ]);
  });

  it("synthesizes the key of a list without entries", () => {
    const root = snapshotNode({
      name: "root",
      children: [{ name: "acl", keyed: true, create: true, key: "acl-name" }],
    });

    const result = analyzeModel(root);

    const acl = result.fragments.get("acl");
    expect(acl?.kind).toBe("config");
    expect(acl?.entity.node.parameters).toEqual([
      {
        name: "acl-name",
        type: "string",
        schemaType: "undefined",
        description: "",
        required: true,
      },
    ]);
    expect(result.diagnostics.map((d) => [d.code, d.severity])).toEqual([
      ["unknown-type", "info"],
      ["unknown-type", "warning"],
    ]);
  });

  it("records sampled values as defaults on request, never for the key", () => {
    const result = analyzeModel(snapshotNode(tree), { sampleDefaults: true });

    const params = result.fragments.get("vpn")?.entity.node.parameters ?? [];
    expect(params.map((p) => [p.name, p.default])).toEqual([
      ["name", undefined],
      ["mtu", 1500],
      ["enabled", true],
    ]);
  });

  it("reports duplicate child names", () => {
    const root = fakeNode("root", {
      children: () => [
        fakeNode("mtu", { scalarValue: () => 1500 }),
        fakeNode("mtu", { scalarValue: () => 9000 }),
      ],
    });

    const result = analyzeModel(root);

    expect(result.parameters).toHaveLength(1);
    expect(result.diagnostics[0].code).toBe("duplicate-name");
  });
});

describe("fragmentsToModule", () => {
  it("assembles every fragment by default", () => {
    const module = fragmentsToModule(analyzeModel(snapshotNode(tree)), { name: "live" });

    expect(module.name).toBe("live");
    expect(module.lists.map((l) => l.name)).toEqual(["vpn"]);
    expect(module.containers.map((c) => c.name)).toEqual(["system"]);
    expect(module.parameters.map((p) => p.name)).toEqual(["version"]);
    expect(module.rpcs).toEqual([]);
    expect(Object.isFrozen(module)).toBe(true);
  });

  it("keeps only service fragments when asked", () => {
    const module = fragmentsToModule(analyzeModel(snapshotNode(tree)), {
      name: "live",
      include: "services",
    });

    expect(module.lists.map((l) => l.name)).toEqual(["vpn"]);
    expect(module.containers).toEqual([]);
    expect(module.parameters).toEqual([]);
  });
});

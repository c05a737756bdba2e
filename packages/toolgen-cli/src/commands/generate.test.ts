import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { GenerationInvariantError, UserInputError } from "@yang-toolgen/core";
import type { ResolvedConfig } from "../config/types.js";
import { runGenerate } from "./generate.js";

const SERVICE = `
module edge {
  container service {
    leaf service-name { type string; mandatory true; }
  }
}
`;

const SNAPSHOT = {
  name: "root",
  children: [{ name: "system", children: [{ name: "hostname", value: "r1" }] }],
};

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "yang-toolgen-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function configFor(input: string, overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
  return {
    input,
    from: "text",
    mode: "best-effort",
    includeUpdate: false,
    servicesOnly: false,
    verbose: false,
    ...overrides,
  };
}

describe("runGenerate", () => {
  it("generates from schema text without writing files", async () => {
    const input = path.join(dir, "edge.yang");
    await writeFile(input, SERVICE);

    const summary = await runGenerate(configFor(input));

    expect(summary.module).toBe("edge");
    expect(summary.tools).toBe(3);
    expect(summary.source).toContain("export async function get_edge_service(");
    expect(summary.outPath).toBeUndefined();
    expect(summary.manifestPath).toBeUndefined();
  });

  it("writes source and manifest, creating directories", async () => {
    const input = path.join(dir, "edge.yang");
    await writeFile(input, SERVICE);
    const out = path.join(dir, "gen", "edge.ts");
    const manifest = path.join(dir, "gen", "edge.tools.json");

    const summary = await runGenerate(configFor(input, { out, manifest }));

    expect(summary.outPath).toBe(out);
    expect(await readFile(out, "utf8")).toBe(summary.source);
    const written: unknown = JSON.parse(await readFile(manifest, "utf8"));
    expect(written).toMatchObject({ generator: "yang-toolgen", module: "edge" });
  });

  it("names a snapshot module after its file", async () => {
    const input = path.join(dir, "r1.json");
    await writeFile(input, JSON.stringify(SNAPSHOT));

    const summary = await runGenerate(configFor(input, { from: "snapshot", identity: false }));

    expect(summary.module).toBe("r1");
    expect(summary.source).toContain("export async function get_r1_system(");
  });

  it("prefers an explicit module name for snapshots", async () => {
    const input = path.join(dir, "r1.json");
    await writeFile(input, JSON.stringify(SNAPSHOT));

    const summary = await runGenerate(
      configFor(input, { from: "snapshot", moduleName: "core" }),
    );

    expect(summary.module).toBe("core");
  });

  it("reports a missing input file", async () => {
    await expect(runGenerate(configFor(path.join(dir, "missing.yang")))).rejects.toThrow(
      UserInputError,
    );
  });

  it("reports a snapshot that is not JSON", async () => {
    const input = path.join(dir, "broken.json");
    await writeFile(input, "{ name:");

    await expect(runGenerate(configFor(input, { from: "snapshot" }))).rejects.toThrow(
      /broken\.json is not valid JSON/,
    );
  });

  it("stops in strict mode on error diagnostics", async () => {
    const input = path.join(dir, "open.yang");
    await writeFile(input, "module m { container a {");

    await expect(runGenerate(configFor(input, { mode: "strict" }))).rejects.toThrow(
      GenerationInvariantError,
    );
  });
});

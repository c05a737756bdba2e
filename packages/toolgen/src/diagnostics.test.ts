import { describe, it, expect } from "vitest";
import { DiagnosticCollector, formatDiagnostic, hasErrors } from "./diagnostics.js";

describe("DiagnosticCollector", () => {
  it("fills in the default severity of each code", () => {
    const diagnostics = new DiagnosticCollector();
    diagnostics.report({ code: "unknown-type", message: "a" });
    diagnostics.report({ code: "reflection-access-error", message: "b" });
    diagnostics.report({ code: "structural-parse-error", severity: "warning", message: "c" });

    expect(diagnostics.size).toBe(3);
    expect(diagnostics.toArray().map((d) => d.severity)).toEqual(["warning", "error", "warning"]);
  });

  it("hands out copies", () => {
    const diagnostics = new DiagnosticCollector();
    diagnostics.toArray().push({ code: "unknown-type", severity: "info", message: "x" });
    expect(diagnostics.size).toBe(0);
  });
});

describe("hasErrors", () => {
  it("looks for error severity only", () => {
    expect(hasErrors([{ code: "unknown-type", severity: "warning", message: "x" }])).toBe(false);
    expect(hasErrors([{ code: "unknown-type", severity: "error", message: "x" }])).toBe(true);
  });
});

describe("formatDiagnostic", () => {
  it("renders location and path when present", () => {
    expect(
      formatDiagnostic({
        code: "structural-parse-error",
        severity: "error",
        message: 'block "container c" is never closed',
        location: { line: 4, column: 3 },
        path: ["m", "c"],
      }),
    ).toBe('error structural-parse-error 4:3 [m/c] block "container c" is never closed');
    expect(formatDiagnostic({ code: "missing-module", severity: "warning", message: "none" })).toBe(
      "warning missing-module none",
    );
  });
});

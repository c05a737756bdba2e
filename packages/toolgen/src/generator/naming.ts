import type { DiagnosticCollector } from "../diagnostics.js";

/**
 * Identifier form of a schema name: `service-name` becomes `service_name`.
 */
export function parameterName(schemaName: string): string {
  return schemaName.replace(/[^A-Za-z0-9_]/g, "_");
}

/**
 * Tool name for an entity scope. The scope is the module name followed by
 * the enclosing container and list names, so entities sharing a local name
 * at different levels get distinct tools (`get_m_a_status`, `get_m_b_status`).
 * Schema spelling is kept: `invoke_m_start-service`.
 */
export function toolName(
  prefix: string,
  scope: ReadonlyArray<string>,
  suffix?: string,
): string {
  return [prefix, ...scope, ...(suffix ? [suffix] : [])].join("_");
}

/**
 * Hands out names once per generation pass, suffixing repeats with `_2`,
 * `_3` and so on.
 */
export class NameRegistry {
  private readonly taken = new Set<string>();

  constructor(private readonly diagnostics: DiagnosticCollector) {}

  claim(name: string, path: ReadonlyArray<string>): string {
    if (!this.taken.has(name)) {
      this.taken.add(name);
      return name;
    }
    let n = 2;
    while (this.taken.has(`${name}_${n}`)) n++;
    const unique = `${name}_${n}`;
    this.taken.add(unique);
    this.diagnostics.report({
      code: "duplicate-name",
      message: `tool name "${name}" is already taken; using "${unique}"`,
      path,
    });
    return unique;
  }
}

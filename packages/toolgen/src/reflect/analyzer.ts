/**
 * Reflective route of the pipeline: a live configuration tree to Schema IR.
 *
 * The analyzer walks a `NavigableNode` graph by capability probing and
 * classifies every child:
 *
 * - list-like: keyed and supports create; its shape is sampled from the
 *   first entry
 * - container-like: not keyed and has named children
 * - scalar leaf: anything else, typed from its live value
 *
 * Each list or container directly under the root becomes a fragment, tagged
 * `service` when the service predicate holds and `config` otherwise. Every
 * probe is isolated: a throwing node is reported and skipped and the walk
 * carries on with its siblings, so a partial result is always returned.
 */
import {
  DEFAULT_IGNORED_CHILDREN,
  DEFAULT_MAX_DEPTH,
} from "../constants.js";
import { DiagnosticCollector, type Diagnostic } from "../diagnostics.js";
import {
  deepFreeze,
  type Container,
  type ListNode,
  type Module,
  type Parameter,
} from "../schema/ir.js";
import {
  defaultFromValue,
  describeRuntimeKind,
  inferTypeFromValue,
} from "../schema/type-map.js";
import type { NavigableNode } from "./navigable.js";

export type FragmentKind = "service" | "config";

export interface NodeCapabilities {
  keyed: boolean;
  canCreate: boolean;
  canDelete: boolean;
}

/**
 * Decides whether a top-level list or container is an independently
 * manageable service.
 */
export type ServicePredicate = (
  node: NavigableNode,
  capabilities: NodeCapabilities,
) => boolean;

export const supportsCreateAndDelete: ServicePredicate = (_node, capabilities) =>
  capabilities.canCreate && capabilities.canDelete;

export type FragmentEntity =
  | { kind: "container"; node: Container }
  | { kind: "list"; node: ListNode };

export interface Fragment {
  name: string;
  kind: FragmentKind;
  capabilities: NodeCapabilities;
  entity: FragmentEntity;
}

export interface AnalyzeOptions {
  maxDepth?: number;
  isService?: ServicePredicate;
  /**
   * Child names skipped at every level.
   */
  ignore?: ReadonlyArray<string>;
  /**
   * Record each sampled scalar value as the parameter's default.
   */
  sampleDefaults?: boolean;
}

export interface AnalysisResult {
  /**
   * Top-level fragments by name, in discovery order.
   */
  fragments: ReadonlyMap<string, Fragment>;
  /**
   * Scalar leafs found directly under the root.
   */
  parameters: ReadonlyArray<Parameter>;
  diagnostics: Diagnostic[];
}

interface AnalyzeContext {
  diagnostics: DiagnosticCollector;
  maxDepth: number;
  ignore: ReadonlySet<string>;
  sampleDefaults: boolean;
}

type Probe<T> = { ok: true; value: T } | { ok: false };

type Discovered =
  | (FragmentEntity & { capabilities: NodeCapabilities })
  | { kind: "leaf"; parameter: Parameter };

interface WalkedChildren {
  parameters: Parameter[];
  containers: Container[];
  lists: ListNode[];
  discovered: Array<{ child: NavigableNode; found: Discovered }>;
}

function probe<T>(
  ctx: AnalyzeContext,
  path: ReadonlyArray<string>,
  what: string,
  read: () => T,
): Probe<T> {
  try {
    return { ok: true, value: read() };
  } catch (error) {
    ctx.diagnostics.report({
      code: "reflection-access-error",
      message: `${what} failed: ${error instanceof Error ? error.message : String(error)}`,
      path,
    });
    return { ok: false };
  }
}

function firstOf<T>(items: Iterable<T> | undefined): T | undefined {
  if (!items) return undefined;
  for (const item of items) return item;
  return undefined;
}

function walkChildren(
  ctx: AnalyzeContext,
  node: NavigableNode,
  path: ReadonlyArray<string>,
  depth: number,
  ancestors: ReadonlySet<NavigableNode>,
): WalkedChildren {
  const walked: WalkedChildren = {
    parameters: [],
    containers: [],
    lists: [],
    discovered: [],
  };
  const children = probe(ctx, path, "listing children", () => Array.from(node.children()));
  if (!children.ok) return walked;

  const seen = new Set<string>();
  for (const child of children.value) {
    const name = probe(ctx, path, "reading child name", () => child.name);
    if (!name.ok || ctx.ignore.has(name.value)) continue;
    if (seen.has(name.value)) {
      ctx.diagnostics.report({
        code: "duplicate-name",
        message: `child "${name.value}" appears more than once; later occurrence skipped`,
        path,
      });
      continue;
    }
    seen.add(name.value);

    const found = classify(ctx, child, name.value, [...path, name.value], depth + 1, ancestors);
    if (!found) continue;
    walked.discovered.push({ child, found });
    switch (found.kind) {
      case "leaf":
        walked.parameters.push(found.parameter);
        break;
      case "container":
        walked.containers.push(found.node);
        break;
      case "list":
        walked.lists.push(found.node);
        break;
    }
  }
  return walked;
}

function scalarParameter(
  ctx: AnalyzeContext,
  node: NavigableNode,
  name: string,
  path: ReadonlyArray<string>,
): Parameter | undefined {
  const value = probe(ctx, path, "reading value", () => node.scalarValue());
  if (!value.ok) return undefined;

  let type = inferTypeFromValue(value.value);
  if (type === undefined) {
    ctx.diagnostics.report({
      code: "unknown-type",
      message: `"${name}" has no sample value; using string`,
      path,
    });
    type = "string";
  }
  const sampled = ctx.sampleDefaults ? defaultFromValue(value.value, type) : undefined;
  return {
    name,
    type,
    schemaType: describeRuntimeKind(value.value),
    description: "",
    required: false,
    ...(sampled !== undefined ? { default: sampled } : {}),
  };
}

function analyzeList(
  ctx: AnalyzeContext,
  node: NavigableNode,
  name: string,
  path: ReadonlyArray<string>,
  depth: number,
  ancestors: ReadonlySet<NavigableNode>,
): ListNode | undefined {
  const key = probe(ctx, path, "reading key name", () => node.keyName?.());
  const sample = probe(ctx, path, "listing entries", () => firstOf(node.instances?.()));
  if (!key.ok || !sample.ok) return undefined;

  let walked: WalkedChildren = { parameters: [], containers: [], lists: [], discovered: [] };
  if (sample.value) {
    walked = walkChildren(ctx, sample.value, path, depth, ancestors);
  } else {
    ctx.diagnostics.report({
      code: "unknown-type",
      severity: "info",
      message: `list "${name}" has no entries to sample; its leafs are unknown`,
      path,
    });
  }

  let parameters = walked.parameters;
  const keyName = key.value;
  if (keyName !== undefined) {
    if (!parameters.some((p) => p.name === keyName)) {
      ctx.diagnostics.report({
        code: "unknown-type",
        message: `key "${keyName}" of list "${name}" has no sample value; using string`,
        path,
      });
      parameters = [
        { name: keyName, type: "string", schemaType: "undefined", description: "", required: true },
        ...parameters,
      ];
    }
    // Entries are always addressed by key, so the key never falls back to a default.
    parameters = parameters.map(({ default: sampled, ...rest }) =>
      rest.name === keyName
        ? { ...rest, required: true }
        : { ...rest, ...(sampled !== undefined ? { default: sampled } : {}) },
    );
  }

  return {
    name,
    description: "",
    ...(keyName !== undefined ? { key: keyName } : {}),
    parameters,
    containers: walked.containers,
    lists: walked.lists,
  };
}

function classify(
  ctx: AnalyzeContext,
  node: NavigableNode,
  name: string,
  path: ReadonlyArray<string>,
  depth: number,
  ancestors: ReadonlySet<NavigableNode>,
): Discovered | undefined {
  const keyed = probe(ctx, path, "isKeyed()", () => node.isKeyed());
  const canCreate = probe(ctx, path, "supportsCreate()", () => node.supportsCreate());
  const canDelete = probe(ctx, path, "supportsDelete()", () => node.supportsDelete());
  if (!keyed.ok || !canCreate.ok || !canDelete.ok) return undefined;
  const capabilities: NodeCapabilities = {
    keyed: keyed.value,
    canCreate: canCreate.value,
    canDelete: canDelete.value,
  };

  if (capabilities.keyed && !capabilities.canCreate) {
    ctx.diagnostics.report({
      code: "unknown-type",
      severity: "info",
      message: `"${name}" is keyed but entries cannot be created; skipped`,
      path,
    });
    return undefined;
  }

  const listLike = capabilities.keyed && capabilities.canCreate;
  let containerLike = false;
  if (!listLike) {
    const children = probe(ctx, path, "listing children", () => firstOf(node.children()));
    if (!children.ok) return undefined;
    containerLike = children.value !== undefined;
  }

  if (listLike || containerLike) {
    if (depth > ctx.maxDepth) {
      ctx.diagnostics.report({
        code: "depth-limit-exceeded",
        message: `"${name}" is nested deeper than ${ctx.maxDepth} levels and is skipped`,
        path,
      });
      return undefined;
    }
    if (ancestors.has(node)) {
      ctx.diagnostics.report({
        code: "structural-parse-error",
        message: `"${name}" refers back to one of its ancestors; cycle not followed`,
        path,
      });
      return undefined;
    }
    const within = new Set(ancestors).add(node);

    if (listLike) {
      const list = analyzeList(ctx, node, name, path, depth, within);
      return list ? { kind: "list", node: list, capabilities } : undefined;
    }
    const walked = walkChildren(ctx, node, path, depth, within);
    return {
      kind: "container",
      node: {
        name,
        description: "",
        parameters: walked.parameters,
        containers: walked.containers,
        lists: walked.lists,
      },
      capabilities,
    };
  }

  const parameter = scalarParameter(ctx, node, name, path);
  return parameter ? { kind: "leaf", parameter } : undefined;
}

export function analyzeModel(
  root: NavigableNode,
  options: AnalyzeOptions = {},
): AnalysisResult {
  const ctx: AnalyzeContext = {
    diagnostics: new DiagnosticCollector(),
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    ignore: new Set(options.ignore ?? DEFAULT_IGNORED_CHILDREN),
    sampleDefaults: options.sampleDefaults ?? false,
  };
  const isService = options.isService ?? supportsCreateAndDelete;

  const rootName = probe(ctx, [], "reading root name", () => root.name);
  const rootPath = rootName.ok ? [rootName.value] : [];
  const walked = walkChildren(ctx, root, rootPath, 0, new Set([root]));

  const fragments = new Map<string, Fragment>();
  for (const { child, found } of walked.discovered) {
    if (found.kind === "leaf") continue;
    const entity: FragmentEntity =
      found.kind === "list"
        ? { kind: "list", node: found.node }
        : { kind: "container", node: found.node };
    const service = probe(ctx, [...rootPath, entity.node.name], "service predicate", () =>
      isService(child, found.capabilities),
    );
    fragments.set(entity.node.name, {
      name: entity.node.name,
      kind: service.ok && service.value ? "service" : "config",
      capabilities: found.capabilities,
      entity: deepFreeze(entity),
    });
  }

  return {
    fragments,
    parameters: deepFreeze(walked.parameters),
    diagnostics: ctx.diagnostics.toArray(),
  };
}

export interface FragmentsToModuleOptions {
  name: string;
  description?: string;
  /**
   * Which fragments become part of the module.
   */
  include?: "all" | "services";
}

/**
 * Assemble discovered fragments into a module for the generator.
 */
export function fragmentsToModule(
  result: AnalysisResult,
  options: FragmentsToModuleOptions,
): Module {
  const containers: Container[] = [];
  const lists: ListNode[] = [];
  for (const fragment of result.fragments.values()) {
    if (options.include === "services" && fragment.kind !== "service") continue;
    if (fragment.entity.kind === "container") {
      containers.push(fragment.entity.node);
    } else {
      lists.push(fragment.entity.node);
    }
  }
  return deepFreeze({
    name: options.name,
    description: options.description ?? "",
    containers,
    lists,
    rpcs: [],
    parameters: options.include === "services" ? [] : [...result.parameters],
    groupings: [],
  });
}

import type {
  CanonicalType,
  Container,
  DefaultValue,
  ListNode,
  Rpc,
} from "../schema/ir.js";

export type ToolOperation =
  | "get" // read an entity
  | "create" // configure a container
  | "update" // change some leafs of an existing entity
  | "delete" // remove an entity, guarded by `confirm`
  | "add-item" // add one entry to a list
  | "invoke"; // call an rpc

/**
 * A parameter of a generated tool.
 *
 * Unlike schema leafs a tool parameter may be required and still carry a
 * default: the default is what a caller is expected to pass (`confirm`).
 */
export interface ToolParameter {
  readonly name: string;
  /**
   * Schema name of the leaf behind the parameter. Absent for synthetic
   * parameters (identity, `confirm`).
   */
  readonly schemaName?: string;
  readonly type: CanonicalType;
  readonly description: string;
  readonly required: boolean;
  readonly default?: DefaultValue;
  readonly choices?: ReadonlyArray<string>;
  readonly range?: string;
}

export type ToolSource =
  | { kind: "container"; node: Container; path: ReadonlyArray<string> }
  | { kind: "list"; node: ListNode; path: ReadonlyArray<string> }
  | { kind: "rpc"; node: Rpc; path: ReadonlyArray<string> };

/**
 * Behaviour hints carried into the manifest as MCP tool annotations.
 */
export interface ToolAnnotations {
  readonly readOnlyHint?: boolean;
  readonly destructiveHint?: boolean;
  readonly idempotentHint?: boolean;
}

export interface ToolSpec {
  readonly name: string;
  readonly description: string;
  readonly operation: ToolOperation;
  readonly parameters: ReadonlyArray<ToolParameter>;
  readonly annotations: ToolAnnotations;
  readonly source: ToolSource;
}

export const OPERATION_ANNOTATIONS: Readonly<Record<ToolOperation, ToolAnnotations>> = {
  get: { readOnlyHint: true },
  create: { idempotentHint: true },
  update: { idempotentHint: true },
  delete: { destructiveHint: true },
  "add-item": {},
  invoke: {},
};

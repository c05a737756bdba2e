/**
 * Schema IR: the normalized tree shared by the text parser and the reflective
 * analyzer.
 *
 * Nodes are built once per pass and frozen before they are handed out, so
 * downstream stages (generator, emitter) treat them as read-only views.
 */

export type CanonicalType = "string" | "integer" | "boolean" | "number" | "array";

export type DefaultValue = string | number | boolean | ReadonlyArray<string>;

/**
 * A leaf (or leaf-list) of the schema.
 *
 * `required` parameters never carry a `default`, and only `string` parameters
 * carry `choices`.
 */
export interface Parameter {
  readonly name: string;
  readonly type: CanonicalType;
  /**
   * Type token as observed in the source, e.g. `uint16` or `inet:ipv4-address`.
   * Reflective sources record the runtime kind of the sampled value.
   */
  readonly schemaType: string;
  readonly description: string;
  readonly required: boolean;
  readonly default?: DefaultValue;
  readonly choices?: ReadonlyArray<string>;
  readonly range?: string;
  readonly units?: string;
}

export interface Container {
  readonly name: string;
  readonly description: string;
  readonly parameters: ReadonlyArray<Parameter>;
  readonly containers: ReadonlyArray<Container>;
  readonly lists: ReadonlyArray<ListNode>;
}

export interface ListNode {
  readonly name: string;
  readonly description: string;
  /**
   * Name of the parameter identifying an entry. Absent for unkeyed lists.
   */
  readonly key?: string;
  readonly parameters: ReadonlyArray<Parameter>;
  readonly containers: ReadonlyArray<Container>;
  readonly lists: ReadonlyArray<ListNode>;
}

export interface Rpc {
  readonly name: string;
  readonly description: string;
  readonly input: ReadonlyArray<Parameter>;
  readonly output: ReadonlyArray<Parameter>;
}

/**
 * Groupings are parsed like containers but never attached to the tree.
 */
export type Grouping = Container;

export interface Module {
  readonly name: string;
  readonly namespace?: string;
  readonly prefix?: string;
  readonly description: string;
  readonly containers: ReadonlyArray<Container>;
  readonly lists: ReadonlyArray<ListNode>;
  readonly rpcs: ReadonlyArray<Rpc>;
  readonly parameters: ReadonlyArray<Parameter>;
  readonly groupings: ReadonlyArray<Grouping>;
}

/**
 * Freeze a freshly built IR tree in place and return it.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Capability interface a live configuration tree exposes to the reflective
 * analyzer.
 *
 * This is the only contract the analyzer needs from a configuration backend.
 * A live object graph, a cached snapshot (see `snapshotNode`) or a test double
 * implement it the same way. Any method may throw; the analyzer records the
 * failure against that node and moves on.
 */

export type ScalarValue =
  | string
  | number
  | boolean
  | bigint
  | null
  | ReadonlyArray<string | number | boolean>;

export interface NavigableNode {
  readonly name: string;
  /**
   * Named child attributes. For a keyed node these are its own attributes,
   * not its entries.
   */
  children(): Iterable<NavigableNode>;
  /**
   * Whether the node is an iterable, keyed collection (list-like).
   */
  isKeyed(): boolean;
  supportsCreate(): boolean;
  supportsDelete(): boolean;
  /**
   * Concrete value of a scalar node; `undefined` when it has none.
   */
  scalarValue(): ScalarValue | undefined;
  /**
   * Entries of a keyed node. The first entry is sampled to discover the
   * shape of the list.
   */
  instances?(): Iterable<NavigableNode>;
  /**
   * Name of the leaf identifying entries of a keyed node, when known.
   */
  keyName?(): string | undefined;
}

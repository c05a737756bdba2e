/**
 * JSON snapshots of a configuration tree, exposed as `NavigableNode`s.
 *
 * A snapshot lets the reflective route run offline: dump the live tree once,
 * then analyze the dump. Capability flags default to `false`, so a bare
 * `{ "name": "mtu", "value": 1500 }` is a scalar leaf.
 *
 * @example
 * ```json
 * {
 *   "name": "root",
 *   "children": [
 *     {
 *       "name": "vpn",
 *       "keyed": true,
 *       "create": true,
 *       "delete": true,
 *       "key": "name",
 *       "entries": [
 *         { "name": "blue", "children": [{ "name": "name", "value": "blue" }] }
 *       ]
 *     }
 *   ]
 * }
 * ```
 */
import { z } from "zod";
import { UserInputError } from "../errors.js";
import type { NavigableNode, ScalarValue } from "./navigable.js";

export type SnapshotValue =
  | string
  | number
  | boolean
  | null
  | Array<string | number | boolean>;

export interface SnapshotNodeData {
  name: string;
  keyed?: boolean;
  create?: boolean;
  delete?: boolean;
  key?: string;
  value?: SnapshotValue;
  children?: SnapshotNodeData[];
  entries?: SnapshotNodeData[];
}

export const SnapshotValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(z.union([z.string(), z.number(), z.boolean()])),
]);

export const SnapshotNodeSchema: z.ZodType<SnapshotNodeData> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    keyed: z.boolean().optional(),
    create: z.boolean().optional(),
    delete: z.boolean().optional(),
    key: z.string().min(1).optional(),
    value: SnapshotValueSchema.optional(),
    children: z.array(SnapshotNodeSchema).optional(),
    entries: z.array(SnapshotNodeSchema).optional(),
  }),
);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Validate decoded JSON as a snapshot tree.
 *
 * @throws {UserInputError} when the document does not describe a tree
 */
export function parseSnapshot(json: unknown): SnapshotNodeData {
  const { data, success, error } = SnapshotNodeSchema.safeParse(json);
  if (!success) {
    throw new UserInputError(`Invalid configuration snapshot: ${formatIssues(error)}`);
  }
  return data;
}

class SnapshotNode implements NavigableNode {
  constructor(private readonly data: SnapshotNodeData) {}

  get name(): string {
    return this.data.name;
  }

  *children(): Iterable<NavigableNode> {
    for (const child of this.data.children ?? []) {
      yield new SnapshotNode(child);
    }
  }

  isKeyed(): boolean {
    return this.data.keyed ?? false;
  }

  supportsCreate(): boolean {
    return this.data.create ?? false;
  }

  supportsDelete(): boolean {
    return this.data.delete ?? false;
  }

  scalarValue(): ScalarValue | undefined {
    return this.data.value;
  }

  *instances(): Iterable<NavigableNode> {
    for (const entry of this.data.entries ?? []) {
      yield new SnapshotNode(entry);
    }
  }

  keyName(): string | undefined {
    return this.data.key;
  }
}

export function snapshotNode(data: SnapshotNodeData): NavigableNode {
  return new SnapshotNode(data);
}

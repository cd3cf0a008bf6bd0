import type { FileAccess } from "../options.js";

/** Named node sets a network keeps besides its nodes */
export type NodeRole = "feature" | "label" | "finalCriterion" | "evaluation" | "output";

export const NODE_ROLES: readonly NodeRole[] = ["feature", "label", "finalCriterion", "evaluation", "output"];

/**
 * What a copy duplicates.
 *  - `"value"`: op, value, dims, flags and attributes; inputs left unconnected
 *  - `"inputs"`: only the input edges (onto an existing node)
 *  - `"all"`: both
 */
export type CopyFlags = "value" | "inputs" | "all";

/** One node of a computation graph. Identity is object identity. */
export interface NetworkNode {
  name: string;
  op: string;
  value?: string;
  dims: number[];
  /** `null` marks an input not connected yet */
  inputs: (NetworkNode | null)[];
  learnable: boolean;
  needsGradient: boolean;
  attributes: Record<string, string>;
}

export type NodeSpec = {
  name: string;
  op: string;
  value?: string;
  dims?: number[];
  inputs?: (NetworkNode | null)[];
  learnable?: boolean;
  needsGradient?: boolean;
  attributes?: Record<string, string>;
};

/** Graph store that NDL builds and MEL edits */
export interface Network {
  readonly nodes: readonly NetworkNode[];

  getNode(name: string): NetworkNode | undefined;
  /** Whether the node object belongs to this network */
  has(node: NetworkNode): boolean;
  /** Nodes whose names match a pattern with at most one `*` */
  nodesMatching(pattern: string): NetworkNode[];

  createNode(spec: NodeSpec): NetworkNode;
  /** Duplicate `fromName` of `from` as `toName` here, or update `toName` when it exists */
  copyNode(from: Network, fromName: string, toName: string, flags: CopyFlags): NetworkNode;
  /** Copy a node and its transitive inputs here, each renamed `prefix + name` */
  copySubTree(from: Network, rootName: string, prefix: string, flags: CopyFlags): NetworkNode[];
  renameNode(node: NetworkNode, newName: string): void;
  /** Remove a node, disconnecting every edge that points at it */
  deleteNode(name: string): void;
  setInput(node: NetworkNode, index: number, input: NetworkNode): void;
  /** Replace all inputs of a node */
  attachInputs(node: NetworkNode, inputs: NetworkNode[]): void;

  roleNodes(role: NodeRole): readonly NetworkNode[];
  setRole(node: NetworkNode, role: NodeRole, set: boolean): void;
  /** Set needs-gradient on every learnable node at or below `root` (all when omitted) */
  setLearnableNodesBelowNeedGradient(needGradient: boolean, root?: NetworkNode): void;

  /** Throws when an input is unconnected or points outside the network */
  validate(): void;
  /** Human-readable listing of all nodes, or of the given ones */
  dump(includeData: boolean, nodes?: readonly NetworkNode[]): string;

  loadFromFile(path: string, files: FileAccess): void;
  saveToFile(path: string, files: FileAccess): void;
  /** Drop every node and role */
  clear(): void;
}

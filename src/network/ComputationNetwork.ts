import { ReferenceScopeError, StateError, SymbolError } from "../errors.js";
import { findFunction } from "../ndl/functions.js";
import type { FileAccess } from "../options.js";
import { matchWildcard } from "../utils.js";
import { parseModel, restoreNetwork, serializeNetwork } from "./serialize.js";
import {
  NODE_ROLES,
  type CopyFlags,
  type Network,
  type NetworkNode,
  type NodeRole,
  type NodeSpec,
} from "./types.js";

/** In-memory computation graph */
export class ComputationNetwork implements Network {
  private readonly byName = new Map<string, NetworkNode>();
  private readonly members = new Set<NetworkNode>();
  private readonly roles = new Map<NodeRole, NetworkNode[]>(NODE_ROLES.map((r) => [r, []]));

  get nodes(): readonly NetworkNode[] {
    return [...this.byName.values()];
  }

  getNode(name: string): NetworkNode | undefined {
    return this.byName.get(name);
  }

  has(node: NetworkNode): boolean {
    return this.members.has(node);
  }

  nodesMatching(pattern: string): NetworkNode[] {
    return this.nodes.filter((node) => matchWildcard(pattern, node.name) !== undefined);
  }

  /** Node by name, or StateError */
  requireNode(name: string): NetworkNode {
    const node = this.byName.get(name);
    if (!node) throw new StateError(`Node "${name}" does not exist`, name);
    return node;
  }

  createNode(spec: NodeSpec): NetworkNode {
    if (this.byName.has(spec.name)) {
      throw new SymbolError(`Node "${spec.name}" already exists`, spec.name);
    }
    for (const input of spec.inputs ?? []) {
      if (input) this.checkMember(input);
    }
    const node: NetworkNode = {
      name: spec.name,
      op: spec.op,
      ...(spec.value !== undefined ? { value: spec.value } : {}),
      dims: spec.dims ? [...spec.dims] : [],
      inputs: spec.inputs ? [...spec.inputs] : [],
      learnable: spec.learnable ?? false,
      needsGradient: spec.needsGradient ?? spec.learnable ?? false,
      attributes: { ...spec.attributes },
    };
    this.byName.set(node.name, node);
    this.members.add(node);
    return node;
  }

  copyNode(from: Network, fromName: string, toName: string, flags: CopyFlags): NetworkNode {
    const source = from.getNode(fromName);
    if (!source) throw new StateError(`Node "${fromName}" does not exist`, fromName);

    let target = this.byName.get(toName);
    if (!target) {
      target = this.createNode({ name: toName, op: source.op });
      target.inputs = source.inputs.map(() => null);
    }
    if (target === source) return target;

    if (flags !== "inputs") {
      target.op = source.op;
      if (source.value !== undefined) target.value = source.value;
      else delete target.value;
      target.dims = [...source.dims];
      target.learnable = source.learnable;
      target.needsGradient = source.needsGradient;
      target.attributes = { ...source.attributes };
    }
    if (flags !== "value") {
      // inputs from another network are matched by name here
      target.inputs = source.inputs.map((input) => {
        if (!input) return null;
        if (from === this) return input;
        return this.byName.get(input.name) ?? null;
      });
    }
    return target;
  }

  copySubTree(from: Network, rootName: string, prefix: string, flags: CopyFlags): NetworkNode[] {
    const root = from.getNode(rootName);
    if (!root) throw new StateError(`Node "${rootName}" does not exist`, rootName);

    const order = collectSubTree(root);
    for (const node of order) {
      if (this.byName.has(prefix + node.name)) {
        throw new SymbolError(`Node "${prefix + node.name}" already exists`, prefix + node.name);
      }
    }

    const copies = new Map<NetworkNode, NetworkNode>();
    for (const node of order) {
      copies.set(
        node,
        this.createNode({
          name: prefix + node.name,
          op: node.op,
          value: node.value,
          dims: node.dims,
          learnable: node.learnable,
          needsGradient: node.needsGradient,
          attributes: node.attributes,
        }),
      );
    }
    for (const node of order) {
      const copy = copies.get(node);
      if (!copy) continue;
      copy.inputs = node.inputs.map((input) =>
        flags === "value" || !input ? null : (copies.get(input) ?? null),
      );
    }
    return order.flatMap((node) => copies.get(node) ?? []);
  }

  renameNode(node: NetworkNode, newName: string): void {
    this.checkMember(node);
    if (node.name === newName) return;
    if (this.byName.has(newName)) {
      throw new SymbolError(`Node "${newName}" already exists`, newName);
    }
    this.byName.delete(node.name);
    node.name = newName;
    this.byName.set(newName, node);
  }

  deleteNode(name: string): void {
    const node = this.requireNode(name);
    for (const other of this.byName.values()) {
      other.inputs = other.inputs.map((input) => (input === node ? null : input));
    }
    for (const role of NODE_ROLES) this.setRole(node, role, false);
    this.byName.delete(name);
    this.members.delete(node);
  }

  setInput(node: NetworkNode, index: number, input: NetworkNode): void {
    this.checkMember(node);
    this.checkMember(input);
    if (!Number.isInteger(index) || index < 0 || index >= node.inputs.length) {
      throw new StateError(
        `Input index ${index} out of range for node "${node.name}" with ${node.inputs.length} inputs`,
        node.name,
      );
    }
    node.inputs[index] = input;
  }

  attachInputs(node: NetworkNode, inputs: NetworkNode[]): void {
    this.checkMember(node);
    for (const input of inputs) this.checkMember(input);
    node.inputs = [...inputs];
  }

  roleNodes(role: NodeRole): readonly NetworkNode[] {
    return this.roles.get(role) ?? [];
  }

  setRole(node: NetworkNode, role: NodeRole, set: boolean): void {
    const list = this.roles.get(role);
    if (!list) return;
    const index = list.indexOf(node);
    if (set && index === -1) list.push(node);
    else if (!set && index !== -1) list.splice(index, 1);
  }

  setLearnableNodesBelowNeedGradient(needGradient: boolean, root?: NetworkNode): void {
    const nodes = root ? collectSubTree(root) : this.nodes;
    for (const node of nodes) {
      if (node.learnable) node.needsGradient = needGradient;
    }
  }

  validate(): void {
    for (const node of this.byName.values()) {
      node.inputs.forEach((input, i) => {
        if (!input) {
          throw new StateError(`Node "${node.name}" input ${i} is not connected`, node.name);
        }
        if (!this.members.has(input)) {
          throw new ReferenceScopeError(
            `Node "${node.name}" input ${i} ("${input.name}") belongs to another network`,
            node.name,
          );
        }
      });
      const fn = findFunction(node.op);
      if (fn && fn.name === node.op) {
        const [min, max] = fn.inputs;
        if (node.inputs.length < min || node.inputs.length > max) {
          throw new StateError(
            `Node "${node.name}" (${node.op}) has ${node.inputs.length} inputs, expected ${min === max ? min : `${min}-${max}`}`,
            node.name,
          );
        }
      }
    }
  }

  /**
   * One line per node: `name = Op(input, ...) [dims] needsGradient=... roles=...`.
   * With `includeData`, value and attributes follow on indented lines.
   */
  dump(includeData: boolean, nodes: readonly NetworkNode[] = this.nodes): string {
    const lines: string[] = [];
    for (const node of nodes) {
      const inputs = node.inputs.map((input) => input?.name ?? "null").join(", ");
      const roles = NODE_ROLES.filter((role) => this.roleNodes(role).includes(node));
      let line = `${node.name} = ${node.op}(${inputs}) [${node.dims.join("x")}] needsGradient=${node.needsGradient}`;
      if (roles.length > 0) line += ` roles=${roles.join(",")}`;
      lines.push(line);
      if (!includeData) continue;
      if (node.value !== undefined) lines.push(`  value: ${node.value}`);
      for (const [key, value] of Object.entries(node.attributes)) lines.push(`  attr ${key}=${value}`);
    }
    return lines.map((l) => `${l}\n`).join("");
  }

  loadFromFile(path: string, files: FileAccess): void {
    const model = parseModel(files.readText(path), path);
    restoreNetwork(this, model, path);
  }

  saveToFile(path: string, files: FileAccess): void {
    files.writeText(path, `${JSON.stringify(serializeNetwork(this), null, 2)}\n`);
  }

  clear(): void {
    this.byName.clear();
    this.members.clear();
    for (const list of this.roles.values()) list.length = 0;
  }

  private checkMember(node: NetworkNode): void {
    if (!this.members.has(node)) {
      throw new ReferenceScopeError(`Node "${node.name}" belongs to a different network`, node.name);
    }
  }
}

/** `root` and its transitive inputs, inputs before the nodes that use them */
function collectSubTree(root: NetworkNode): NetworkNode[] {
  const order: NetworkNode[] = [];
  const seen = new Set<NetworkNode>();
  const visit = (node: NetworkNode) => {
    if (seen.has(node)) return;
    seen.add(node);
    for (const input of node.inputs) if (input) visit(input);
    order.push(node);
  };
  visit(root);
  return order;
}

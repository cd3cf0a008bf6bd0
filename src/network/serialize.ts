import { z } from "zod";
import { ModelFormatError } from "../errors.js";
import { NODE_ROLES, type Network, type NetworkNode, type NodeRole } from "./types.js";

export const MODEL_FORMAT = "ndlkit-network";
export const MODEL_VERSION = 1;

const nodeSchema = z.object({
  name: z.string().min(1),
  op: z.string().min(1),
  value: z.string().optional(),
  dims: z.array(z.number().int().nonnegative()),
  inputs: z.array(z.string().nullable()),
  learnable: z.boolean(),
  needsGradient: z.boolean(),
  attributes: z.record(z.string(), z.string()),
});

const modelSchema = z.object({
  format: z.literal(MODEL_FORMAT),
  version: z.literal(MODEL_VERSION),
  nodes: z.array(nodeSchema),
  roles: z.object({
    feature: z.array(z.string()),
    label: z.array(z.string()),
    finalCriterion: z.array(z.string()),
    evaluation: z.array(z.string()),
    output: z.array(z.string()),
  }),
});

export type SerializedNode = z.infer<typeof nodeSchema>;
export type SerializedModel = z.infer<typeof modelSchema>;

export function serializeNetwork(network: Network): SerializedModel {
  const roleNames = (role: NodeRole) => network.roleNodes(role).map((n) => n.name);
  return {
    format: MODEL_FORMAT,
    version: MODEL_VERSION,
    nodes: network.nodes.map((node) => ({
      name: node.name,
      op: node.op,
      ...(node.value !== undefined ? { value: node.value } : {}),
      dims: [...node.dims],
      inputs: node.inputs.map((input) => input?.name ?? null),
      learnable: node.learnable,
      needsGradient: node.needsGradient,
      attributes: { ...node.attributes },
    })),
    roles: {
      feature: roleNames("feature"),
      label: roleNames("label"),
      finalCriterion: roleNames("finalCriterion"),
      evaluation: roleNames("evaluation"),
      output: roleNames("output"),
    },
  };
}

/**
 * Parse and check a serialized model document.
 * @throws ModelFormatError when the text is not a valid model
 */
export function parseModel(text: string, source: string): SerializedModel {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ModelFormatError(`${source}: not a JSON document (${reason})`, source);
  }
  const result = modelSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const at = issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ModelFormatError(`${source}: invalid model${at}: ${issue.message}`, source);
  }
  return result.data;
}

/**
 * Load a parsed model into an empty network. Nodes are created first, then
 * edges are linked by name.
 */
export function restoreNetwork(network: Network, model: SerializedModel, source: string): void {
  const created = new Map<string, NetworkNode>();
  for (const node of model.nodes) {
    if (created.has(node.name)) {
      throw new ModelFormatError(`${source}: duplicate node "${node.name}"`, node.name);
    }
    created.set(
      node.name,
      network.createNode({
        name: node.name,
        op: node.op,
        value: node.value,
        dims: node.dims,
        inputs: [],
        learnable: node.learnable,
        needsGradient: node.needsGradient,
        attributes: node.attributes,
      }),
    );
  }

  const lookup = (name: string): NetworkNode => {
    const found = created.get(name);
    if (!found) throw new ModelFormatError(`${source}: unknown node "${name}"`, name);
    return found;
  };
  for (const node of model.nodes) {
    lookup(node.name).inputs = node.inputs.map((input) => (input === null ? null : lookup(input)));
  }
  for (const role of NODE_ROLES) {
    for (const name of model.roles[role]) network.setRole(lookup(name), role, true);
  }
}

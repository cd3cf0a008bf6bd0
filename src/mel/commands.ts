import type { NodeRole } from "../network/types.js";
import type { NamedEntry } from "../utils.js";

export type CommandName =
  | "CreateModel"
  | "CreateModelWithName"
  | "LoadModel"
  | "LoadModelWithName"
  | "LoadNDLSnippet"
  | "SaveDefaultModel"
  | "SaveModel"
  | "SetDefaultModel"
  | "UnloadModel"
  | "DumpModel"
  | "DumpNode"
  | "CopyNode"
  | "CopySubTree"
  | "CopyNodeInputs"
  | "SetNodeInput"
  | "SetNodeInputs"
  | "SetProperty"
  | "SetPropertyForSubTree"
  | "RemoveNode"
  | "DeleteNode"
  | "Rename";

export interface CommandDef extends NamedEntry {
  readonly name: CommandName;
  /** Parameters that must be given */
  readonly required: number;
  /**
   * Trailing parameters that may be given, positionally or as `name=value`.
   * A variadic command takes any number of further required-style values.
   */
  readonly optional: readonly string[];
  readonly variadic?: boolean;
  /** Shown when the parameter count is wrong */
  readonly usage: string;
}

/**
 * Editing commands in lookup order. A token resolves to the entry whose name
 * or alias it spells exactly, else to the first entry it abbreviates.
 */
export const COMMANDS: readonly CommandDef[] = [
  { name: "CreateModel", required: 0, optional: [], usage: "CreateModel()" },
  { name: "CreateModelWithName", required: 1, optional: [], usage: "CreateModelWithName(modelName)" },
  {
    name: "LoadModel",
    required: 1,
    optional: ["format"],
    usage: "LoadModel(modelFileName, [format=ndlkit])",
  },
  {
    name: "LoadModelWithName",
    required: 2,
    optional: ["format"],
    usage: "LoadModelWithName(modelName, modelFileName, [format=ndlkit])",
  },
  {
    name: "LoadNDLSnippet",
    required: 2,
    optional: ["section"],
    usage: "LoadNDLSnippet(modelName, ndlFileName, [section=name])",
  },
  {
    name: "SaveDefaultModel",
    required: 1,
    optional: ["format"],
    usage: "SaveDefaultModel(modelFileName, [format=ndlkit])",
  },
  {
    name: "SaveModel",
    required: 2,
    optional: ["format"],
    usage: "SaveModel(modelName, modelFileName, [format=ndlkit])",
  },
  { name: "SetDefaultModel", required: 1, optional: [], usage: "SetDefaultModel(modelName)" },
  {
    name: "UnloadModel",
    required: 1,
    optional: [],
    variadic: true,
    usage: "UnloadModel(modelName, [modelName, ...])",
  },
  {
    name: "DumpModel",
    required: 2,
    optional: ["includeData"],
    usage: "DumpModel(modelName, fileName, [includeData=false|true])",
  },
  {
    name: "DumpNode",
    required: 2,
    optional: ["includeData"],
    usage: "DumpNode(nodeName, fileName, [includeData=false|true])",
  },
  {
    name: "CopyNode",
    alias: "Copy",
    required: 2,
    optional: ["copy"],
    usage: "CopyNode(fromNode, toNode, [copy=all|value])",
  },
  {
    name: "CopySubTree",
    required: 3,
    optional: ["copy"],
    usage: "CopySubTree(fromNode, toModel, toNodeNamePrefix, [copy=all|value])",
  },
  {
    name: "CopyNodeInputs",
    alias: "CopyInputs",
    required: 2,
    optional: [],
    usage: "CopyNodeInputs(fromNode, toNode)",
  },
  {
    name: "SetNodeInput",
    alias: "SetInput",
    required: 3,
    optional: [],
    usage: "SetNodeInput(toNode, inputIndex, inputNode)",
  },
  {
    name: "SetNodeInputs",
    alias: "SetInputs",
    required: 2,
    optional: [],
    variadic: true,
    usage: "SetNodeInputs(toNode, inputNode1, [inputNode2, ...])",
  },
  {
    name: "SetProperty",
    required: 3,
    optional: [],
    usage: "SetProperty(toNode, propertyName, propertyValue)",
  },
  {
    name: "SetPropertyForSubTree",
    required: 3,
    optional: [],
    usage: "SetPropertyForSubTree(rootNode, propertyName, propertyValue)",
  },
  {
    name: "RemoveNode",
    alias: "Remove",
    required: 1,
    optional: [],
    variadic: true,
    usage: "RemoveNode(nodeName, [nodeName, ...])",
  },
  {
    name: "DeleteNode",
    alias: "Delete",
    required: 1,
    optional: [],
    variadic: true,
    usage: "DeleteNode(nodeName, [nodeName, ...])",
  },
  { name: "Rename", required: 2, optional: [], usage: "Rename(oldNodeName, newNodeName)" },
];

export type PropertyName =
  | "ComputeGradient"
  | "Feature"
  | "Label"
  | "FinalCriterion"
  | "Evaluation"
  | "Output";

export interface PropertyDef extends NamedEntry {
  readonly name: PropertyName;
  /** Role set toggled by the property; gradient flag when absent */
  readonly role?: NodeRole;
}

/** Properties `SetProperty` understands, in lookup order */
export const PROPERTIES: readonly PropertyDef[] = [
  { name: "ComputeGradient", alias: "NeedsGradient" },
  { name: "Feature", role: "feature" },
  { name: "Label", role: "label" },
  { name: "FinalCriterion", alias: "Criteria", role: "finalCriterion" },
  { name: "Evaluation", alias: "Eval", role: "evaluation" },
  { name: "Output", role: "output" },
];

/** Accepted values of the `format=` option */
export const MODEL_FORMATS: readonly string[] = ["ndlkit", "json"];

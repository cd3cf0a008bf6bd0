import { lookupName, type NamedEntry } from "../utils.js";

/**
 * Built-in network function.
 *
 * A call's positional parameters are `scalars` followed by node inputs.
 * Scalars named in {@link DIM_SCALARS} become the node's dimensions, the
 * `value` scalar becomes its value, any other scalar is kept as an attribute.
 */
export interface FunctionDef extends NamedEntry {
  readonly scalars: readonly string[];
  /** Scalars that must be given */
  readonly minScalars: number;
  readonly inputs: readonly [min: number, max: number];
  /** Learnable parameters take part in SetPropertyForSubTree */
  readonly learnable?: boolean;
}

export const DIM_SCALARS: ReadonlySet<string> = new Set(["rows", "cols", "width", "height", "channels"]);

const unary = { scalars: [], minScalars: 0, inputs: [1, 1] } as const;
const binary = { scalars: [], minScalars: 0, inputs: [2, 2] } as const;

/** Lookup order matters for abbreviations: the first prefix match wins. */
export const FUNCTIONS: readonly FunctionDef[] = [
  { name: "InputValue", alias: "Input", scalars: ["rows", "cols"], minScalars: 1, inputs: [0, 0] },
  { name: "SparseInputValue", alias: "SparseInput", scalars: ["rows", "cols"], minScalars: 1, inputs: [0, 0] },
  {
    name: "ImageInput",
    scalars: ["width", "height", "channels", "cols"],
    minScalars: 3,
    inputs: [0, 0],
  },
  {
    name: "LearnableParameter",
    alias: "Parameter",
    scalars: ["rows", "cols"],
    minScalars: 1,
    inputs: [0, 0],
    learnable: true,
  },
  { name: "Constant", scalars: ["value", "rows", "cols"], minScalars: 1, inputs: [0, 0] },
  { name: "Plus", ...binary },
  { name: "Minus", ...binary },
  { name: "Times", ...binary },
  { name: "ElementTimes", ...binary },
  { name: "Scale", ...binary },
  { name: "Negate", ...unary },
  { name: "Sigmoid", ...unary },
  { name: "Tanh", ...unary },
  { name: "RectifiedLinear", alias: "ReLU", ...unary },
  { name: "Softmax", ...unary },
  { name: "LogSoftmax", ...unary },
  { name: "Log", ...unary },
  { name: "Exp", ...unary },
  { name: "Dropout", ...unary },
  { name: "SquareError", alias: "SE", ...binary },
  { name: "CrossEntropyWithSoftmax", alias: "CEWithSM", ...binary },
  { name: "CrossEntropy", ...binary },
  { name: "ErrorPrediction", alias: "ClassificationError", ...binary },
  { name: "Mean", ...unary },
  { name: "InvStdDev", ...unary },
  {
    name: "PerDimMeanVarNormalization",
    alias: "PerDimMVNorm",
    scalars: [],
    minScalars: 0,
    inputs: [3, 3],
  },
  { name: "RowSlice", scalars: ["startIndex", "numRows"], minScalars: 2, inputs: [1, 1] },
  { name: "Delay", alias: "PastValue", scalars: ["rows", "cols"], minScalars: 1, inputs: [1, 1] },
  { name: "Transpose", ...unary },
];

/** Resolve a (possibly abbreviated) function name */
export function findFunction(name: string): FunctionDef | undefined {
  return lookupName(name, FUNCTIONS);
}

/** Allowed positional parameter counts, as [min, max] */
export function arityRange(fn: FunctionDef): [number, number] {
  return [fn.minScalars + fn.inputs[0], fn.scalars.length + fn.inputs[1]];
}

/** Number of leading scalar parameters in a call with `positional` parameters */
export function scalarCount(fn: FunctionDef, positional: number): number {
  const count = positional - fn.inputs[0];
  return Math.min(Math.max(count, fn.minScalars), fn.scalars.length);
}

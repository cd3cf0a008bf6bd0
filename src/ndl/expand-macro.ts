import { ArityError, atLine } from "../errors.js";
import { qualify } from "../utils.js";
import type { MacroCallNode, NdlNode, NodeEvaluator, OptionalParameterNode, Pass } from "./types.js";

/** Actual parameters of a macro call matched to the macro's formals */
export type MacroBinding = {
  /** One entry per formal, in declaration order */
  formals: [formal: string, actual: NdlNode][];
  /** `name=value` parameters that name no formal */
  optional: OptionalParameterNode[];
};

/**
 * Match the parameters of a call to the formals of its macro.
 *
 * Positional parameters fill formals in order. A `name=value` parameter whose
 * name is a formal binds that formal, wherever it appears in the list. Every
 * formal must be bound exactly once.
 */
export function bindArguments(call: MacroCallNode): MacroBinding {
  const byFormal = new Map<string, NdlNode>();
  const positional: NdlNode[] = [];
  const optional: OptionalParameterNode[] = [];

  for (const param of call.params) {
    if (param.kind !== "optionalParameter") {
      positional.push(param);
      continue;
    }
    const lower = param.name.toLowerCase();
    const formal = call.formals.find((f) => f.toLowerCase() === lower);
    if (formal === undefined) {
      optional.push(param);
      continue;
    }
    if (byFormal.has(formal)) {
      throw new ArityError(
        atLine(call.line, `Parameter "${formal}" bound more than once in call to ${call.value}`),
        String(call.formals.length),
        positional.length + byFormal.size + 1,
        call.value,
      );
    }
    const actual = param.params[0];
    if (actual) byFormal.set(formal, actual);
  }

  const open = call.formals.filter((f) => !byFormal.has(f));
  if (positional.length !== open.length) {
    const supplied = positional.length + byFormal.size;
    throw new ArityError(
      atLine(
        call.line,
        `Parameter mismatch, ${supplied} parameters provided, ${call.formals.length} expected in call to ${call.value}`,
      ),
      String(call.formals.length),
      supplied,
      call.value,
    );
  }
  open.forEach((formal, i) => byFormal.set(formal, positional[i]));

  const formals: [string, NdlNode][] = [];
  for (const formal of call.formals) {
    const actual = byFormal.get(formal);
    if (actual) formals.push([formal, actual]);
  }
  return { formals, optional };
}

/**
 * Instantiate a macro call: bind the actual parameters into the shared body
 * script and evaluate it under `baseName.callName`.
 *
 * Returns the body symbol named like the macro when there is one, otherwise
 * the last node evaluated. The call node gets the result's handle.
 */
export function expandMacro<H>(
  call: MacroCallNode,
  evaluator: NodeEvaluator<H>,
  baseName: string,
  pass: Pass,
): NdlNode | undefined {
  const registry = call.owner.registry;
  const body = call.body;
  registry.enter(call.value);
  try {
    // the body is shared by every call of the macro, so handles from the
    // previous call must not leak into this one
    evaluator.handles.clearScript(body);

    const binding = bindArguments(call);
    const actuals = binding.formals.map(([formal, actual]) => ({
      formal,
      actual: resolveForwarded(call, actual),
    }));
    for (const { formal, actual } of actuals) body.symbols.assign(formal, actual);

    // optional parameters fill only names the body leaves open (unknown, or
    // a forward-reference placeholder), and only for the length of this call
    const opened: [name: string, previous: NdlNode | undefined][] = [];
    for (const opt of binding.optional) {
      const previous = body.symbols.get(opt.name);
      if (previous && previous.kind !== "undetermined") continue;
      body.symbols.add(opt.name, opt);
      opened.push([opt.name, previous]);
    }

    let result: NdlNode | undefined;
    try {
      result = body.evaluate(evaluator, qualify(baseName, call.name), pass);
      const named = body.symbols.get(call.value);
      if (named) result = named;
    } finally {
      for (const [name, previous] of opened) {
        if (previous) body.symbols.assign(name, previous);
        else body.symbols.delete(name);
      }
    }

    if (result) {
      const handle = evaluator.handles.get(result);
      if (handle !== undefined) evaluator.handles.set(call, handle);
    }
    return result;
  } finally {
    registry.exit();
  }
}

/**
 * A formal of an enclosing macro passed straight through (`inner(x)` inside
 * `outer(x)`) stands for whatever the caller's scope binds it to right now.
 */
function resolveForwarded(call: MacroCallNode, actual: NdlNode): NdlNode {
  if (actual.kind !== "parameter") return actual;
  return call.owner.symbols.get(actual.name) ?? actual;
}

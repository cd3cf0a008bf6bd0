import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { buildNetwork } from "../src/build.js";
import { ArityError, MacroDepthError, StateError, SymbolError } from "../src/errors.js";
import { ModelEditor } from "../src/mel/ModelEditor.js";
import { bindArguments } from "../src/ndl/expand-macro.js";
import { MacroRegistry } from "../src/ndl/MacroRegistry.js";
import { Script } from "../src/ndl/Script.js";

// ═══════════════════════════════════════════════════════════════════════════
// Macros
//
// A macro body is read once and shared by every call; each expansion binds
// the call's actual parameters and builds its nodes under the call's name.
// ═══════════════════════════════════════════════════════════════════════════

const linear = `
lin(v) = [
  W = Parameter(2, 2)
  lin = Times(W, v)
]
`;

describe("macro expansion", () => {
  test("constants passed to a macro become Constant inputs", () => {
    const { network } = buildNetwork("foo(x, y) = [\n  z = Plus(x, y)\n]\nfoo(1, 2)");
    const plus = network.nodes.filter((n) => n.op === "Plus");
    assert.equal(plus.length, 1);
    assert.deepStrictEqual(
      plus[0].inputs.map((input) => [input?.op, input?.value]),
      [
        ["Constant", "1"],
        ["Constant", "2"],
      ],
    );
    assert.deepStrictEqual(plus[0].inputs[0]?.dims, [1, 1]);
  });

  test("nodes are named after the call", () => {
    const { network } = buildNetwork(`${linear}\nx = Input(2)\nh1 = lin(x)`);
    const product = network.getNode("h1.lin");
    assert.equal(product?.op, "Times");
    assert.deepStrictEqual(product?.inputs.map((i) => i?.name), ["h1.W", "x"]);
    assert.equal(network.getNode("h1.W")?.learnable, true);
  });

  test("every call of a shared body gets its own nodes", () => {
    const { network } = buildNetwork(`${linear}\nx = Input(2)\nh1 = lin(x)\nh2 = lin(h1)`);
    const second = network.getNode("h2.lin");
    assert.deepStrictEqual(second?.inputs.map((i) => i?.name), ["h2.W", "h1.lin"]);
    assert.notEqual(network.getNode("h1.W"), network.getNode("h2.W"));
  });

  test("the symbol named like the macro is the result", () => {
    const { network } = buildNetwork(`${linear}\nx = Input(2)\nh1 = lin(x)\ng = Negate(h1)`);
    assert.equal(network.getNode("g")?.inputs[0], network.getNode("h1.lin"));
  });

  test("without a symbol named like the macro the last statement is the result", () => {
    const { network } = buildNetwork(
      "twice(v) = [\n  a1 = Negate(v)\n  a2 = Negate(a1)\n]\nx = Input(2)\nt = twice(x)\ng = Exp(t)",
    );
    assert.equal(network.getNode("g")?.inputs[0], network.getNode("t.a2"));
  });

  test("formals may be bound by name, interleaved with positional parameters", () => {
    const { network } = buildNetwork(
      "diff(a, b) = [\n  d = Minus(a, b)\n]\nout = diff(b=x, y)\nx = Input(2)\ny = Input(2)",
    );
    assert.deepStrictEqual(network.getNode("out.d")?.inputs.map((i) => i?.name), ["y", "x"]);
  });

  test("parameters pass through nested macros", () => {
    const { network } = buildNetwork(
      "inner(a) = [\n  inner = Negate(a)\n]\nouter(b) = [\n  o = inner(b)\n]\nx = Input(2)\nout = outer(x)",
    );
    const node = network.getNode("out.o.inner");
    assert.equal(node?.op, "Negate");
    assert.equal(node?.inputs[0], network.getNode("x"));
  });

  test("dotted names reach into an expansion", () => {
    const { network } = buildNetwork(`${linear}\nx = Input(2)\nh1 = lin(x)\ng = Negate(h1.W)`);
    assert.equal(network.getNode("g")?.inputs[0], network.getNode("h1.W"));
  });

  test("optional parameters of a call apply to its result", () => {
    const { network } = buildNetwork(`${linear}\nx = Input(2)\nh1 = lin(x, tag=output)`);
    assert.deepStrictEqual(
      network.roleNodes("output").map((n) => n.name),
      ["h1.lin"],
    );
  });

  test("an option naming a body symbol leaves that symbol alone", () => {
    const text = `
foo(x) = [
  y = Plus(b, x)
  b = Parameter(3)
]
in1 = Input(3)
c = Input(3)
r1 = foo(in1, b=c)
r2 = foo(in1)
`;
    const { network } = buildNetwork(text);
    assert.deepStrictEqual(network.getNode("r1.y")?.inputs.map((i) => i?.name), ["r1.b", "in1"]);
    assert.deepStrictEqual(network.getNode("r2.y")?.inputs.map((i) => i?.name), ["r2.b", "in1"]);
  });

  test("an option filling an open name lasts for its own call only", () => {
    const body = "bar(x) = [\n  s = Plus(k, x)\n]\nx = Input(2)\nk1 = Input(2)\nr1 = bar(x, k=k1)";
    const { network } = buildNetwork(body);
    assert.deepStrictEqual(network.getNode("r1.s")?.inputs.map((i) => i?.name), ["k1", "x"]);

    assert.throws(() => buildNetwork(`${body}\nr2 = bar(x)`), SymbolError);
  });

  test("options of one call do not reach the next call", () => {
    const { network } = buildNetwork(`${linear}\nx = Input(2)\nh1 = lin(x, tag=output)\nh2 = lin(x)`);
    assert.deepStrictEqual(
      network.roleNodes("output").map((n) => n.name),
      ["h1.lin"],
    );
  });

  test("one-line macros", () => {
    const { network } = buildNetwork("sq(v) = Times(v, v)\nx = Input(2)\ny = sq(x)");
    const product = network.nodes.find((n) => n.op === "Times");
    assert.deepStrictEqual(product?.inputs.map((i) => i?.name), ["x", "x"]);
  });
});

describe("macro definitions and calls: errors", () => {
  test("wrong parameter count is reported before anything is built", () => {
    assert.throws(
      () => buildNetwork("pair(a, b) = [\n  total = Plus(a, b)\n]\nx = Input(2)\nout = pair(x)"),
      (err: unknown) =>
        err instanceof ArityError &&
        err.expected === "2" &&
        err.actual === 1 &&
        err.message === "Line 5: Parameter mismatch, 1 parameters provided, 2 expected in call to pair",
    );
  });

  test("in an editing script the failing call adds no nodes", () => {
    const editor = new ModelEditor();
    editor.run("CreateModel()\npair(a, b) = [\n  total = Plus(a, b)\n]\nx = Input(2)");
    assert.throws(() => editor.run("out = pair(x)"), ArityError);
    assert.deepStrictEqual(editor.defaultModel?.network.nodes.map((n) => n.name), ["x"]);
  });

  test("a formal bound twice", () => {
    assert.throws(
      () => buildNetwork("pair(a, b) = [\n  total = Plus(a, b)\n]\nout = pair(a=1, a=2)"),
      (err: unknown) => err instanceof ArityError && err.message.includes('"a" bound more than once'),
    );
  });

  test("redefining a macro", () => {
    assert.throws(
      () => buildNetwork("foo(v) = Negate(v)\nfoo(w) = Exp(w)"),
      (err: unknown) => err instanceof SymbolError && err.message === 'Line 2: Function "foo" already defined',
    );
  });

  test("a macro may not take a function's name", () => {
    assert.throws(() => buildNetwork("Plus(v) = Negate(v)"), SymbolError);
  });

  test("a macro whose body fails to read is not defined", () => {
    const registry = new MacroRegistry();
    const script = new Script(registry);
    assert.throws(() => script.parse("bad(v) = [\n  z = Frobnicate(v)\n]"), SymbolError);
    assert.equal(registry.global.symbols.has("bad"), false);
  });

  test("definitions are not allowed in one-line bodies", () => {
    const script = new Script(new MacroRegistry(), { allowDefinitions: false });
    assert.throws(() => script.parse("foo(v) = Negate(v)"), /not allowed/);
  });

  test("recursion stops at the configured depth", () => {
    const text = "deep(v) = [\n  deeper = deep(v)\n]\nx = Input(2)\nout = deep(x)";
    assert.throws(
      () => buildNetwork(text, { maxMacroDepth: 8 }),
      (err: unknown) =>
        err instanceof MacroDepthError &&
        err.chain.length === 9 &&
        err.chain.every((name) => name === "deep") &&
        err.message === "Macro expansion deeper than 8: deep -> deep -> deep -> deep",
    );
  });
});

describe("bindArguments", () => {
  test("pairs formals with actuals in declaration order", () => {
    const script = new Script(new MacroRegistry());
    script.parse("diff(a, b) = [\n  d = Minus(a, b)\n]\nx = Input(2)\ny = Input(2)\nout = diff(y, a=x, tag=output)");
    const call = script.symbols.get("out");
    assert.equal(call?.kind, "macroCall");
    if (call?.kind !== "macroCall") return;
    const binding = bindArguments(call);
    assert.deepStrictEqual(
      binding.formals.map(([formal, actual]) => [formal, actual.name]),
      [
        ["a", "x"],
        ["b", "y"],
      ],
    );
    assert.deepStrictEqual(binding.optional.map((o) => [o.name, o.value]), [["tag", "output"]]);
  });
});

describe("MacroRegistry", () => {
  test("generated names count up", () => {
    const registry = new MacroRegistry();
    assert.equal(registry.nextName(), "unnamed1");
    assert.equal(registry.nextName(), "unnamed2");
  });

  test("expansion chain", () => {
    const registry = new MacroRegistry({ maxMacroDepth: 2 });
    registry.enter("a");
    registry.enter("b");
    assert.deepStrictEqual([...registry.chain], ["a", "b"]);
    assert.throws(() => registry.enter("c"), MacroDepthError);
    registry.exit();
    registry.exit();
    assert.throws(() => registry.exit(), StateError);
  });
});

import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { buildNetwork } from "../src/build.js";
import { ModelFormatError } from "../src/errors.js";
import { ComputationNetwork } from "../src/network/ComputationNetwork.js";
import { MODEL_FORMAT, MODEL_VERSION, parseModel, serializeNetwork } from "../src/network/serialize.js";
import { createMemoryFiles } from "./_files.js";

const NDL = `
features = Input(4, tag=feature)
labels = Input(2, tag=label)
W0 = Parameter(2, 4, init=uniform)
out = Times(W0, features, tag=output)
err = SquareError(labels, out, tag=criteria)
`;

describe("serializeNetwork", () => {
  test("document shape", () => {
    const net = new ComputationNetwork();
    const x = net.createNode({ name: "x", op: "InputValue", dims: [3] });
    net.createNode({ name: "c", op: "Constant", value: "0.5", dims: [1, 1] });
    net.createNode({ name: "h", op: "Negate", inputs: [x] });
    net.setRole(x, "feature", true);

    assert.deepStrictEqual(serializeNetwork(net), {
      format: MODEL_FORMAT,
      version: MODEL_VERSION,
      nodes: [
        { name: "x", op: "InputValue", dims: [3], inputs: [], learnable: false, needsGradient: false, attributes: {} },
        {
          name: "c",
          op: "Constant",
          value: "0.5",
          dims: [1, 1],
          inputs: [],
          learnable: false,
          needsGradient: false,
          attributes: {},
        },
        { name: "h", op: "Negate", dims: [], inputs: ["x"], learnable: false, needsGradient: false, attributes: {} },
      ],
      roles: { feature: ["x"], label: [], finalCriterion: [], evaluation: [], output: [] },
    });
  });

  test("open inputs are written as null", () => {
    const net = new ComputationNetwork();
    net.createNode({ name: "h", op: "Negate", inputs: [null] });
    assert.deepStrictEqual(serializeNetwork(net).nodes[0].inputs, [null]);
  });
});

describe("save and load", () => {
  test("a built network reads back identically", () => {
    const files = createMemoryFiles();
    const built = buildNetwork(NDL).network;
    built.saveToFile("model.json", files);

    const loaded = new ComputationNetwork();
    loaded.loadFromFile("model.json", files);
    assert.equal(loaded.dump(true), built.dump(true));
    assert.deepStrictEqual(serializeNetwork(loaded), serializeNetwork(built));
    assert.equal(loaded.requireNode("out").inputs[0], loaded.getNode("W0"));
    assert.deepStrictEqual(
      loaded.roleNodes("finalCriterion").map((n) => n.name),
      ["err"],
    );
  });

  test("saved text is indented JSON with a trailing newline", () => {
    const files = createMemoryFiles();
    const net = new ComputationNetwork();
    net.createNode({ name: "x", op: "InputValue", dims: [2] });
    net.saveToFile("m.json", files);
    const text = files.files.get("m.json") ?? "";
    assert.ok(text.endsWith("}\n"));
    assert.ok(text.startsWith(`{\n  "format": "${MODEL_FORMAT}",\n  "version": ${MODEL_VERSION},`));
  });

  test("missing file surfaces the file access error", () => {
    assert.throws(() => new ComputationNetwork().loadFromFile("none.json", createMemoryFiles()), {
      message: "ENOENT: no such file, open 'none.json'",
    });
  });
});

// ── Format errors ───────────────────────────────────────────────────────────

describe("parseModel", () => {
  const valid = () => serializeNetwork(buildNetwork("x = Input(2)\nh = Negate(x)").network);

  test("accepts a saved document", () => {
    const model = parseModel(JSON.stringify(valid()), "m.json");
    assert.deepStrictEqual(
      model.nodes.map((n) => n.name),
      ["x", "h"],
    );
  });

  test("not JSON", () => {
    assert.throws(() => parseModel("{ nodes: ", "bad.json"), (err: unknown) => {
      assert.ok(err instanceof ModelFormatError);
      assert.match(err.message, /^bad\.json: not a JSON document \(/);
      assert.equal(err.token, "bad.json");
      return true;
    });
  });

  test("wrong format tag", () => {
    const doc = { ...valid(), format: "something-else" };
    assert.throws(() => parseModel(JSON.stringify(doc), "m.json"), {
      name: "ModelFormatError",
      message: /^m\.json: invalid model at format: /,
    });
  });

  test("wrong version", () => {
    const doc = { ...valid(), version: 2 };
    assert.throws(() => parseModel(JSON.stringify(doc), "m.json"), {
      message: /^m\.json: invalid model at version: /,
    });
  });

  test("bad node field", () => {
    const doc = valid();
    const broken = { ...doc, nodes: [{ ...doc.nodes[0], dims: [-1] }] };
    assert.throws(() => parseModel(JSON.stringify(broken), "m.json"), {
      message: /^m\.json: invalid model at nodes\.0\.dims\.0: /,
    });
  });

  test("unknown input name on load", () => {
    const doc = valid();
    const broken = { ...doc, nodes: [{ ...doc.nodes[1], inputs: ["ghost"] }] };
    const files = createMemoryFiles({ "m.json": JSON.stringify(broken) });
    assert.throws(() => new ComputationNetwork().loadFromFile("m.json", files), {
      name: "ModelFormatError",
      message: 'm.json: unknown node "ghost"',
    });
  });

  test("duplicate node on load", () => {
    const doc = valid();
    const broken = { ...doc, nodes: [doc.nodes[0], doc.nodes[0]] };
    const files = createMemoryFiles({ "m.json": JSON.stringify(broken) });
    assert.throws(() => new ComputationNetwork().loadFromFile("m.json", files), {
      message: 'm.json: duplicate node "x"',
    });
  });
});

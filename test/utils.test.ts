import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { NdlSyntaxError } from "../src/errors.js";
import { FUNCTIONS } from "../src/ndl/functions.js";
import { COMMANDS, PROPERTIES } from "../src/mel/commands.js";
import { DEFAULT_MAX_MACRO_DEPTH, defaultLogger, nodeFiles, resolveOptions } from "../src/options.js";
import {
  lookupName,
  matchName,
  matchWildcard,
  parseBoolean,
  qualify,
  splitFirst,
  substituteWildcard,
} from "../src/utils.js";

// ── Abbreviations ───────────────────────────────────────────────────────────

describe("matchName", () => {
  test("accepts a prefix covering at least half the name", () => {
    assert.equal(matchName("dump", "DumpModel"), "DumpModel");
    assert.equal(matchName("Creat", "CreateModel"), "CreateModel");
  });

  test("rejects a prefix shorter than half the name", () => {
    assert.equal(matchName("Du", "DumpModel"), undefined);
    assert.equal(matchName("Crea", "CreateModel"), undefined);
  });

  test("rejects tokens longer than the name", () => {
    assert.equal(matchName("Plusses", "Plus"), undefined);
  });

  test("matches the alternate spelling and returns the canonical name", () => {
    assert.equal(matchName("SetInput", "SetNodeInput", "SetInput"), "SetNodeInput");
  });

  test("empty token never matches", () => {
    assert.equal(matchName("", "Plus"), undefined);
  });
});

describe("lookupName", () => {
  test("exact alias wins", () => {
    assert.equal(lookupName("Input", FUNCTIONS)?.name, "InputValue");
    assert.equal(lookupName("copy", COMMANDS)?.name, "CopyNode");
  });

  test("first prefix match in vocabulary order", () => {
    assert.equal(lookupName("Sig", FUNCTIONS)?.name, "Sigmoid");
    assert.equal(lookupName("CrossE", FUNCTIONS)?.name, "CrossEntropy");
    assert.equal(lookupName("Dump", COMMANDS)?.name, "DumpModel");
  });

  test("Du does not resolve to any command", () => {
    assert.equal(lookupName("Du", COMMANDS), undefined);
  });

  test("properties by name and alias", () => {
    assert.equal(lookupName("criteria", PROPERTIES)?.name, "FinalCriterion");
    assert.equal(lookupName("NeedsGradient", PROPERTIES)?.name, "ComputeGradient");
    assert.equal(lookupName("Recurrent", PROPERTIES), undefined);
  });
});

// ── Names ───────────────────────────────────────────────────────────────────

describe("qualify / splitFirst", () => {
  test("qualify joins non-empty base names", () => {
    assert.equal(qualify("", "W"), "W");
    assert.equal(qualify("L1", "W"), "L1.W");
    assert.equal(qualify("L1.inner", "W"), "L1.inner.W");
  });

  test("splitFirst separates the first segment", () => {
    assert.deepStrictEqual(splitFirst("N1.L1.W"), ["N1", "L1.W"]);
    assert.deepStrictEqual(splitFirst("W"), ["W", undefined]);
  });
});

// ── Wildcards ───────────────────────────────────────────────────────────────

describe("matchWildcard", () => {
  test("captures the text matched by the star", () => {
    assert.equal(matchWildcard("W*", "W0"), "0");
    assert.equal(matchWildcard("L*.W", "L12.W"), "12");
    assert.equal(matchWildcard("*", "anything"), "anything");
  });

  test("literal patterns capture the empty string", () => {
    assert.equal(matchWildcard("x", "x"), "");
    assert.equal(matchWildcard("x", "y"), undefined);
  });

  test("non-matching names", () => {
    assert.equal(matchWildcard("W*", "b0"), undefined);
    assert.equal(matchWildcard("ab*ba", "aba"), undefined);
  });

  test("more than one star is a syntax error", () => {
    assert.throws(() => matchWildcard("a*b*", "ab"), NdlSyntaxError);
  });

  test("substituteWildcard fills the target pattern", () => {
    assert.equal(substituteWildcard("pfx_*", "W0"), "pfx_W0");
    assert.equal(substituteWildcard("copy", "W0"), "copy");
  });
});

describe("parseBoolean", () => {
  test("true and false spellings", () => {
    assert.equal(parseBoolean("true"), true);
    assert.equal(parseBoolean("Yes"), true);
    assert.equal(parseBoolean("1"), true);
    assert.equal(parseBoolean("FALSE"), false);
    assert.equal(parseBoolean("no"), false);
    assert.equal(parseBoolean("0"), false);
  });

  test("anything else is undefined", () => {
    assert.equal(parseBoolean("maybe"), undefined);
    assert.equal(parseBoolean(""), undefined);
  });
});

// ── Options ─────────────────────────────────────────────────────────────────

describe("resolveOptions", () => {
  test("defaults", () => {
    const options = resolveOptions();
    assert.equal(options.separator, ";");
    assert.equal(options.maxMacroDepth, DEFAULT_MAX_MACRO_DEPTH);
    assert.equal(options.logger, defaultLogger);
    assert.equal(options.files, nodeFiles);
  });

  test("accepts a punctuation separator", () => {
    assert.equal(resolveOptions({ separator: "|" }).separator, "|");
  });

  test("rejects separators the grammar uses", () => {
    for (const separator of [",", "=", "ab", ""]) {
      assert.throws(() => resolveOptions({ separator }), { name: "StateError" }, separator);
    }
  });

  test("rejects a non-positive depth", () => {
    assert.throws(() => resolveOptions({ maxMacroDepth: 0 }), {
      name: "StateError",
      message: "Invalid maxMacroDepth 0: expected a positive integer",
    });
  });
});

import { describe, it, expect } from "vitest";
import { analyzeSource, parseSource } from "../../src/analyzer/source.js";
import { collectCalleeNames, estimateCoverage } from "../../src/validator/coverage.js";

const TARGET = analyzeSource(`export function parseConfig(text: string) { return text; }
export function formatDate(d: Date) { return d.toISOString(); }
`, "target.ts");

function tree(code: string) {
  return parseSource(code, "candidate.test.ts").sourceFile;
}

describe("collectCalleeNames", () => {
  it("names plain and property-access callees", () => {
    const names = collectCalleeNames(tree("foo();\nobj.bar(1);\na.b.c();\n(() => 1)();"));
    expect(names).toEqual(["foo", "bar", "c"]);
  });

  it("skips test-framework calls but keeps the calls inside them", () => {
    const names = collectCalleeNames(tree(`describe("x", () => {
  beforeEach(() => vi.fn());
  it.each([1])("runs %i", () => {
    expect(load(1)).not.toBe(2);
    expect.assertions(1);
  });
});`));
    expect(names).toEqual(["load"]);
  });
});

describe("estimateCoverage", () => {
  it("scores the share of declared functions that are called", () => {
    const estimate = estimateCoverage(tree(`describe("cfg", () => {
  it("parses", () => {
    expect(parseConfig("a")).toEqual("a");
  });
});`), TARGET);
    expect(estimate).toEqual({ functionsReferenced: ["parseConfig"], score: 0.5 });
  });

  it("matches callee names that contain a declared name", () => {
    const estimate = estimateCoverage(tree("parseConfigFile();\nutils.formatDate(new Date());"), TARGET);
    expect(estimate.functionsReferenced).toEqual(["parseConfig", "formatDate"]);
    expect(estimate.score).toBe(1);
  });

  it("ignores names that only appear outside calls", () => {
    const estimate = estimateCoverage(tree("const fn = parseConfig;\n// formatDate()"), TARGET);
    expect(estimate.score).toBe(0);
  });

  it("counts duplicate declarations once", () => {
    const target = analyzeSource("export class A { run() {} }\nexport class B { run() {} }\n", "dup.ts");
    const estimate = estimateCoverage(tree("new A().run();"), target);
    expect(estimate).toEqual({ functionsReferenced: ["run"], score: 1 });
  });

  it("does not credit short names that only matcher or hook calls contain", () => {
    const target = analyzeSource("export function to() {}\nexport function be() {}\nexport function it2() {}\n", "short.ts");
    const estimate = estimateCoverage(tree(`describe("s", () => {
  beforeEach(() => {});
  it("x", () => {
    expect(1).toBe(1);
    expect(vi.fn()).toHaveBeenCalledTimes(0);
    expect(2).toEqual(2);
  });
});`), target);
    expect(estimate).toEqual({ functionsReferenced: [], score: 0 });
  });

  it("is zero when the target declares no functions", () => {
    const target = analyzeSource("export const x = 1;\n", "const.ts");
    expect(estimateCoverage(tree("x();"), target)).toEqual({ functionsReferenced: [], score: 0 });
  });
});

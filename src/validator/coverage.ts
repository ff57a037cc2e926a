import ts from "typescript";
import type { SourceAnalysis } from "../analyzer/types.js";

export interface CoverageEstimate {
  /** Declared target functions that some call in the candidate refers to */
  functionsReferenced: string[];
  /** |referenced| / |declared|, and 0 when nothing is declared */
  score: number;
}

export const NO_COVERAGE: CoverageEstimate = { functionsReferenced: [], score: 0 };

/** Test-framework globals; calls rooted in these never count toward coverage. */
const HARNESS_GLOBALS = new Set([
  "describe", "it", "test", "suite", "expect", "assert",
  "beforeEach", "afterEach", "beforeAll", "afterAll", "vi", "jest",
]);

/** True for `expect(x).not.toBe(1)`, `vi.fn()`, `it.each(rows)(...)` and the like. */
function isHarnessCall(callee: ts.Expression): boolean {
  let node = callee;
  for (;;) {
    if (ts.isIdentifier(node)) return HARNESS_GLOBALS.has(node.text);
    if (ts.isPropertyAccessExpression(node) || ts.isElementAccessExpression(node)) node = node.expression;
    else if (ts.isCallExpression(node) || ts.isNonNullExpression(node)) node = node.expression;
    else return false;
  }
}

/**
 * Names of every callee in the tree: `foo()` gives "foo", `obj.bar()` gives "bar".
 * Test-framework calls such as `it(...)` and `expect(x).toBe(y)` are skipped.
 */
export function collectCalleeNames(sourceFile: ts.SourceFile): string[] {
  const names: string[] = [];

  const visit = (node: ts.Node) => {
    if (ts.isCallExpression(node) && !isHarnessCall(node.expression)) {
      const callee = node.expression;
      if (ts.isIdentifier(callee)) names.push(callee.text);
      else if (ts.isPropertyAccessExpression(callee)) names.push(callee.name.text);
    }
    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return names;
}

/**
 * Loose textual coverage: a declared function counts as referenced when a callee
 * name contains it or is contained in it.
 */
export function estimateCoverage(sourceFile: ts.SourceFile, target: SourceAnalysis): CoverageEstimate {
  const declared = [...new Set(target.functions.map((f) => f.name))];
  if (declared.length === 0) return { ...NO_COVERAGE, functionsReferenced: [] };

  const callees = new Set(collectCalleeNames(sourceFile));
  const referenced = declared.filter((name) => {
    for (const callee of callees) {
      if (callee.includes(name) || name.includes(callee)) return true;
    }
    return false;
  });

  return {
    functionsReferenced: referenced,
    score: referenced.length / declared.length,
  };
}

import { relative, resolve } from "node:path";
import { CodebaseAnalyzer } from "../analyzer/codebase.js";
import type { ProjectContext, ProjectConventions, SourceAnalysis } from "../analyzer/types.js";
import { describeError } from "../core/errors.js";
import { dim, errorMsg, heading, warnMsg } from "../utils/display.js";

function listOrNone(values: readonly string[]): string {
  return values.length > 0 ? values.join(", ") : dim("none");
}

export function formatAnalysis(analysis: SourceAnalysis): string[] {
  if (analysis.diagnosticError) {
    return [warnMsg(`Could not parse: ${analysis.diagnosticError}`)];
  }

  const lines: string[] = [];
  lines.push(`  functions: ${analysis.functions.length === 0 ? dim("none") : ""}`);
  for (const fn of analysis.functions) {
    const prefix = fn.isAsync ? "async " : "";
    const returns = fn.returnAnnotation ? `: ${fn.returnAnnotation}` : "";
    lines.push(`    ${prefix}${fn.name}(${fn.parameterNames.join(", ")})${returns}`);
  }
  lines.push(`  classes: ${analysis.classes.length === 0 ? dim("none") : ""}`);
  for (const cls of analysis.classes) {
    const bases = cls.baseNames.length > 0 ? ` extends ${cls.baseNames.join(", ")}` : "";
    lines.push(`    ${cls.name}${bases} [${cls.methodNames.join(", ")}]`);
  }
  lines.push(`  dependencies: ${listOrNone(analysis.dependencies)}`);
  lines.push(`  constants: ${listOrNone(analysis.constants)}`);

  const signals = Object.entries(analysis.signals).filter(([, on]) => on).map(([name]) => name);
  lines.push(`  signals: ${listOrNone(signals)}`);
  return lines;
}

export function formatConventions(conventions: ProjectConventions): string[] {
  return [
    `  test directory: ${conventions.hasDedicatedTestDirectory ? "yes" : "no"}`,
    `  config files: ${listOrNone(conventions.configFilesPresent)}`,
    `  test imports: ${listOrNone(conventions.commonTestImports)}`,
    `  assertions: ${listOrNone(conventions.assertionStyles)}`,
    `  fixtures: ${listOrNone(conventions.fixturePatterns)}`,
  ];
}

export async function analyzeCommand(
  source: string,
  options: { path?: string; json?: boolean },
): Promise<void> {
  const rootPath = resolve(options.path ?? ".");
  const target = resolve(source);

  let context: ProjectContext;
  try {
    context = await new CodebaseAnalyzer(rootPath).getProjectContext(target);
  } catch (err) {
    console.log(errorMsg(`Cannot analyze ${source}: ${describeError(err)}`));
    process.exitCode = 1;
    return;
  }

  const relatedFiles = context.relatedFiles.map((f) => relative(rootPath, f));

  if (options.json) {
    console.log(JSON.stringify({
      file: relative(rootPath, target),
      analysis: context.targetAnalysis,
      relatedFiles,
      conventions: context.conventions,
    }, null, 2));
    return;
  }

  console.log(heading(`\n${relative(rootPath, target)}\n`));
  for (const line of formatAnalysis(context.targetAnalysis)) console.log(line);

  console.log(heading("\nRelated files\n"));
  if (relatedFiles.length === 0) console.log(dim("  none"));
  for (const file of relatedFiles) console.log(`  ${file}`);

  console.log(heading("\nProject conventions\n"));
  for (const line of formatConventions(context.conventions)) console.log(line);
  console.log("");
}

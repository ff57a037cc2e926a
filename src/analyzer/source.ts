import { createHash } from "node:crypto";
import { readFile, readdir, access } from "node:fs/promises";
import { basename, dirname, extname, join, resolve } from "node:path";
import ts from "typescript";
import type { ClassInfo, FunctionInfo, SourceAnalysis, StructuralSignals } from "./types.js";

// File extensions the analyzer can parse
export const SOURCE_EXTENSIONS = new Set([
  ".ts", ".tsx", ".mts", ".cts",
  ".js", ".jsx", ".mjs", ".cjs",
]);

const TEST_FILE_PATTERN = /\.(test|spec)\.[cm]?[jt]sx?$/;

export function isSourceFile(filename: string): boolean {
  if (filename.endsWith(".d.ts")) return false;
  return SOURCE_EXTENSIONS.has(extname(filename).toLowerCase());
}

export function isTestFile(filename: string): boolean {
  return TEST_FILE_PATTERN.test(filename);
}

export function hashContent(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}

export async function readSourceFile(filePath: string): Promise<string> {
  return readFile(filePath, "utf-8");
}

export function scriptKindFor(fileName: string): ts.ScriptKind {
  switch (extname(fileName).toLowerCase()) {
    case ".tsx": return ts.ScriptKind.TSX;
    case ".jsx": return ts.ScriptKind.JSX;
    case ".js":
    case ".mjs":
    case ".cjs": return ts.ScriptKind.JS;
    default: return ts.ScriptKind.TS;
  }
}

/** Language a file is parsed as, named the way prompts refer to it. */
export function languageOf(fileName: string): "TypeScript" | "JavaScript" {
  const kind = scriptKindFor(fileName);
  return kind === ts.ScriptKind.JS || kind === ts.ScriptKind.JSX ? "JavaScript" : "TypeScript";
}

export interface ParsedSource {
  sourceFile: ts.SourceFile;
  /** First syntax error, formatted as "Line L, column C: message" */
  error?: string;
}

/**
 * Parse source text into a syntax tree. Syntax errors are reported, never thrown.
 */
export function parseSource(text: string, fileName = "source.ts"): ParsedSource {
  const sourceFile = ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true, scriptKindFor(fileName));

  const { diagnostics } = ts.transpileModule(text, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
      jsx: ts.JsxEmit.Preserve,
    },
  });

  const first = diagnostics?.find((d) => d.category === ts.DiagnosticCategory.Error);
  if (!first) return { sourceFile };

  return { sourceFile, error: formatDiagnostic(first) };
}

function formatDiagnostic(diagnostic: ts.Diagnostic): string {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
  if (!diagnostic.file || diagnostic.start === undefined) return message;
  const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
  return `Line ${line + 1}, column ${character + 1}: ${message}`;
}

const NO_SIGNALS: StructuralSignals = {
  raisesExceptions: false,
  handlesExceptions: false,
  usesDecorators: false,
  hasAsyncFunctions: false,
};

function failedAnalysis(contentHash: string, diagnosticError: string): SourceAnalysis {
  return Object.freeze({
    contentHash,
    functions: [],
    classes: [],
    imports: [],
    constants: [],
    dependencies: [],
    signals: { ...NO_SIGNALS },
    diagnosticError,
  });
}

type FunctionLike =
  | ts.FunctionDeclaration
  | ts.MethodDeclaration
  | ts.ArrowFunction
  | ts.FunctionExpression;

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  if (!ts.canHaveModifiers(node)) return false;
  return ts.getModifiers(node)?.some((m) => m.kind === kind) ?? false;
}

function hasDecorators(node: ts.Node): boolean {
  if (!ts.canHaveDecorators(node)) return false;
  return (ts.getDecorators(node)?.length ?? 0) > 0;
}

function docstringOf(node: ts.Node): string | undefined {
  const docs = ts.getJSDocCommentsAndTags(node).filter(ts.isJSDoc);
  const doc = docs[docs.length - 1];
  if (!doc) return undefined;
  const text = ts.getTextOfJSDocComment(doc.comment)?.trim();
  return text || undefined;
}

function describeFunction(
  name: string,
  fn: FunctionLike,
  docHost: ts.Node,
  sourceFile: ts.SourceFile,
): FunctionInfo {
  const info: FunctionInfo = {
    name,
    parameterNames: fn.parameters.map((p) => p.name.getText(sourceFile)),
    isAsync: hasModifier(fn, ts.SyntaxKind.AsyncKeyword),
    hasDecorators: hasDecorators(fn),
  };
  if (fn.type) info.returnAnnotation = fn.type.getText(sourceFile);
  const docstring = docstringOf(docHost);
  if (docstring) info.docstring = docstring;
  return info;
}

function describeClass(node: ts.ClassDeclaration, sourceFile: ts.SourceFile): ClassInfo {
  const baseNames: string[] = [];
  for (const clause of node.heritageClauses ?? []) {
    for (const type of clause.types) {
      baseNames.push(type.getText(sourceFile));
    }
  }

  const methodNames: string[] = [];
  for (const member of node.members) {
    if (ts.isMethodDeclaration(member)) {
      methodNames.push(member.name.getText(sourceFile));
    }
  }

  const info: ClassInfo = { name: node.name?.text ?? "default", baseNames, methodNames };
  const docstring = docstringOf(node);
  if (docstring) info.docstring = docstring;
  return info;
}

function isFunctionInitializer(node: ts.Expression | undefined): node is ts.ArrowFunction | ts.FunctionExpression {
  return node !== undefined && (ts.isArrowFunction(node) || ts.isFunctionExpression(node));
}

function bindingNames(name: ts.BindingName): string[] {
  if (ts.isIdentifier(name)) return [name.text];
  const names: string[] = [];
  for (const element of name.elements) {
    if (ts.isBindingElement(element)) names.push(...bindingNames(element.name));
  }
  return names;
}

function stringArgument(call: ts.CallExpression): string | undefined {
  const [arg] = call.arguments;
  return arg && ts.isStringLiteralLike(arg) ? arg.text : undefined;
}

/**
 * Analyze the static structure of one source file.
 *
 * The tree is walked once, breadth-first. Top-level functions and classes are
 * reported in declaration order, followed by nested definitions (class methods,
 * inner functions) in traversal order. Never throws: a parse failure comes back
 * as `diagnosticError` with every other collection empty.
 */
export function analyzeSource(sourceText: string, fileName = "source.ts"): SourceAnalysis {
  const contentHash = hashContent(sourceText);

  let parsed: ParsedSource;
  try {
    parsed = parseSource(sourceText, fileName);
  } catch (err) {
    return failedAnalysis(contentHash, err instanceof Error ? err.message : String(err));
  }
  if (parsed.error) return failedAnalysis(contentHash, parsed.error);

  const { sourceFile } = parsed;
  const topFunctions: Array<{ pos: number; info: FunctionInfo }> = [];
  const nestedFunctions: FunctionInfo[] = [];
  const topClasses: ClassInfo[] = [];
  const nestedClasses: ClassInfo[] = [];
  const imports: string[] = [];
  const constants = new Set<string>();
  const dependencies = new Set<string>();
  const signals: StructuralSignals = { ...NO_SIGNALS };

  const addFunction = (info: FunctionInfo, topLevelPos: number | undefined) => {
    if (info.isAsync) signals.hasAsyncFunctions = true;
    if (topLevelPos !== undefined) topFunctions.push({ pos: topLevelPos, info });
    else nestedFunctions.push(info);
  };

  const queue: ts.Node[] = [...sourceFile.statements];
  while (queue.length > 0) {
    const node = queue.shift();
    if (!node) break;

    if (ts.isFunctionDeclaration(node) && node.name) {
      const topLevel = node.parent === sourceFile ? node.pos : undefined;
      addFunction(describeFunction(node.name.text, node, node, sourceFile), topLevel);
    } else if (ts.isMethodDeclaration(node) && ts.isClassLike(node.parent)) {
      addFunction(describeFunction(node.name.getText(sourceFile), node, node, sourceFile), undefined);
    } else if (ts.isVariableDeclaration(node)) {
      const statement = node.parent.parent;
      const isModuleLevel = ts.isVariableStatement(statement) && statement.parent === sourceFile;
      if (ts.isIdentifier(node.name) && isFunctionInitializer(node.initializer)) {
        const docHost = ts.isVariableStatement(statement) ? statement : node;
        const info = describeFunction(node.name.text, node.initializer, docHost, sourceFile);
        addFunction(info, isModuleLevel ? statement.pos : undefined);
      } else if (isModuleLevel) {
        for (const name of bindingNames(node.name)) constants.add(name);
      }
    } else if (ts.isClassDeclaration(node)) {
      const info = describeClass(node, sourceFile);
      if (node.parent === sourceFile) topClasses.push(info);
      else nestedClasses.push(info);
    } else if (ts.isImportDeclaration(node)) {
      const specifier = ts.isStringLiteral(node.moduleSpecifier) ? node.moduleSpecifier.text : undefined;
      if (specifier) dependencies.add(specifier);
      const clause = node.importClause;
      if (!clause) {
        if (specifier) imports.push(specifier);
      } else {
        if (clause.name) imports.push(clause.name.text);
        const bindings = clause.namedBindings;
        if (bindings && ts.isNamespaceImport(bindings)) imports.push(bindings.name.text);
        if (bindings && ts.isNamedImports(bindings)) {
          for (const element of bindings.elements) imports.push(element.name.text);
        }
      }
    } else if (ts.isImportEqualsDeclaration(node)) {
      imports.push(node.name.text);
      const ref = node.moduleReference;
      if (ts.isExternalModuleReference(ref) && ts.isStringLiteral(ref.expression)) {
        dependencies.add(ref.expression.text);
      }
    } else if (ts.isExportDeclaration(node)) {
      if (node.moduleSpecifier && ts.isStringLiteral(node.moduleSpecifier)) {
        dependencies.add(node.moduleSpecifier.text);
      }
    } else if (ts.isCallExpression(node)) {
      const isRequire = ts.isIdentifier(node.expression) && node.expression.text === "require";
      const isDynamicImport = node.expression.kind === ts.SyntaxKind.ImportKeyword;
      const specifier = isRequire || isDynamicImport ? stringArgument(node) : undefined;
      if (specifier) dependencies.add(specifier);
    } else if (ts.isThrowStatement(node)) {
      signals.raisesExceptions = true;
    } else if (ts.isTryStatement(node)) {
      signals.handlesExceptions = true;
    } else if (ts.isDecorator(node)) {
      signals.usesDecorators = true;
    }

    ts.forEachChild(node, (child) => {
      queue.push(child);
    });
  }

  topFunctions.sort((a, b) => a.pos - b.pos);

  return Object.freeze({
    contentHash,
    functions: [...topFunctions.map((f) => f.info), ...nestedFunctions],
    classes: [...topClasses, ...nestedClasses],
    imports,
    constants: [...constants],
    dependencies: [...dependencies],
    signals,
  });
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find files related to a target: sibling source files (excluding the target and
 * its tests), then any conventionally named test file for it. Test locations are
 * checked in order: same directory, `tests/` below it, `tests/` beside its parent.
 */
export async function findRelatedFiles(targetPath: string): Promise<string[]> {
  const target = resolve(targetPath);
  const dir = dirname(target);
  const ext = extname(target);
  const stem = basename(target, ext);
  const related: string[] = [];

  try {
    const entries = await readdir(dir, { withFileTypes: true });
    const siblings = entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .filter((name) => name !== basename(target) && isSourceFile(name) && !isTestFile(name))
      .sort();
    for (const name of siblings) related.push(join(dir, name));
  } catch {
    // Missing directory: no siblings
  }

  const testDirs = [dir, join(dir, "tests"), join(dir, "..", "tests")];
  for (const testDir of testDirs) {
    for (const candidate of [`${stem}.test${ext}`, `${stem}.spec${ext}`]) {
      const candidatePath = join(testDir, candidate);
      if (await exists(candidatePath)) {
        related.push(candidatePath);
        break;
      }
    }
  }

  return related;
}

export interface FunctionInfo {
  name: string;
  /** Declaration order is preserved; duplicates are kept as written */
  parameterNames: string[];
  returnAnnotation?: string;
  /** JSDoc comment text */
  docstring?: string;
  isAsync: boolean;
  hasDecorators: boolean;
}

export interface ClassInfo {
  name: string;
  /** `extends` and `implements` clauses, as written */
  baseNames: string[];
  methodNames: string[];
  docstring?: string;
}

export interface StructuralSignals {
  raisesExceptions: boolean;
  handlesExceptions: boolean;
  usesDecorators: boolean;
  hasAsyncFunctions: boolean;
}

/**
 * Structural description of one source file snapshot.
 * When `diagnosticError` is set every collection is empty.
 */
export interface SourceAnalysis {
  readonly contentHash: string;
  readonly functions: readonly FunctionInfo[];
  readonly classes: readonly ClassInfo[];
  readonly imports: readonly string[];
  readonly constants: readonly string[];
  readonly dependencies: readonly string[];
  readonly signals: StructuralSignals;
  readonly diagnosticError?: string;
}

export interface ProjectConventions {
  hasDedicatedTestDirectory: boolean;
  configFilesPresent: string[];
  commonTestImports: string[];
  assertionStyles: string[];
  fixturePatterns: string[];
}

export interface ProjectContext {
  targetAnalysis: SourceAnalysis;
  relatedFiles: string[];
  conventions: ProjectConventions;
}

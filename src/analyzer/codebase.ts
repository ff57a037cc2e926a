import { basename, resolve } from "node:path";
import { analyzeSource, findRelatedFiles, hashContent, readSourceFile, scriptKindFor } from "./source.js";
import { detectConventions } from "./conventions.js";
import type { ProjectContext, ProjectConventions, SourceAnalysis } from "./types.js";

/**
 * Analyzer bound to one project root. Analyses are cached by file kind and content hash so an
 * edited file gets a fresh analysis; conventions are detected once per instance.
 */
export class CodebaseAnalyzer {
  readonly projectRoot: string;
  private analyses = new Map<string, SourceAnalysis>();
  private contexts = new Map<string, ProjectContext>();
  private conventions: Promise<ProjectConventions> | null = null;

  constructor(projectRoot: string) {
    this.projectRoot = resolve(projectRoot);
  }

  analyze(sourceText: string, fileName?: string): SourceAnalysis {
    // the same text parses differently as .ts and .js
    const key = `${scriptKindFor(fileName ?? "source.ts")}:${hashContent(sourceText)}`;
    const cached = this.analyses.get(key);
    if (cached) return cached;

    const analysis = analyzeSource(sourceText, fileName);
    this.analyses.set(key, analysis);
    return analysis;
  }

  async analyzeFile(filePath: string): Promise<SourceAnalysis> {
    const content = await readSourceFile(filePath);
    return this.analyze(content, basename(filePath));
  }

  getConventions(): Promise<ProjectConventions> {
    this.conventions ??= detectConventions(this.projectRoot);
    return this.conventions;
  }

  /**
   * Target analysis, related files, and project conventions for one file.
   * Cached per target path and content hash.
   */
  async getProjectContext(targetFile: string): Promise<ProjectContext> {
    const targetPath = resolve(targetFile);
    const targetAnalysis = await this.analyzeFile(targetPath);
    const cacheKey = `${targetPath}:${targetAnalysis.contentHash}`;

    const cached = this.contexts.get(cacheKey);
    if (cached) return cached;

    const context: ProjectContext = {
      targetAnalysis,
      relatedFiles: await findRelatedFiles(targetPath),
      conventions: await this.getConventions(),
    };
    this.contexts.set(cacheKey, context);
    return context;
  }
}

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { isSourceFile, isTestFile, readSourceFile } from "./source.js";
import type { ProjectConventions } from "./types.js";

// Directories never scanned for test files
const ALWAYS_IGNORE = new Set([
  "node_modules",
  "dist",
  "build",
  "coverage",
  "out",
  "vendor",
]);

export const TEST_CONFIG_FILES = [
  "vitest.config.ts",
  "vitest.config.mts",
  "vitest.config.js",
  "vitest.config.mjs",
  "vitest.workspace.ts",
  "jest.config.js",
  "jest.config.ts",
  "jest.config.cjs",
  "jest.config.mjs",
  "jest.config.json",
  ".mocharc.json",
  ".mocharc.yml",
  ".mocharc.js",
  "ava.config.js",
  "playwright.config.ts",
] as const;

export const TEST_DIRECTORY_NAMES = ["tests", "test", "__tests__", "testing"] as const;

interface Marker {
  kind: "import" | "fixture" | "assertion";
  label: string;
  needles: string[];
}

const MARKERS: Marker[] = [
  { kind: "import", label: "vitest", needles: [`from "vitest"`, `from 'vitest'`] },
  { kind: "import", label: "jest", needles: ["@jest/globals", "jest.fn(", "jest.mock("] },
  { kind: "import", label: "node:test", needles: [`from "node:test"`, `from 'node:test'`] },
  { kind: "import", label: "sinon", needles: [`from "sinon"`, `from 'sinon'`] },
  { kind: "import", label: "vi-mocks", needles: ["vi.mock(", "vi.fn("] },
  { kind: "fixture", label: "test-extend-fixtures", needles: ["test.extend(", "it.extend("] },
  { kind: "fixture", label: "before-each-hooks", needles: ["beforeEach("] },
  { kind: "assertion", label: "expect", needles: ["expect("] },
  { kind: "assertion", label: "assert", needles: ["assert.", `from "node:assert`, `from 'node:assert`] },
];

export function emptyConventions(): ProjectConventions {
  return {
    hasDedicatedTestDirectory: false,
    configFilesPresent: [],
    commonTestImports: [],
    assertionStyles: [],
    fixturePatterns: [],
  };
}

async function collectTestFiles(dirPath: string, found: string[]): Promise<void> {
  const entries = await readdir(dirPath, { withFileTypes: true }).catch(() => null);
  if (!entries) return;

  for (const entry of entries) {
    if (entry.isDirectory()) {
      if (ALWAYS_IGNORE.has(entry.name) || entry.name.startsWith(".")) continue;
      await collectTestFiles(join(dirPath, entry.name), found);
    } else if (entry.isFile() && isSourceFile(entry.name) && isTestFile(entry.name)) {
      found.push(join(dirPath, entry.name));
    }
  }
}

/**
 * Detect the testing conventions of a project: which frameworks its tests import,
 * how they assert, which fixture idioms they use, and which runner configs sit at
 * the root. Substring heuristics only; presence in any one test file counts.
 */
export async function detectConventions(projectRoot: string): Promise<ProjectConventions> {
  const conventions = emptyConventions();

  const rootEntries = await readdir(projectRoot, { withFileTypes: true }).catch(() => null);
  if (!rootEntries) return conventions;

  const rootNames = new Set(rootEntries.map((entry) => entry.name));
  conventions.configFilesPresent = TEST_CONFIG_FILES.filter((name) => rootNames.has(name));
  conventions.hasDedicatedTestDirectory = rootEntries.some(
    (entry) => entry.isDirectory() && (TEST_DIRECTORY_NAMES as readonly string[]).includes(entry.name),
  );

  const testFiles: string[] = [];
  await collectTestFiles(projectRoot, testFiles);
  testFiles.sort();

  const imports = new Set<string>();
  const assertions = new Set<string>();
  const fixtures: string[] = [];

  for (const testFile of testFiles) {
    let content: string;
    try {
      content = await readSourceFile(testFile);
    } catch {
      continue;
    }

    for (const marker of MARKERS) {
      if (!marker.needles.some((needle) => content.includes(needle))) continue;
      if (marker.kind === "import") imports.add(marker.label);
      else if (marker.kind === "assertion") assertions.add(marker.label);
      else if (!fixtures.includes(marker.label)) fixtures.push(marker.label);
    }
  }

  conventions.commonTestImports = [...imports].sort();
  conventions.assertionStyles = [...assertions].sort();
  conventions.fixturePatterns = fixtures;
  return conventions;
}

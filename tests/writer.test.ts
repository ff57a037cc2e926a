import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  defaultTestPath,
  OutputExistsError,
  readConfig,
  writeConfig,
  writeTestFile,
} from "../src/core/writer.js";
import { CONFIG_FILENAME } from "../src/core/schema.js";
import type { ConfigFile } from "../src/core/schema.js";
import { createTmpDir, cleanupTmpDir } from "./helpers.js";

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await createTmpDir();
});

afterEach(async () => {
  await cleanupTmpDir(tmpDir);
});

describe("writeConfig / readConfig", () => {
  it("writes plain YAML", async () => {
    await writeConfig(tmpDir, { provider: "anthropic", max_attempts: 3 });
    const content = await readFile(join(tmpDir, CONFIG_FILENAME), "utf-8");
    expect(content).toBe("provider: anthropic\nmax_attempts: 3\n");
  });

  it("round-trips every field", async () => {
    const config: ConfigFile = {
      provider: "ollama",
      model: "llama3.1",
      api_key_env: "MY_OLLAMA",
      quality_threshold: 0.7,
      timeout_ms: 5000,
      runner: ["npx", "vitest", "run", "{file}"],
      template_name: "concise",
      parallel: 2,
      cache: false,
    };
    await writeConfig(tmpDir, config);
    expect(await readConfig(tmpDir)).toEqual(config);
  });

  it("refuses to write an invalid config", async () => {
    await expect(writeConfig(tmpDir, { provider: "anthropic", quality_threshold: 2 })).rejects.toThrow();
  });

  it("reads a missing or invalid file as null", async () => {
    expect(await readConfig(tmpDir)).toBeNull();
    await writeFile(join(tmpDir, CONFIG_FILENAME), "provider: mistral\n");
    expect(await readConfig(tmpDir)).toBeNull();
  });
});

describe("defaultTestPath", () => {
  it("puts the test beside the source", () => {
    expect(defaultTestPath(join("src", "math.ts"))).toBe(join("src", "math.test.ts"));
    expect(defaultTestPath("util.mjs")).toBe("util.test.mjs");
  });
});

describe("writeTestFile", () => {
  it("creates a new file ending in a newline", async () => {
    const out = join(tmpDir, "a.test.ts");
    await writeTestFile(out, "it('a', () => {});", "create");
    expect(await readFile(out, "utf-8")).toBe("it('a', () => {});\n");
  });

  it("refuses to replace an existing file in create mode", async () => {
    const out = join(tmpDir, "a.test.ts");
    await writeFile(out, "old\n");
    const error = await writeTestFile(out, "new", "create").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(OutputExistsError);
    expect(error instanceof Error ? error.message : "").toBe(`${out} already exists. Use --overwrite or --append`);
    expect(await readFile(out, "utf-8")).toBe("old\n");
  });

  it("overwrites or appends when asked", async () => {
    const out = join(tmpDir, "a.test.ts");
    await writeFile(out, "old\n");

    await writeTestFile(out, "second\n", "append");
    expect(await readFile(out, "utf-8")).toBe("old\n\n\nsecond\n");

    await writeTestFile(out, "third", "overwrite");
    expect(await readFile(out, "utf-8")).toBe("third\n");
  });

  it("creates the file in append mode when missing", async () => {
    const out = join(tmpDir, "b.test.ts");
    await writeTestFile(out, "body", "append");
    expect(await readFile(out, "utf-8")).toBe("body\n");
  });
});

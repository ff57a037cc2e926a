import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { TemplateError } from "../../src/core/errors.js";
import { loadPromptTemplate, renderTemplate, SOURCE_PLACEHOLDER } from "../../src/generator/templates.js";
import { createTmpDir, cleanupTmpDir, createFile } from "../helpers.js";

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await createTmpDir();
});

afterEach(async () => {
  await cleanupTmpDir(tmpDir);
});

describe("loadPromptTemplate", () => {
  it("loads the built-in default template", async () => {
    const template = await loadPromptTemplate();
    expect(template.split(SOURCE_PLACEHOLDER)).toHaveLength(2);
    expect(template).toContain("Vitest");
  });

  it("selects a named built-in template", async () => {
    const template = await loadPromptTemplate({ templateName: "concise" });
    expect(template).toBe("Write Vitest unit tests for the following module. Output only code.\n\n{{source_code}}\n");
  });

  it("accepts a file holding a bare template string", async () => {
    await createFile(tmpDir, "t.yaml", "\"Tests for {{source_code}} please\"\n");
    expect(await loadPromptTemplate({ templateFile: join(tmpDir, "t.yaml") })).toBe("Tests for {{source_code}} please");
  });

  it("uses content that is not valid YAML as raw text", async () => {
    const raw = "key: [unclosed\n{{source_code}}";
    await createFile(tmpDir, "raw.txt", raw);
    expect(await loadPromptTemplate({ templateFile: join(tmpDir, "raw.txt") })).toBe(raw);
  });

  it("rejects a missing name", async () => {
    await createFile(tmpDir, "t.yaml", "default: \"{{source_code}}\"\n");
    await expect(loadPromptTemplate({ templateFile: join(tmpDir, "t.yaml"), templateName: "other" }))
      .rejects.toThrow("Prompt name 'other' not found in template file.");
  });

  it("rejects a template without exactly one placeholder", async () => {
    await createFile(tmpDir, "none.yaml", "default: \"no placeholder\"\n");
    await createFile(tmpDir, "two.yaml", "default: \"{{source_code}} and {{source_code}}\"\n");

    await expect(loadPromptTemplate({ templateFile: join(tmpDir, "none.yaml") }))
      .rejects.toThrow(`Prompt template must contain exactly one ${SOURCE_PLACEHOLDER} placeholder (found 0).`);
    await expect(loadPromptTemplate({ templateFile: join(tmpDir, "two.yaml") }))
      .rejects.toThrow("(found 2)");
  });

  it("rejects non-string entries and other YAML shapes", async () => {
    await createFile(tmpDir, "num.yaml", "default: 3\n");
    await createFile(tmpDir, "list.yaml", "- a\n- b\n");

    await expect(loadPromptTemplate({ templateFile: join(tmpDir, "num.yaml") }))
      .rejects.toThrow("Prompt 'default' must be a string.");
    await expect(loadPromptTemplate({ templateFile: join(tmpDir, "list.yaml") }))
      .rejects.toBeInstanceOf(TemplateError);
  });

  it("reports an unreadable file", async () => {
    const missing = join(tmpDir, "missing.yaml");
    const error = await loadPromptTemplate({ templateFile: missing }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TemplateError);
    expect(error instanceof TemplateError ? error.templateFile : undefined).toBe(missing);
  });
});

describe("renderTemplate", () => {
  it("replaces the placeholder once", () => {
    expect(renderTemplate("A {{source_code}} B", "x")).toBe("A x B");
  });

  it("throws without a placeholder", () => {
    expect(() => renderTemplate("nothing", "x")).toThrow(TemplateError);
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { CommandTestRunner, combinedOutput, runTestFile, timeoutMessage } from "../../src/validator/runner.js";
import { createTmpDir, cleanupTmpDir, createFile } from "../helpers.js";

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await createTmpDir();
});

afterEach(async () => {
  await cleanupTmpDir(tmpDir);
});

describe("CommandTestRunner.buildArgs", () => {
  it("substitutes the file placeholder", () => {
    const runner = new CommandTestRunner(["npx", "vitest", "run", "{file}", "--reporter=dot"]);
    expect(runner.buildArgs("a.test.ts")).toEqual(["npx", "vitest", "run", "a.test.ts", "--reporter=dot"]);
  });

  it("appends the file when there is no placeholder", () => {
    expect(new CommandTestRunner(["node", "--test"]).buildArgs("a.test.mjs")).toEqual(["node", "--test", "a.test.mjs"]);
  });

  it("rejects an empty command", () => {
    expect(() => new CommandTestRunner([])).toThrow("Test runner command must not be empty");
  });
});

describe("CommandTestRunner.run", () => {
  const runner = () => new CommandTestRunner([process.execPath, "{file}"]);

  it("reports success from a zero exit status", async () => {
    await createFile(tmpDir, "ok.mjs", `console.log("all good");`);
    const result = await runner().run(join(tmpDir, "ok.mjs"), { timeoutMs: 10_000, cwd: tmpDir });
    expect(result.succeeded).toBe(true);
    expect(result.timedOut).toBe(false);
    expect(result.exitStatus).toBe(0);
    expect(result.standardOutput).toBe("all good\n");
  });

  it("captures stderr and the exit status of a failing run", async () => {
    await createFile(tmpDir, "bad.mjs", `console.error("boom");\nprocess.exit(3);`);
    const result = await runner().run(join(tmpDir, "bad.mjs"), { timeoutMs: 10_000 });
    expect(result.succeeded).toBe(false);
    expect(result.exitStatus).toBe(3);
    expect(result.standardError).toBe("boom\n");
  });

  it("kills a run that exceeds the timeout", async () => {
    await createFile(tmpDir, "slow.mjs", "setTimeout(() => {}, 30_000);");
    const result = await runner().run(join(tmpDir, "slow.mjs"), { timeoutMs: 300 });
    expect(result).toEqual({
      succeeded: false,
      timedOut: true,
      standardOutput: "",
      standardError: timeoutMessage(300),
      exitStatus: -1,
    });
  });

  it("reports a missing binary as a failed run", async () => {
    const missing = new CommandTestRunner([join(tmpDir, "no-such-binary")]);
    const result = await missing.run("x.test.ts", { timeoutMs: 5_000 });
    expect(result.succeeded).toBe(false);
    expect(result.exitStatus).toBe(-1);
    expect(result.standardError).toContain("ENOENT");
  });
});

describe("runTestFile", () => {
  it("runs a file with the given command", async () => {
    await createFile(tmpDir, "t.mjs", `console.log("ran");`);
    const result = await runTestFile(join(tmpDir, "t.mjs"), { command: [process.execPath], timeoutMs: 10_000 });
    expect(result.succeeded).toBe(true);
    expect(combinedOutput(result)).toBe("ran\n");
  });
});

describe("combinedOutput", () => {
  it("joins non-empty streams", () => {
    const base = { succeeded: false, timedOut: false, exitStatus: 1 };
    expect(combinedOutput({ ...base, standardOutput: "out", standardError: "err" })).toBe("out\nerr");
    expect(combinedOutput({ ...base, standardOutput: "", standardError: "err" })).toBe("err");
  });
});

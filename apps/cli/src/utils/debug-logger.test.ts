import { mkdtempSync, readdirSync, readFileSync, rmSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createRunID, DebugLogger } from "./debug-logger.js";

describe("createRunID", () => {
  it("combines a compact timestamp with a random suffix", () => {
    const id = createRunID(new Date("2024-05-01T10:20:30.456Z"));

    expect(id).toMatch(/^20240501T102030-[a-z0-9]+$/);
  });
});

describe("DebugLogger", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "buildlog-debug-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes a header, messages and errors", () => {
    const logger = new DebugLogger("run-1", dir);
    logger.logPhase("Process", "logs/a.txt: succeeded");
    logger.logError(new Error("boom"), "Process logs/b.txt");
    logger.close();
    logger.log("after close");

    const contents = readFileSync(join(dir, "run-1.log"), "utf-8");
    expect(contents.startsWith(`${"=".repeat(80)}\nBuildlog Debug Log\nRun ID: run-1\n`)).toBe(true);
    expect(contents).toContain("[Process] logs/a.txt: succeeded");
    expect(contents).toContain("[Process logs/b.txt] Error: boom");
    expect(contents).not.toContain("after close");
  });

  it("keeps only the most recent logs", () => {
    for (let i = 0; i < 12; i++) {
      const path = join(dir, `old-${i}.log`);
      writeFileSync(path, "");
      utimesSync(path, 1_000 + i, 1_000 + i);
    }

    new DebugLogger("fresh", dir).close();

    const remaining = readdirSync(dir).sort();
    expect(remaining).toHaveLength(10);
    expect(remaining).toContain("fresh.log");
    expect(remaining).not.toContain("old-0.log");
    expect(remaining).toContain("old-11.log");
  });
});

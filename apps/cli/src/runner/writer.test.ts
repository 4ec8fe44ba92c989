import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createBuildSummary, parseLog } from "@buildlog/parser";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SummaryWriteError } from "../lib/errors.js";
import { writeSummary } from "./writer.js";

describe("writeSummary", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "buildlog-writer-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("creates parent directories and writes non-ASCII text as is", async () => {
    const summary = createBuildSummary("logs", [parseLog("café", "done\n")]);
    const outputPath = join(root, "deep", "dir", "summary.json");

    await writeSummary(summary, outputPath);

    const written = await readFile(outputPath, "utf-8");
    expect(written).toContain('"name": "café"');
    expect(written.endsWith("}")).toBe(true);
  });

  it("wraps failures with the output path", async () => {
    const blocker = join(root, "blocker");
    await writeFile(blocker, "");
    const outputPath = join(blocker, "summary.json");

    const error = await writeSummary(
      createBuildSummary("logs", []),
      outputPath
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SummaryWriteError);
    expect(error).toMatchObject({ path: outputPath });
  });
});

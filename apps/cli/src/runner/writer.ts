import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { type BuildSummary, serializeSummary } from "@buildlog/parser";
import { SummaryWriteError } from "../lib/errors.js";

/**
 * Write the summary artifact in one piece, creating its directory if needed.
 * Any failure is fatal for the run and surfaces as SummaryWriteError.
 */
export const writeSummary = async (
  summary: BuildSummary,
  outputPath: string
): Promise<void> => {
  const json = serializeSummary(summary);
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, json, "utf-8");
  } catch (error) {
    throw new SummaryWriteError(outputPath, error);
  }
};

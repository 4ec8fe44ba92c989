import { defineCommand } from "citty";
import { getVersion } from "../utils/version.js";

export const main = defineCommand({
  meta: {
    name: "buildlog",
    version: getVersion(),
    description: "Summarize CI build logs into a single JSON report",
  },
  subCommands: {
    summarize: () =>
      import("./summarize.js").then((m) => m.summarizeCommand),
    version: () => import("./version.js").then((m) => m.versionCommand),
  },
});

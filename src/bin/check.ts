// src/bin/check.ts — Installation check
// Lists each workspace component and whether it exists.

import { EXIT_FAILURE, EXIT_OK } from "../types.js";
import { checkWorkspace } from "../installer.js";
import type { CommandContext } from "./context.js";

export async function runCheck(ctx: CommandContext): Promise<number> {
  const { paths, sink } = ctx;
  const components = checkWorkspace(paths);
  const width = Math.max(...components.map((c) => c.name.length));

  sink.write("");
  sink.write(`  ${"Component".padEnd(width)}  Status`);
  sink.write(`  ${"-".repeat(width)}  -------`);
  for (const c of components) {
    sink.write(`  ${c.name.padEnd(width)}  ${c.present ? "ok" : "missing"}`);
  }
  sink.write("");

  const missing = components.filter((c) => !c.present);
  if (missing.length > 0) {
    sink.error(`${missing.length} component(s) missing. Run 'deckspec init' to create them.`);
    return EXIT_FAILURE;
  }
  sink.success("Workspace is complete");
  return EXIT_OK;
}

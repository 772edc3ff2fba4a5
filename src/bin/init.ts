// src/bin/init.ts — Workspace scaffolding command

import { relative } from "node:path";
import { EXIT_OK } from "../types.js";
import { installWorkspace } from "../installer.js";
import type { CommandContext } from "./context.js";

export async function runInit(ctx: CommandContext): Promise<number> {
  const { paths, sink, args } = ctx;
  const rel = (p: string) => relative(paths.projectDir, p) || ".";

  sink.info(`Initializing workspace in ${rel(paths.specDir)}`);
  const result = installWorkspace(paths, { sink, force: args.force, warnings: ctx.warnings });

  for (const p of result.created) sink.write(`  created      ${rel(p)}`);
  for (const p of result.overwritten) sink.write(`  overwritten  ${rel(p)}`);
  for (const p of result.skipped) sink.write(`  kept         ${rel(p)}`);

  if (result.skipped.length > 0) sink.info("Existing templates were kept. Use --force to overwrite them.");
  sink.success("Workspace ready. Next: deckspec decompose --interactive");
  return EXIT_OK;
}

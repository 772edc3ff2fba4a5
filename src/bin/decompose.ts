// src/bin/decompose.ts — Pitch deck decomposition command

import { existsSync } from "node:fs";
import { relative, resolve } from "node:path";
import type { DecompositionMode, DecompositionResult } from "../types.js";
import { EXIT_FAILURE, EXIT_OK, StructuralError } from "../types.js";
import { decompose } from "../decomposition.js";
import { isSuccess } from "../constitution-generator.js";
import type { ParsedArgs } from "../config.js";
import type { WorkspacePaths } from "../workspace.js";
import type { Prompter } from "../prompter.js";
import type { CommandContext } from "./context.js";

/**
 * Pick the mode from flags. At most one mode flag is allowed; with none, the
 * workspace deck is decomposed when it exists.
 */
export function selectMode(args: ParsedArgs, paths: WorkspacePaths, cwd = process.cwd()): DecompositionMode {
  const chosen = [args.interactive, args.fromFile !== undefined, args.fromPdf !== undefined].filter(Boolean).length;
  if (chosen > 1) {
    throw new StructuralError(
      "Choose only one of --interactive, --from-file and --from-pdf",
      undefined,
      "deckspec decompose --from-file <deck.md>",
    );
  }
  if (args.interactive) return { kind: "interactive" };
  if (args.fromFile !== undefined) return { kind: "from-file", path: resolve(cwd, args.fromFile) };
  if (args.fromPdf !== undefined) return { kind: "from-pdf", path: resolve(cwd, args.fromPdf) };
  if (existsSync(paths.deckFile)) return { kind: "from-file", path: paths.deckFile };
  throw new StructuralError(
    `No pitch deck at ${paths.deckFile}`,
    paths.deckFile,
    "Run 'deckspec decompose --interactive' or 'deckspec decompose --from-file <deck.md>'",
  );
}

function printResult(ctx: CommandContext, result: DecompositionResult): void {
  const { sink, paths } = ctx;
  const verb = result.dryRun ? "Would write" : "Wrote";
  sink.write("");
  sink.write(`${verb} ${result.createdFiles.length} file(s):`);
  for (const p of result.createdFiles) sink.write(`  ${relative(paths.projectDir, p)}`);
  sink.write("");
  sink.write(`  Strategic constitutions: ${result.strategicCount}`);
  sink.write(`  Feature constitutions:   ${result.featureCount}`);
  sink.write(`  Principles:              ${result.principleCount}`);
  sink.write(`  Links:                   ${result.linkCount}`);
  sink.write(`  Entities:                ${result.entityCount}`);
  sink.write(`  Success criteria:        ${result.derivedCriteriaCount} derived, ${result.placeholderCriteriaCount} placeholder`);
  for (const e of result.errors) {
    sink.error(`${e.code}: ${e.message}${e.suggestion ? ` (${e.suggestion})` : ""}`);
  }
}

export async function runDecompose(ctx: CommandContext): Promise<number> {
  const { args, paths, sink } = ctx;
  const mode = selectMode(args, paths);
  sink.info(`Decomposing (${mode.kind}${args.dryRun ? ", dry run" : ""})`);

  let prompter: Prompter | undefined;
  try {
    if (mode.kind === "interactive") prompter = ctx.openPrompter();
    const result = await decompose(mode, {
      paths,
      sink,
      dryRun: args.dryRun,
      force: args.force,
      maxFeatures: ctx.config.maxFeatures,
      prompter,
      warnings: ctx.warnings,
      now: ctx.now,
    });
    printResult(ctx, result);

    if (!isSuccess(result)) {
      sink.error(`Decomposition finished with ${result.errors.length} error(s)`);
      return EXIT_FAILURE;
    }
    sink.success(args.dryRun ? "Dry run complete, nothing written" : "Decomposition complete. Next: deckspec analyze");
    return EXIT_OK;
  } finally {
    prompter?.close();
  }
}

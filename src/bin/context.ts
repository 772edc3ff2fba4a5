// src/bin/context.ts — What every subcommand receives from the dispatcher

import type { ResolvedConfig, Warning } from "../types.js";
import type { ParsedArgs } from "../config.js";
import type { OutputSink } from "../output.js";
import type { Prompter } from "../prompter.js";
import type { WorkspacePaths } from "../workspace.js";

export interface CommandContext {
  args: ParsedArgs;
  config: ResolvedConfig;
  paths: WorkspacePaths;
  sink: OutputSink;
  warnings: Warning[];
  /** Opens a prompter on demand; commands close what they open. */
  openPrompter: () => Prompter;
  now?: Date;
}

/** Resolves to the process exit code. */
export type Command = (ctx: CommandContext) => Promise<number>;

#!/usr/bin/env node
// CLI entry point for deckspec

import { DECKSPEC_VERSION } from "../index.js";
import { parseCliArgs, resolveConfig } from "../config.js";
import { createStreamSink, errorMessage, reportWarnings } from "../output.js";
import { createReadlinePrompter } from "../prompter.js";
import { workspacePaths } from "../workspace.js";
import type { Warning } from "../types.js";
import { EXIT_CANCELLED, EXIT_FAILURE, EXIT_OK, InstallationError, StructuralError, UserCancelledError } from "../types.js";
import type { Command } from "./context.js";

const HELP_TEXT = `
deckspec v${DECKSPEC_VERSION}

Usage:
  deckspec init                          Create the workspace and template files
  deckspec check                         Verify the workspace is installed
  deckspec decompose [mode]              Turn the pitch deck into constitutions
  deckspec clarify                       Answer questions about vague deck sections
  deckspec analyze                       Validate links, versions and coverage
  deckspec checklist                     Generate or report quality checklists

Decompose modes (pick one; default: the existing workspace deck):
  --interactive        Build the deck by answering 10 questions
  --from-file <path>   Use a markdown pitch deck
  --from-pdf <path>    Extract a pitch deck from a PDF

Options:
  --dry-run            Show what would change without writing (decompose, clarify)
  --force              Overwrite existing files (init, decompose, checklist)
  --section, -s <id>   Only clarify this section
  --fix                Align constitution versions with the deck (analyze)
  --report             Print checklist completion (checklist)
  --dir <path>         Project directory (default: current directory)
  --config, -c         Path to config file
  --quiet, -q          Only print errors
  --verbose, -v        Print detailed progress
  --version, -V        Print the version
  --help, -h           Show this help text

Exit codes: 0 success, 1 failure, 2 cancelled

Examples:
  deckspec init
  deckspec decompose --from-file ./pitch.md
  deckspec clarify --section problem
  deckspec analyze --fix
`.trim();

const COMMANDS: Record<string, () => Promise<Command>> = {
  init: async () => (await import("./init.js")).runInit,
  check: async () => (await import("./check.js")).runCheck,
  decompose: async () => (await import("./decompose.js")).runDecompose,
  clarify: async () => (await import("./clarify.js")).runClarify,
  analyze: async () => (await import("./analyze.js")).runAnalyze,
  checklist: async () => (await import("./checklist.js")).runChecklist,
};

async function main(): Promise<number> {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.version) {
    process.stdout.write(DECKSPEC_VERSION + "\n");
    return EXIT_OK;
  }
  const load = args.command ? COMMANDS[args.command] : undefined;
  if (args.help || !load) {
    process.stdout.write(HELP_TEXT + "\n");
    if (args.command && !load) {
      process.stderr.write(`[error] Unknown command: ${args.command}\n`);
      return EXIT_FAILURE;
    }
    return args.help ? EXIT_OK : EXIT_FAILURE;
  }

  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);
  const sink = createStreamSink({ quiet: config.quiet, verbose: config.verbose });
  const paths = workspacePaths(config.projectDir, config.specDir);

  try {
    const run = await load();
    return await run({ args, config, paths, sink, warnings, openPrompter: () => createReadlinePrompter() });
  } catch (err: unknown) {
    if (err instanceof UserCancelledError) {
      sink.warn(err.message);
      return EXIT_CANCELLED;
    }
    if (err instanceof StructuralError) {
      sink.error(err.filePath ? `${err.message} (${err.filePath})` : err.message);
      if (err.hint) sink.info(`Hint: ${err.hint}`);
      return EXIT_FAILURE;
    }
    if (err instanceof InstallationError) {
      sink.error(err.message);
      for (const p of err.rolledBack) sink.verbose(`Rolled back ${p}`);
      return EXIT_FAILURE;
    }
    sink.error(`Fatal error: ${errorMessage(err)}`);
    return EXIT_FAILURE;
  } finally {
    reportWarnings(sink, warnings);
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    process.stderr.write(`Fatal error: ${errorMessage(err)}\n`);
    process.exit(EXIT_FAILURE);
  },
);

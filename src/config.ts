// src/config.ts — Config Resolver
// defaults ← config file ← CLI args. The config file is deckspec.config.json in
// the project directory, the "deckspec" key of its package.json, or --config.

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { z } from "zod";
import type { ResolvedConfig, Warning } from "./types.js";
import { DEFAULT_SPEC_DIR } from "./workspace.js";
import { DEFAULT_MAX_QUESTIONS } from "./ambiguity-detector.js";
import { DEFAULT_MAX_FEATURES } from "./extractors/feature-detector.js";

export const CONFIG_FILE_NAME = "deckspec.config.json";
export const PACKAGE_JSON_KEY = "deckspec";

export interface ParsedArgs {
  command?: string;
  positionals: string[];
  config?: string;
  dir?: string;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
  dryRun: boolean;
  force: boolean;
  fix: boolean;
  report: boolean;
  interactive: boolean;
  fromFile?: string;
  fromPdf?: string;
  section?: string;
}

const ConfigFileSchema = z
  .object({
    specDir: z.string().min(1),
    exclude: z.array(z.string()),
    maxQuestions: z.number().int().positive(),
    maxFeatures: z.number().int().positive().max(999),
    verbose: z.boolean(),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

const PackageJsonSchema = z.object({ deckspec: z.unknown() }).passthrough();

const DEFAULTS: Omit<ResolvedConfig, "projectDir"> = {
  specDir: DEFAULT_SPEC_DIR,
  exclude: [],
  maxQuestions: DEFAULT_MAX_QUESTIONS,
  maxFeatures: DEFAULT_MAX_FEATURES,
  verbose: false,
  quiet: false,
};

/**
 * Resolve config from CLI args, config file, and defaults.
 */
export function resolveConfig(args: ParsedArgs, warnings: Warning[] = [], cwd = process.cwd()): ResolvedConfig {
  const projectDir = resolve(cwd, args.dir ?? ".");
  const fileConfig = loadConfigFile(projectDir, args.config, warnings) ?? {};

  return {
    projectDir,
    specDir: fileConfig.specDir ?? DEFAULTS.specDir,
    exclude: fileConfig.exclude ?? DEFAULTS.exclude,
    maxQuestions: fileConfig.maxQuestions ?? DEFAULTS.maxQuestions,
    maxFeatures: fileConfig.maxFeatures ?? DEFAULTS.maxFeatures,
    verbose: args.verbose || (fileConfig.verbose ?? DEFAULTS.verbose),
    quiet: args.quiet,
  };
}

function loadConfigFile(projectDir: string, configPath: string | undefined, warnings: Warning[]): ConfigFile | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(projectDir, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, readJson(absPath, warnings), warnings);
  }

  const jsonConfig = join(projectDir, CONFIG_FILE_NAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, readJson(jsonConfig, warnings), warnings);
  }

  const pkgJson = join(projectDir, "package.json");
  if (existsSync(pkgJson)) {
    const pkg = PackageJsonSchema.safeParse(readJson(pkgJson, warnings));
    if (pkg.success && pkg.data.deckspec !== undefined) {
      return parseConfigFile(`${pkgJson}#${PACKAGE_JSON_KEY}`, pkg.data.deckspec, warnings);
    }
  }

  return null;
}

function readJson(filePath: string, warnings: Warning[]): unknown {
  try {
    return JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}

function parseConfigFile(source: string, raw: unknown, warnings: Warning[]): ConfigFile | null {
  if (raw === null) return null;
  const result = ConfigFileSchema.safeParse(raw);
  if (result.success) return result.data;

  const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
  warnings.push({
    level: "warn",
    module: "config",
    message: `Ignoring invalid config ${source}: ${issues}`,
  });
  return null;
}

// ─── CLI args ────────────────────────────────────────────────────────────────

/** String flag value; a flag given without a value counts as absent. */
function str(value: unknown): string | undefined {
  if (typeof value === "number") return String(value);
  return typeof value === "string" && value !== "" ? value : undefined;
}

function bool(value: unknown): boolean {
  return value === true;
}

/**
 * Parse CLI args using mri. The first positional is the command.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { c: "config", q: "quiet", v: "verbose", h: "help", s: "section", V: "version" },
    boolean: ["quiet", "verbose", "help", "version", "dry-run", "force", "fix", "report", "interactive"],
    string: ["config", "dir", "section", "from-file", "from-pdf"],
  });

  const [command, ...positionals] = args._;
  return {
    command,
    positionals,
    config: str(args.config),
    dir: str(args.dir),
    quiet: bool(args.quiet),
    verbose: bool(args.verbose),
    help: bool(args.help),
    version: bool(args.version),
    dryRun: bool(args["dry-run"]),
    force: bool(args.force),
    fix: bool(args.fix),
    report: bool(args.report),
    interactive: bool(args.interactive),
    fromFile: str(args["from-file"]),
    fromPdf: str(args["from-pdf"]),
    section: str(args.section),
  };
}

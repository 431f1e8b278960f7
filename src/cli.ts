/**
 * Command-line front end: argument parsing and the render command.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { applySettings, loadSettingsFile, parseDefine } from "./settings.ts";
import { loadWorkspace } from "./workspace/loader.ts";
import type { Workspace } from "./workspace/workspace.ts";

// ── CLI ──────────────────────────────────────────────────────────

export interface CliOptions {
  readonly shader: string;
  readonly root: string;
  readonly settingsPath?: string;
  readonly defines: readonly string[];
  readonly extensions?: readonly string[];
  readonly outputPath?: string;
}

const VALUE_FLAGS = new Set(["--root", "--settings", "--define", "--ext", "--output"]);

export function parseArgs(argv: readonly string[]): CliOptions {
  const positional: string[] = [];
  const values = new Map<string, string[]>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";

    if (!VALUE_FLAGS.has(arg)) {
      if (arg.startsWith("--")) throw new Error(`Unknown option: ${arg}`);
      positional.push(arg);
      continue;
    }

    const value = argv[i + 1];
    if (value === undefined) throw new Error(`Missing value for ${arg}`);
    values.set(arg, [...(values.get(arg) ?? []), value]);
    i++;
  }

  const shader = positional[0];
  if (shader === undefined || positional.length > 1) {
    throw new Error("Expected exactly one shader path");
  }

  const last = (flag: string): string | undefined => values.get(flag)?.at(-1);

  return {
    shader,
    root: last("--root") ?? ".",
    settingsPath: last("--settings"),
    defines: values.get("--define") ?? [],
    extensions: values.get("--ext"),
    outputPath: last("--output"),
  };
}

// ── Rendering ────────────────────────────────────────────────────

/** Diagnostics are printed only when stdout is not carrying the shader. */
export async function configureWorkspace(options: CliOptions): Promise<Workspace> {
  const verbose = options.outputPath !== undefined;
  const workspace = await loadWorkspace(resolve(options.root), {
    extensions: options.extensions,
    verbose,
  });

  if (options.settingsPath !== undefined) {
    const settings = await loadSettingsFile(resolve(options.settingsPath));
    const count = applySettings(workspace.environment, settings);
    if (verbose) {
      console.log(`[Render] Settings: ${count} values from ${options.settingsPath}`);
    }
  }

  for (const define of options.defines) {
    const [name, value] = parseDefine(define);
    workspace.setOverride(name, value);
  }

  return workspace;
}

export async function run(argv: readonly string[]): Promise<void> {
  const options = parseArgs(argv);
  const workspace = await configureWorkspace(options);
  const output = workspace.getShader(options.shader);

  if (options.outputPath === undefined) {
    process.stdout.write(output);
    return;
  }

  const outPath = resolve(options.outputPath);
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, output, "utf-8");
  console.log(`[Render] ${options.shader} -> ${outPath} (${output.length} chars)`);
}


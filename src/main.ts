#!/usr/bin/env -S npx tsx
/**
 * Shader directive renderer CLI.
 *
 * Loads every shader under a root directory, seeds the environment from a
 * settings file and `--define` flags, and renders one shader.
 *
 * Usage:
 *   tsx src/main.ts <shader> [--root dir] [--settings settings.json]
 *                   [--define NAME=VALUE]... [--ext .wgsl]... [--output file]
 */

import { run } from "./cli.ts";

run(process.argv.slice(2)).catch((err: unknown) => {
  console.error("\nRender failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});

/**
 * Builds a Workspace from shader files on disk.
 *
 * Every file under the root whose extension is listed is parsed; its
 * workspace path is the POSIX path relative to the root.
 */

import { readdir, readFile } from "node:fs/promises";
import { extname, join, relative, sep } from "node:path";
import { Workspace } from "./workspace.ts";

export const DEFAULT_SHADER_EXTENSIONS: readonly string[] = [".wgsl"];

export interface LoadWorkspaceOptions {
  /** File extensions to load, with the leading dot. */
  readonly extensions?: readonly string[];
  /** Print a one-line summary once loading finishes. */
  readonly verbose?: boolean;
}

export async function loadWorkspace(
  root: string,
  options: LoadWorkspaceOptions = {},
): Promise<Workspace> {
  const extensions = options.extensions ?? DEFAULT_SHADER_EXTENSIONS;
  const files = await listFiles(root);
  const workspace = new Workspace(root);

  for (const file of files) {
    if (!extensions.includes(extname(file))) continue;

    const source = await readFile(file, "utf-8");
    workspace.addShader(relative(root, file).split(sep).join("/"), source);
  }

  if (options.verbose) {
    console.log(
      `[Workspace] Loaded ${workspace.shaderPaths.length} shaders ` +
        `(${workspace.totalSize} chars) from ${root}`,
    );
  }

  return workspace;
}

async function listFiles(dir: string): Promise<readonly string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(path)));
      continue;
    }
    if (entry.isFile()) files.push(path);
  }

  return files.sort();
}

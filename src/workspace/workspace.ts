/**
 * Collection of parsed shaders sharing one environment.
 *
 * Shaders are addressed by their path relative to the workspace root, and
 * `//:include` directives resolve through the same map, so an include is
 * rendered with the environment as it stands at render time.
 */

import { posix } from "node:path";
import { CircularIncludeError, ShaderNotFoundError } from "../errors.ts";
import { bool, float, integer, type Literal } from "../expression/literal.ts";
import type { ShaderPath, ShaderSource, VariableName } from "../types.ts";
import { Environment, type EnvironmentTier } from "./environment.ts";
import { Shader } from "./shader.ts";

export class Workspace {
  readonly root: string;
  readonly environment: Environment;
  private readonly shaders = new Map<ShaderPath, Shader>();

  constructor(root: string, environment: Environment = Environment.withDefaults()) {
    this.root = root;
    this.environment = environment;
  }

  /** Parses every `[path, source]` pair; paths are relative to `root`. */
  static fromMemory(
    root: string,
    entries: Iterable<readonly [ShaderPath, ShaderSource]>,
  ): Workspace {
    const workspace = new Workspace(root);
    for (const [path, source] of entries) {
      workspace.addShader(path, source);
    }
    return workspace;
  }

  // ── Shaders ───────────────────────────────────────────────────

  addShader(path: ShaderPath, source: ShaderSource): Shader {
    const shader = Shader.parse(source);
    this.shaders.set(normalizeShaderPath(path), shader);
    return shader;
  }

  get shaderPaths(): readonly ShaderPath[] {
    return [...this.shaders.keys()].sort();
  }

  /** Sum of source lengths over all shaders. */
  get totalSize(): number {
    let total = 0;
    for (const shader of this.shaders.values()) total += shader.sizeHint;
    return total;
  }

  /** Renders a shader with every directive expanded. */
  getShader(path: ShaderPath): string {
    return this.render(normalizeShaderPath(path), []);
  }

  // ── Environment ───────────────────────────────────────────────

  setVariable(name: VariableName, value: Literal, tier: EnvironmentTier = "global"): void {
    this.environment.set(name, value, tier);
  }

  setGlobalInteger(name: VariableName, value: bigint | number): void {
    this.environment.set(name, integer(value));
  }

  setGlobalFloat(name: VariableName, value: number): void {
    this.environment.set(name, float(value));
  }

  setGlobalBool(name: VariableName, value: boolean): void {
    this.environment.set(name, bool(value));
  }

  setOverride(name: VariableName, value: Literal): void {
    this.environment.set(name, value, "override");
  }

  clearOverrides(): void {
    this.environment.clearOverrides();
  }

  // ── Rendering ─────────────────────────────────────────────────

  private render(path: ShaderPath, chain: readonly ShaderPath[]): string {
    if (chain.includes(path)) {
      throw new CircularIncludeError([...chain, path]);
    }

    const shader = this.shaders.get(path);
    if (shader === undefined) throw new ShaderNotFoundError(path);

    const nextChain = [...chain, path];
    return shader.render({
      lookup: this.environment,
      resolveInclude: (include) => this.render(normalizeShaderPath(include), nextChain),
    });
  }
}

/** POSIX separators, `.` and `..` folded: `./lib/../noise.wgsl` -> `noise.wgsl`. */
export function normalizeShaderPath(path: ShaderPath): ShaderPath {
  return posix.normalize(path.trim().replace(/\\/g, "/"));
}

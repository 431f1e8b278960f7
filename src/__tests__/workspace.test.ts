import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  CircularIncludeError,
  ShaderNotFoundError,
  UndefinedVariableError,
  UnknownOperationError,
} from "../errors.ts";
import { bool, float, integer } from "../expression/literal.ts";
import { loadWorkspace } from "../workspace/loader.ts";
import { Shader } from "../workspace/shader.ts";
import { Workspace, normalizeShaderPath } from "../workspace/workspace.ts";

const TANGENT_SHADER = "//:if USE_TANGENTS\nA\n//:else\nB\n//:end\n";

describe("Workspace rendering", () => {
  it("renders plain text unchanged", () => {
    const source = "struct Light {\ncolor: vec3<f32>,\n};\nfn main() {}\n";
    const workspace = Workspace.fromMemory("shaders", [["plain.wgsl", source]]);

    expect(workspace.getShader("plain.wgsl")).toBe(source);
  });

  it("trims whitespace around text lines", () => {
    const workspace = Workspace.fromMemory("shaders", [
      ["a.wgsl", "    let x = 1;   \n\n\tfoo\n"],
    ]);

    expect(workspace.getShader("a.wgsl")).toBe("let x = 1;\nfoo\n");
  });

  it("picks a conditional branch from the environment", () => {
    const workspace = Workspace.fromMemory("shaders", [["main.wgsl", TANGENT_SHADER]]);

    workspace.setGlobalBool("USE_TANGENTS", false);
    expect(workspace.getShader("main.wgsl")).toBe("B\n");

    workspace.setGlobalBool("USE_TANGENTS", true);
    expect(workspace.getShader("main.wgsl")).toBe("A\n");
  });

  it("picks an else branch that runs to the end of the file", () => {
    const workspace = Workspace.fromMemory("shaders", [
      ["main.wgsl", "//:if USE_TANGENTS\nA\n//:else\nB\n"],
    ]);

    workspace.setGlobalBool("USE_TANGENTS", false);
    expect(workspace.getShader("main.wgsl")).toBe("B\n");
    workspace.setGlobalBool("USE_TANGENTS", true);
    expect(workspace.getShader("main.wgsl")).toBe("A\n");
  });

  it("treats nonzero numbers as true", () => {
    const workspace = Workspace.fromMemory("shaders", [["main.wgsl", TANGENT_SHADER]]);

    workspace.setGlobalInteger("USE_TANGENTS", 0);
    expect(workspace.getShader("main.wgsl")).toBe("B\n");
    workspace.setGlobalFloat("USE_TANGENTS", 0.5);
    expect(workspace.getShader("main.wgsl")).toBe("A\n");
  });

  it("emits constant declarations", () => {
    const workspace = Workspace.fromMemory("shaders", [
      ["consts.wgsl", "//:const FOO\n//:const SCALE\n//:const FLAG\n"],
    ]);
    workspace.setGlobalInteger("FOO", 7);
    workspace.setGlobalFloat("SCALE", 1.25);
    workspace.setGlobalBool("FLAG", false);

    expect(workspace.getShader("consts.wgsl")).toBe(
      "const FOO = 7;\nconst SCALE = 1.25;\nconst FLAG = false;\n",
    );
  });

  it("fails on an undefined constant at render time", () => {
    const workspace = Workspace.fromMemory("shaders", [["c.wgsl", "//:const MISSING\n"]]);
    expect(() => workspace.getShader("c.wgsl")).toThrow(new UndefinedVariableError("MISSING"));
  });

  it("lets overrides shadow globals until cleared", () => {
    const workspace = Workspace.fromMemory("shaders", [["main.wgsl", TANGENT_SHADER]]);
    workspace.setGlobalBool("USE_TANGENTS", false);
    workspace.setOverride("USE_TANGENTS", bool(true));

    expect(workspace.getShader("main.wgsl")).toBe("A\n");

    workspace.clearOverrides();
    expect(workspace.getShader("main.wgsl")).toBe("B\n");
  });

  it("evaluates BIT_n masks in conditions", () => {
    const workspace = Workspace.fromMemory("shaders", [
      ["m.wgsl", "//:if (FEATURES & BIT_2) != 0\nshadows\n//:end\n"],
    ]);

    workspace.setVariable("FEATURES", integer(0b101));
    expect(workspace.getShader("m.wgsl")).toBe("shadows\n");

    workspace.setVariable("FEATURES", integer(0b011));
    expect(workspace.getShader("m.wgsl")).toBe("");
  });
});

describe("Workspace includes", () => {
  it("expands includes recursively with a trailing newline", () => {
    const workspace = Workspace.fromMemory("shaders", [
      ["main.wgsl", "//:include lib/common.wgsl\nfn main() {}\n"],
      ["lib/common.wgsl", "//:include ./lib/consts.wgsl\nfn helper() {}\n"],
      ["lib/consts.wgsl", "//:const PI\n"],
    ]);
    workspace.setGlobalFloat("PI", 3.5);

    expect(workspace.getShader("main.wgsl")).toBe(
      "const PI = 3.5;\n\nfn helper() {}\n\nfn main() {}\n",
    );
  });

  it("renders includes with the current environment", () => {
    const workspace = Workspace.fromMemory("shaders", [
      ["main.wgsl", "//:include vertex.wgsl\n"],
      ["vertex.wgsl", TANGENT_SHADER],
    ]);
    workspace.setGlobalBool("USE_TANGENTS", true);

    expect(workspace.getShader("main.wgsl")).toBe("A\n\n");
  });

  it("reports a missing shader", () => {
    const workspace = Workspace.fromMemory("shaders", [["main.wgsl", "//:include nope.wgsl\n"]]);

    expect(() => workspace.getShader("other.wgsl")).toThrow(ShaderNotFoundError);
    expect(() => workspace.getShader("main.wgsl")).toThrow(new ShaderNotFoundError("nope.wgsl"));
  });

  it("detects include cycles", () => {
    const workspace = Workspace.fromMemory("shaders", [
      ["a.wgsl", "//:include b.wgsl\n"],
      ["b.wgsl", "//:include a.wgsl\n"],
    ]);

    expect(() => workspace.getShader("a.wgsl")).toThrow(
      new CircularIncludeError(["a.wgsl", "b.wgsl", "a.wgsl"]),
    );
  });

  it("allows the same include twice in one shader", () => {
    const workspace = Workspace.fromMemory("shaders", [
      ["main.wgsl", "//:include x.wgsl\n//:include x.wgsl\n"],
      ["x.wgsl", "x\n"],
    ]);

    expect(workspace.getShader("main.wgsl")).toBe("x\n\nx\n\n");
  });
});

describe("Shader", () => {
  it("keeps the source length as a size hint", () => {
    const source = "a\n\n//:if X\nb\n//:end\n";
    expect(Shader.parse(source).sizeHint).toBe(source.length);
  });

  it("freezes the parsed tree", () => {
    const shader = Shader.parse("a\n//:if X\nb\n//:else\nc\n//:end\n");
    const { segment } = shader;

    expect(Object.isFrozen(segment)).toBe(true);
    if (segment.kind !== "sequence") throw new Error("expected a sequence");
    expect(Object.isFrozen(segment.segments)).toBe(true);
    expect(segment.segments.every((child) => Object.isFrozen(child))).toBe(true);

    const conditional = segment.segments[1];
    if (conditional?.kind !== "conditional") throw new Error("expected a conditional");
    expect(Object.isFrozen(conditional.ifTrue)).toBe(true);
    expect(Object.isFrozen(conditional.ifFalse)).toBe(true);

    const context = { lookup: { get: () => bool(true) }, resolveInclude: () => "" };
    expect(shader.render(context)).toBe("a\nb\n");
  });

  it("normalizes shader paths", () => {
    expect(normalizeShaderPath("./lib/../noise.wgsl")).toBe("noise.wgsl");
    expect(normalizeShaderPath("lib\\noise.wgsl")).toBe("lib/noise.wgsl");
  });
});

describe("loadWorkspace", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "shader-directives-"));
    await mkdir(join(root, "lib"));
    await writeFile(join(root, "main.wgsl"), "//:include lib/light.wgsl\nfn main() {}\n");
    await writeFile(join(root, "lib", "light.wgsl"), "//:const LIGHTS\n");
    await writeFile(join(root, "notes.txt"), "//:bogus\n");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it("loads shader files recursively under POSIX paths", async () => {
    const workspace = await loadWorkspace(root);
    workspace.setGlobalInteger("LIGHTS", 4);

    expect(workspace.shaderPaths).toEqual(["lib/light.wgsl", "main.wgsl"]);
    expect(workspace.getShader("main.wgsl")).toBe("const LIGHTS = 4;\n\nfn main() {}\n");
  });

  it("honours custom extensions", async () => {
    await expect(loadWorkspace(root, { extensions: [".txt"] })).rejects.toThrow(
      new UnknownOperationError("bogus"),
    );
  });

  it("logs a summary when verbose", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const workspace = await loadWorkspace(root, { verbose: true });

    expect(log).toHaveBeenCalledWith(
      `[Workspace] Loaded 2 shaders (${workspace.totalSize} chars) from ${root}`,
    );
  });

  it("keeps float constants in plain notation", async () => {
    const workspace = await loadWorkspace(root);
    workspace.setVariable("LIGHTS", float(1e21));

    expect(workspace.getShader("lib/light.wgsl")).toBe(
      "const LIGHTS = 1000000000000000000000;\n",
    );
  });
});

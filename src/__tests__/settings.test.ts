import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { bool, float, integer } from "../expression/literal.ts";
import {
  SettingsError,
  applySettings,
  convertSettingValue,
  loadSettingsFile,
  mergeSettings,
  parseDefine,
  parseSettingsJson,
  settingsToLiterals,
} from "../settings.ts";
import { Environment } from "../workspace/environment.ts";

describe("parseSettingsJson", () => {
  it("keeps flat values and skips metadata keys", () => {
    const settings = parseSettingsJson(
      '{"$comment":"lighting","LIGHTS":4,"USE_TANGENTS":true,"MASK":"0x10"}',
    );
    expect(settings).toEqual({ LIGHTS: 4, USE_TANGENTS: true, MASK: "0x10" });
  });

  it("rejects invalid JSON", () => {
    expect(() => parseSettingsJson("{bad")).toThrow(/^Invalid JSON: /);
  });

  it("rejects anything but an object", () => {
    expect(() => parseSettingsJson("[1]")).toThrow(
      new SettingsError("Settings must be a JSON object"),
    );
    expect(() => parseSettingsJson("null")).toThrow(SettingsError);
  });

  it("names the offending key and type", () => {
    expect(() => parseSettingsJson('{"A":null}')).toThrow(
      new SettingsError(
        'Setting "A" has unsupported type "null". Expected boolean, number, or string.',
      ),
    );
    expect(() => parseSettingsJson('{"B":[1]}')).toThrow(
      new SettingsError(
        'Setting "B" has unsupported type "array". Expected boolean, number, or string.',
      ),
    );
  });
});

describe("convertSettingValue", () => {
  it("maps JSON primitives to literals", () => {
    expect(convertSettingValue("K", true)).toEqual(bool(true));
    expect(convertSettingValue("K", 7)).toEqual(integer(7));
    expect(convertSettingValue("K", 1.5)).toEqual(float(1.5));
    expect(convertSettingValue("K", 2 ** 60)).toEqual(float(2 ** 60));
  });

  it("evaluates strings as constant expressions", () => {
    expect(convertSettingValue("K", "0x10")).toEqual(integer(16));
    expect(convertSettingValue("K", "1.0")).toEqual(float(1));
    expect(convertSettingValue("K", "1 + 2")).toEqual(integer(3));
    expect(convertSettingValue("K", "false")).toEqual(bool(false));
  });

  it("rejects strings that reference variables", () => {
    expect(() => convertSettingValue("K", "BIT_3")).toThrow(
      new SettingsError('Setting "K" is not a constant expression: Undefined variable: BIT_3'),
    );
  });

  it("rejects strings that do not parse", () => {
    expect(() => convertSettingValue("K", "1 +")).toThrow(SettingsError);
  });
});

describe("settings in the environment", () => {
  it("converts every key", () => {
    const literals = settingsToLiterals({ A: 1, B: "2.5" });
    expect([...literals]).toEqual([
      ["A", integer(1)],
      ["B", float(2.5)],
    ]);
  });

  it("merges user values over defaults", () => {
    expect(mergeSettings({ A: 1, B: false }, { B: true })).toEqual({ A: 1, B: true });
  });

  it("writes into the requested tier", () => {
    const env = new Environment();
    env.set("A", integer(0));

    expect(applySettings(env, { A: 1, B: true }, "override")).toBe(2);
    expect(env.get("A")).toEqual(integer(1));

    env.clearOverrides();
    expect(env.get("A")).toEqual(integer(0));
    expect(env.get("B")).toBeUndefined();
  });
});

describe("parseDefine", () => {
  it("treats a bare name as true", () => {
    expect(parseDefine("FAST")).toEqual(["FAST", bool(true)]);
  });

  it("converts the value after =", () => {
    expect(parseDefine("LIGHTS=4")).toEqual(["LIGHTS", integer(4)]);
    expect(parseDefine(" SCALE = 0.5")).toEqual(["SCALE", float(0.5)]);
  });

  it("rejects invalid names", () => {
    expect(() => parseDefine("1X=2")).toThrow(new SettingsError('Invalid define name: "1X"'));
    expect(() => parseDefine("=2")).toThrow(SettingsError);
  });
});

describe("loadSettingsFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "shader-settings-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads and validates a file", async () => {
    const path = join(dir, "settings.json");
    await writeFile(path, '{"$schema":"./schema.json","LIGHTS":8}');

    await expect(loadSettingsFile(path)).resolves.toEqual({ LIGHTS: 8 });
  });

  it("reports a missing file", async () => {
    await expect(loadSettingsFile(join(dir, "missing.json"))).rejects.toThrow(
      /^Cannot read settings file /,
    );
  });
});

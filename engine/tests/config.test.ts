/**
 * ucrt-stage Engine — Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  ConfigError,
  DEFAULT_RECIPE_PATH,
  loadBuildEnvironment,
  loadRecipe,
  parseRecipe,
} from "../src/config";

const TEST_DIR = path.join(os.tmpdir(), "ucrt-stage-config-test");

const BASE_ENV = {
  BUILD_PREFIX: "C:\\bld\\_build_env",
  LIBRARY_BIN: "C:\\bld\\_h_env\\Library\\bin",
  PKG_VERSION: "10.0.22621.0",
  SRC_DIR: "C:\\bld\\work",
  PREFIX: "C:\\bld\\_h_env",
};

describe("loadBuildEnvironment", () => {
  it("reads the required variables", () => {
    const env = loadBuildEnvironment(
      { ...BASE_ENV, TEMP: "C:\\tmp", UCRT_ARCH: "arm64" },
      "C:\\bld\\work",
    );

    expect(env).toEqual({
      ...BASE_ENV,
      TEMP: "C:\\tmp",
      ARCH: "arm64",
      CWD: "C:\\bld\\work",
    });
  });

  it("defaults TEMP to the OS temp dir and ARCH to x64", () => {
    const env = loadBuildEnvironment({ ...BASE_ENV }, "/work");

    expect(env.TEMP).toBe(os.tmpdir());
    expect(env.ARCH).toBe("x64");
  });

  it("lists every missing or empty variable", () => {
    const { PREFIX: _prefix, SRC_DIR: _src, ...partial } = BASE_ENV;

    let caught: unknown;
    try {
      loadBuildEnvironment({ ...partial, LIBRARY_BIN: "  " });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toEqual([
        "LIBRARY_BIN: is empty",
        "SRC_DIR: is not set",
        "PREFIX: is not set",
      ]);
    }
  });

  it("rejects an unsupported architecture", () => {
    expect(() =>
      loadBuildEnvironment({ ...BASE_ENV, UCRT_ARCH: "mips" }),
    ).toThrow(ConfigError);
  });
});

describe("recipes", () => {
  beforeEach(() => {
    fs.mkdirSync(TEST_DIR, { recursive: true });
  });
  afterEach(() => fs.rmSync(TEST_DIR, { recursive: true, force: true }));

  it("loads the bundled UCRT recipe", () => {
    const recipe = loadRecipe(DEFAULT_RECIPE_PATH);

    expect(recipe.id).toBe("ucrt");
    expect(recipe.tools).toEqual({ seven_zip: "7z", msiexec: "msiexec.exe" });
    expect(recipe.steps.map((s) => s.kind)).toEqual([
      "make-dir",
      "extract-iso",
      "msi-admin",
      "copy",
      "copy",
    ]);
    expect(recipe.steps[3].copy?.to).toBe("${PREFIX}");
    expect(recipe.steps[4].copy?.to).toBe("${LIBRARY_BIN}");
  });

  it("fills in default tool names", () => {
    const recipe = parseRecipe({
      id: "mini",
      name: "Mini",
      steps: [{ kind: "make-dir", name: "Make", make_dir: { path: "x" } }],
    });

    expect(recipe.tools).toEqual({ seven_zip: "7z", msiexec: "msiexec.exe" });
  });

  it("rejects unknown step kinds", () => {
    expect(() =>
      parseRecipe({
        id: "bad",
        name: "Bad",
        steps: [{ kind: "download", name: "Fetch" }],
      }),
    ).toThrow(ConfigError);
  });

  it("rejects a recipe without steps", () => {
    expect(() => parseRecipe({ id: "empty", name: "Empty", steps: [] })).toThrow(
      "Invalid stage recipe: steps: Array must contain at least 1 element(s)",
    );
  });

  it("reports a missing recipe file", () => {
    const missing = path.join(TEST_DIR, "missing.yaml");
    expect(() => loadRecipe(missing)).toThrow(`Recipe file not found: ${missing}`);
  });

  it("reports unparseable YAML", () => {
    const file = path.join(TEST_DIR, "broken.yaml");
    fs.writeFileSync(file, "steps: [unclosed\n");

    expect(() => loadRecipe(file)).toThrow(ConfigError);
  });
});

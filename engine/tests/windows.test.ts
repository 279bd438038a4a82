/**
 * ucrt-stage Engine — Windows Tooling Tests
 *
 * - Exit code lookup for 7-Zip and msiexec
 * - Argument building for both tools
 * - Command formatting
 */

import { describe, it, expect } from "vitest";
import * as os from "os";
import * as path from "path";
import { lookupExitCode } from "../src/windows/exit-codes";
import { buildMsiAdminArgs } from "../src/windows/msi";
import { buildSevenZipArgs } from "../src/windows/seven-zip";
import {
  formatCommand,
  LAUNCH_FAILURE_EXIT_CODE,
  SpawnProcessRunner,
} from "../src/windows/process";

describe("exit codes", () => {
  it("maps 7-Zip code 2 to a fatal error", () => {
    const info = lookupExitCode("7z", 2);
    expect(info.name).toBe("FATAL_ERROR");
    expect(info.category).toBe("fatal");
  });

  it("maps 7-Zip code 1 to a warning", () => {
    expect(lookupExitCode("7z", 1).category).toBe("warning");
  });

  it("maps msiexec 3010 to reboot required", () => {
    const info = lookupExitCode("msiexec", 3010);
    expect(info.name).toBe("ERROR_SUCCESS_REBOOT_REQUIRED");
    expect(info.category).toBe("warning");
  });

  it("maps msiexec 1639 to an argument error", () => {
    expect(lookupExitCode("msiexec", 1639).category).toBe("args");
  });

  it("describes unknown codes", () => {
    expect(lookupExitCode("msiexec", 42)).toEqual({
      code: 42,
      name: "UNKNOWN",
      category: "unknown",
      message: "Unrecognised msiexec exit code: 42",
    });
  });

  it("describes launch failures for either tool", () => {
    const info = lookupExitCode("7z", LAUNCH_FAILURE_EXIT_CODE);
    expect(info.name).toBe("LAUNCH_FAILURE");
    expect(info.message).toBe(
      "7z could not be started. Check that it is on PATH and that its working directory exists.",
    );
  });

  it("does not share codes between tools", () => {
    expect(lookupExitCode("7z", 1603).name).toBe("UNKNOWN");
    expect(lookupExitCode("msiexec", 2).name).toBe("UNKNOWN");
  });
});

describe("buildMsiAdminArgs", () => {
  it("builds an administrative extraction command", () => {
    expect(
      buildMsiAdminArgs({
        msiPath: "C:\\sdk\\Installers\\Universal CRT Redistributable-x86_en-us.msi",
        targetDir: "C:\\Temp\\ucrt",
      }),
    ).toEqual([
      "/a",
      "C:\\sdk\\Installers\\Universal CRT Redistributable-x86_en-us.msi",
      "/qb",
      "TARGETDIR=C:\\Temp\\ucrt",
    ]);
  });

  it("strips pre-existing quotes", () => {
    const args = buildMsiAdminArgs({
      msiPath: '"C:\\sdk\\ucrt.msi"',
      targetDir: '"C:\\Program Files\\ucrt"',
    });
    expect(args[1]).toBe("C:\\sdk\\ucrt.msi");
    expect(args[3]).toBe("TARGETDIR=C:\\Program Files\\ucrt");
  });

  it("appends a verbose log when requested", () => {
    const args = buildMsiAdminArgs({
      msiPath: "ucrt.msi",
      targetDir: "out",
      logFile: "C:\\logs\\ucrt.log",
    });
    expect(args.slice(-2)).toEqual(["/l*v", "C:\\logs\\ucrt.log"]);
  });
});

describe("buildSevenZipArgs", () => {
  it("extracts with overwrite-all into the working directory", () => {
    expect(buildSevenZipArgs({ isoPath: "winsdk.iso" })).toEqual([
      "x",
      "winsdk.iso",
      "-aoa",
      "-y",
    ]);
  });

  it("attaches the output directory to -o", () => {
    expect(
      buildSevenZipArgs({ isoPath: "winsdk.iso", outputDir: "C:\\out dir" }),
    ).toEqual(["x", "winsdk.iso", "-aoa", "-y", "-oC:\\out dir"]);
  });
});

describe("formatCommand", () => {
  it("quotes arguments containing whitespace", () => {
    expect(
      formatCommand("msiexec.exe", ["/a", "C:\\a b\\x.msi", "TARGETDIR=C:\\t"]),
    ).toBe('msiexec.exe /a "C:\\a b\\x.msi" TARGETDIR=C:\\t');
  });
});

describe("SpawnProcessRunner", () => {
  it("reports a missing working directory instead of spawning", async () => {
    const cwd = path.join(os.tmpdir(), "ucrt-stage-no-such-dir");

    const result = await new SpawnProcessRunner().run("7z", ["x", "winsdk.iso"], { cwd });

    expect(result).toEqual({
      exitCode: LAUNCH_FAILURE_EXIT_CODE,
      stderr: "",
      durationMs: 0,
      launchError: `working directory not found: ${cwd}`,
    });
  });
});

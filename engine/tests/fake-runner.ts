/**
 * In-process stand-in for 7-Zip and msiexec.
 *
 * Exit codes are scripted per command. A successful msiexec call drops a
 * fake UCRT redistributable tree under TARGETDIR, the way an administrative
 * extraction would.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  ProcessResult,
  ProcessRunner,
  RunOptions,
} from "../src/windows/process";
import { LAUNCH_FAILURE_EXIT_CODE } from "../src/windows/process";

export interface RecordedCall {
  command: string;
  args: string[];
  cwd?: string;
}

export const FAKE_DLLS = ["api-ms-win-crt-runtime-l1-1-0.dll", "ucrtbase.dll"];

export class FakeProcessRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly exitCodes: Record<string, number> = {},
    private readonly dlls: string[] = FAKE_DLLS,
    private readonly unlaunchable: string[] = [],
  ) {}

  async run(
    command: string,
    args: string[],
    options: RunOptions = {},
  ): Promise<ProcessResult> {
    this.calls.push({ command, args, cwd: options.cwd });

    if (this.unlaunchable.includes(command)) {
      return {
        exitCode: LAUNCH_FAILURE_EXIT_CODE,
        stderr: "",
        durationMs: 0,
        launchError: `spawn ${command} ENOENT`,
      };
    }

    const exitCode = this.exitCodes[command] ?? 0;
    if (exitCode === 0 && command === "msiexec.exe") {
      this.extractRedist(args);
    }

    return {
      exitCode,
      stderr: exitCode === 0 ? "" : `${command} failed`,
      durationMs: 0,
    };
  }

  commands(): string[] {
    return this.calls.map((c) => c.command);
  }

  private extractRedist(args: string[]): void {
    const target = args
      .find((a) => a.startsWith("TARGETDIR="))
      ?.slice("TARGETDIR=".length);
    if (!target) return;

    const dllDir = path.join(
      target,
      "Windows Kits",
      "10",
      "Redist",
      "ucrt",
      "DLLs",
      "x64",
    );
    fs.mkdirSync(dllDir, { recursive: true });
    for (const name of this.dlls) {
      fs.writeFileSync(path.join(dllDir, name), `fake ${name}`);
    }
    fs.writeFileSync(path.join(dllDir, "readme.txt"), "not a dll");
  }
}

#!/usr/bin/env node

/**
 * ucrt-stage CLI — Entry Point
 *
 * Stages the Universal CRT redistributable DLLs into a package build prefix.
 *
 * Commands:
 *   ucrt-stage run       Extract the SDK and copy the DLLs
 *   ucrt-stage plan      Show what run would do
 *   ucrt-stage verify    Compare the staged destinations
 */

import { Command } from "commander";
import { REQUIRED_ENV_VARS } from "@ucrt-stage/engine";
import { registerRunCommand } from "./commands/run";
import { registerPlanCommand } from "./commands/plan";
import { registerVerifyCommand } from "./commands/verify";

const program = new Command();

program
  .name("ucrt-stage")
  .description(
    "Stage the Universal CRT redistributable into a build prefix.\n" +
      `Reads ${REQUIRED_ENV_VARS.join(", ")} from the environment.`,
  )
  .version("0.1.0");

registerRunCommand(program);
registerPlanCommand(program);
registerVerifyCommand(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});

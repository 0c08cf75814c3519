/**
 * otakeeper CLI — Program
 *
 * Builds the commander program without parsing, so tests can drive it.
 */

import { Command } from "commander";
import { registerPackCommand } from "./commands/pack";
import { registerInspectCommand } from "./commands/inspect";
import { registerUploadCommand } from "./commands/upload";
import { registerStatusCommand } from "./commands/status";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("otakeeper")
    .description("Build, sign, inspect and deploy over-the-air update packages")
    .version("0.1.0")
    // `pack --version <label>` must not trigger the program's own --version
    .enablePositionalOptions();

  // ─── Packaging ──────────────────────────────────────────────
  registerPackCommand(program);
  registerInspectCommand(program);

  // ─── Devices ────────────────────────────────────────────────
  registerUploadCommand(program);
  registerStatusCommand(program);

  return program;
}

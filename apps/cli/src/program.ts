import { Command } from "commander";
import { registerCacheCommand } from "./commands/cache.ts";
import { registerListCommand } from "./commands/list.ts";
import { registerManageCommands } from "./commands/manage.ts";
import { registerTransferCommands } from "./commands/transfer.ts";
import type { ProgramOptions } from "./lib/context.ts";
import { OUTPUT_FORMATS } from "./lib/output.ts";

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name("skiff")
    .description("Cache local, HTTP(S), S3 and model hub resources as local files")
    .version("0.1.0")
    .option("--root <dir>", "cache root directory")
    .option("-f, --format <type>", `output format: ${OUTPUT_FORMATS.join("|")}`, "text")
    .option("-v, --verbose", "verbose output")
    .option("-q, --quiet", "quiet mode")
    .exitOverride();

  registerCacheCommand(program, options);
  registerListCommand(program, options);
  registerManageCommands(program, options);
  registerTransferCommands(program, options);

  return program;
}

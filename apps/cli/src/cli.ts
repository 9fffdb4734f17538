import { CommanderError } from "commander";
import { exitCodeOf } from "./lib/exit-codes.ts";
import { createFormatter } from "./lib/output.ts";
import { createProgram } from "./program.ts";

const program = createProgram();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    // If no subcommand is provided, show help
    if (process.argv.length <= 2) {
      program.outputHelp();
    }
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // help, version and usage errors are already printed by commander
      process.exit(error.exitCode);
    }
    const formatter = createFormatter(program.opts());
    formatter.error(error instanceof Error ? error.message : "An unexpected error occurred");
    process.exit(exitCodeOf(error));
  }
}

void main();

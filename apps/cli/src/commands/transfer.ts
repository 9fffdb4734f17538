import type { Command } from "commander";
import { createContext, type ProgramOptions } from "../lib/context.ts";

export function registerTransferCommands(program: Command, options: ProgramOptions = {}): void {
  program
    .command("download <id> [dest]")
    .description("Resolve a resource through the cache and copy it to dest (default: current directory)")
    .option("--force", "fetch even when the cached copy is current")
    .option("--overwrite", "replace an existing destination file")
    .action(async (id: string, dest: string | undefined, cmdOpts: { force?: boolean; overwrite?: boolean }) => {
      const { formatter, manager } = createContext(program, options);
      const spinner = formatter.spinner(`Downloading ${id}`);
      try {
        const output = await manager.download(id, dest ?? ".", {
          forceRefresh: cmdOpts.force ?? false,
          overwrite: cmdOpts.overwrite ?? false,
        });
        spinner?.stop();
        formatter.output({ identifier: id, path: output }, (result) => result.path);
      } catch (error: unknown) {
        spinner?.fail(`Failed to download ${id}`);
        throw error;
      }
    });

  program
    .command("upload <file> <id>")
    .description("Write a local file to a resource")
    .action(async (file: string, id: string) => {
      const { formatter, manager } = createContext(program, options);
      const spinner = formatter.spinner(`Uploading ${file}`);
      try {
        await manager.upload(file, id);
        spinner?.stop();
        formatter.success(`Uploaded ${file} to ${id}`);
      } catch (error: unknown) {
        spinner?.fail(`Failed to upload ${file}`);
        throw error;
      }
    });

  program
    .command("exists <id>")
    .description("Check whether a resource exists at its backend (members: inside the archive)")
    .action(async (id: string) => {
      const { formatter, manager } = createContext(program, options);
      const exists = await manager.exists(id);
      formatter.output({ identifier: id, exists }, (result) => String(result.exists));
    });

  program
    .command("delete <id>")
    .description("Delete a resource at its backend and drop its cache entry")
    .action(async (id: string) => {
      const { formatter, manager } = createContext(program, options);
      await manager.delete(id);
      formatter.success(`Deleted ${id}`);
    });
}

import { pipeline } from "node:stream/promises";
import type { ResolveOptions } from "@skiff/cache";
import type { Command } from "commander";
import { parseInteger } from "../lib/args.ts";
import { createContext, type ProgramOptions } from "../lib/context.ts";

type CacheCommandOptions = {
  force?: boolean;
  autoUpdate: boolean;
  expireDays?: number;
  extract?: boolean;
  forceExtract?: boolean;
  decompress?: boolean;
};

export function registerCacheCommand(program: Command, options: ProgramOptions = {}): void {
  program
    .command("cache <id...>")
    .description("Fetch resources into the cache and print their local paths")
    .option("--force", "fetch even when the cached copy is current")
    .option("--no-auto-update", "use a cached copy without checking the backend")
    .option("--expire-days <days>", "refetch entries older than this many days (-1: never)", parseInteger)
    .option("--extract", "extract archives into a directory and print its path")
    .option("--force-extract", "like --extract, extracting again even when a current extraction exists")
    .option("--decompress", "write the decompressed contents to stdout instead of the paths")
    .action(async (ids: string[], cmdOpts: CacheCommandOptions) => {
      const { formatter, manager } = createContext(program, options);

      const resolveOptions: ResolveOptions = {
        forceRefresh: cmdOpts.force ?? false,
        ...(cmdOpts.autoUpdate ? {} : { autoUpdate: false }),
        ...(cmdOpts.expireDays !== undefined ? { expireDays: cmdOpts.expireDays } : {}),
      };

      if (cmdOpts.decompress) {
        const stdout = options.stdout ?? process.stdout;
        for (const id of ids) {
          const handle = await manager.open(id, { ...resolveOptions, decompress: "auto" });
          try {
            await pipeline(handle.stream, stdout, { end: false });
          } finally {
            await handle.close();
          }
        }
        return;
      }

      const results: Array<{ identifier: string; path: string }> = [];
      for (const id of ids) {
        const spinner = formatter.spinner(`Caching ${id}`);
        try {
          const path = await manager.resolveFile(id, {
            ...resolveOptions,
            extract: cmdOpts.extract ?? false,
            forceExtract: cmdOpts.forceExtract ?? false,
          });
          spinner?.stop();
          formatter.debug(`${id} -> ${path}`);
          results.push({ identifier: id, path });
        } catch (error: unknown) {
          spinner?.fail(`Failed to cache ${id}`);
          throw error;
        }
      }

      formatter.output(results, (rows) => rows.map((row) => row.path).join("\n"));
    });
}

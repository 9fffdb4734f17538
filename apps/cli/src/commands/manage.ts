import type { CacheManager, CacheTargets } from "@skiff/cache";
import type { Command } from "commander";
import { createContext, type ProgramOptions } from "../lib/context.ts";
import { formatSize, type OutputFormatter } from "../lib/output.ts";
import { promptYesNo } from "../lib/prompt.ts";

function toTargets(ids: string[], all: boolean | undefined): CacheTargets {
  if (all) {
    return "all";
  }
  if (ids.length === 0) {
    throw new Error("Specify at least one identifier or key, or --all");
  }
  return ids;
}

/**
 * Show the matched entries and ask. False when nothing matched or the
 * answer was not yes.
 */
async function confirmTargets(
  formatter: OutputFormatter,
  manager: CacheManager,
  targets: CacheTargets,
  question: string,
  confirm: (question: string) => Promise<boolean>
): Promise<boolean> {
  const matched = await manager.match(targets);
  if (matched.length === 0) {
    formatter.info("No cached entries");
    return false;
  }

  formatter.info(`${matched.length} cached ${matched.length === 1 ? "entry" : "entries"}:`);
  for (const entry of matched) {
    formatter.info(`  ${entry.key.slice(0, 8)}  ${entry.identifier}`);
  }
  if (await confirm(question)) {
    return true;
  }
  formatter.info("Canceled");
  return false;
}

export function registerManageCommands(program: Command, options: ProgramOptions = {}): void {
  program
    .command("remove [id...]")
    .alias("rm")
    .description("Remove cached entries by identifier or key prefix")
    .option("--all", "remove every entry")
    .option("--force", "do not ask for confirmation")
    .action(async (ids: string[], cmdOpts: { all?: boolean; force?: boolean }) => {
      const { formatter, manager } = createContext(program, options);
      const targets = toTargets(ids, cmdOpts.all);
      const confirm = options.confirm ?? promptYesNo;
      if (!cmdOpts.force && !(await confirmTargets(formatter, manager, targets, "Delete these caches?", confirm))) {
        return;
      }
      const removed = await manager.remove(targets);

      formatter.output(
        removed.map((entry) => ({ key: entry.key, identifier: entry.identifier })),
        (rows) => rows.map((row) => `${row.key.slice(0, 8)}  ${row.identifier}`).join("\n")
      );
      formatter.success(`Removed ${removed.length} cached ${removed.length === 1 ? "entry" : "entries"}`);
    });

  program
    .command("update [id...]")
    .description("Refetch cached entries from their backends")
    .option("--all", "update every entry")
    .option("--force", "do not ask for confirmation")
    .action(async (ids: string[], cmdOpts: { all?: boolean; force?: boolean }) => {
      const { formatter, manager } = createContext(program, options);
      const targets = toTargets(ids, cmdOpts.all);
      const confirm = options.confirm ?? promptYesNo;
      if (!cmdOpts.force && !(await confirmTargets(formatter, manager, targets, "Update these caches?", confirm))) {
        return;
      }

      const spinner = formatter.spinner("Updating cached entries");
      try {
        const updated = await manager.update(targets);
        spinner?.stop();

        formatter.output(
          updated.map((entry) => ({
            key: entry.key,
            identifier: entry.identifier,
            size: entry.size,
            freshnessToken: entry.freshnessToken,
          })),
          (rows) => rows.map((row) => `${row.identifier}  ${formatSize(row.size)}`).join("\n")
        );
        formatter.success(`Updated ${updated.length} cached ${updated.length === 1 ? "entry" : "entries"}`);
      } catch (error: unknown) {
        spinner?.fail("Update failed");
        throw error;
      }
    });

  program
    .command("sweep")
    .description("Delete orphaned files and drop index entries whose files are gone")
    .action(async () => {
      const { formatter, manager } = createContext(program, options);
      const report = await manager.sweep();

      formatter.output(report, (r) =>
        [
          `Temp files:   ${r.tempFiles}`,
          `Data files:   ${r.dataFiles}`,
          `Entries:      ${r.entries}`,
          `Extractions:  ${r.extractions}`,
        ].join("\n")
      );
    });
}

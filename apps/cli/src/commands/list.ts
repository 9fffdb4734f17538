import type { CacheListing } from "@skiff/cache";
import { type Command, Option } from "commander";
import { parseInteger } from "../lib/args.ts";
import { createContext, type ProgramOptions } from "../lib/context.ts";
import { formatRelativeTime, formatSize } from "../lib/output.ts";

type ListCommandOptions = {
  expired?: boolean;
  expireDays?: number;
  details?: boolean;
  sort?: string;
  desc?: boolean;
};

const SORT_FIELDS = {
  key: (listing) => listing.key,
  identifier: (listing) => listing.identifier,
  backend: (listing) => listing.backend,
  size: (listing) => listing.size,
  fetched: (listing) => listing.fetchedAt,
  expired: (listing) => (listing.expired ? 1 : 0),
} satisfies Record<string, (listing: CacheListing) => string | number>;

type SortColumn = keyof typeof SORT_FIELDS;

const isSortColumn = (value: string): value is SortColumn => Object.hasOwn(SORT_FIELDS, value);

export function sortListings(listings: CacheListing[], column: SortColumn, desc = false): CacheListing[] {
  const field: (listing: CacheListing) => string | number = SORT_FIELDS[column];
  const sorted = [...listings].sort((a, b) => {
    const left = field(a);
    const right = field(b);
    if (typeof left === "number" && typeof right === "number") {
      return left - right;
    }
    return String(left).localeCompare(String(right));
  });
  return desc ? sorted.reverse() : sorted;
}

export function registerListCommand(program: Command, options: ProgramOptions = {}): void {
  program
    .command("list [query...]")
    .alias("ls")
    .description("List cached entries matching every query (identifier substring or key prefix)")
    .option("--expired", "only expired entries")
    .option("--expire-days <days>", "judge expiry by this many days (implies --expired)", parseInteger)
    .option("--details", "include local paths, freshness tokens and extraction counts")
    .addOption(new Option("--sort <column>", "sort by a column").choices(Object.keys(SORT_FIELDS)))
    .option("--desc", "sort in descending order")
    .action(async (queries: string[], cmdOpts: ListCommandOptions) => {
      const { formatter, manager } = createContext(program, options);
      const filtered = await manager.list(queries, {
        ...(cmdOpts.expired || cmdOpts.expireDays !== undefined ? { expired: true } : {}),
        ...(cmdOpts.expireDays !== undefined ? { expireDays: cmdOpts.expireDays } : {}),
      });
      const listings =
        cmdOpts.sort !== undefined && isSortColumn(cmdOpts.sort)
          ? sortListings(filtered, cmdOpts.sort, cmdOpts.desc)
          : filtered;

      if (formatter.format === "json" || formatter.format === "yaml") {
        formatter.output(listings);
        return;
      }

      if (listings.length === 0) {
        formatter.info("No cached entries");
        return;
      }

      const now = (options.now ?? (() => new Date()))().getTime();
      const rows = listings.map((listing) => ({
        key: listing.key.slice(0, 8),
        identifier: listing.identifier,
        backend: listing.backend,
        size: formatSize(listing.size),
        fetched: formatRelativeTime(listing.fetchedAt, now),
        expired: listing.expired ? "yes" : "no",
        ...(cmdOpts.details
          ? {
              token: listing.freshnessToken ?? "-",
              extractions: listing.extractions,
              path: listing.path,
            }
          : {}),
      }));
      formatter.printTable(rows);
    });
}

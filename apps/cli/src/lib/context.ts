import type { Writable } from "node:stream";
import { type CacheManager, createCacheManager } from "@skiff/cache";
import type { BackendDrivers } from "@skiff/storage-core";
import type { Command } from "commander";
import { type Config, loadConfig, toManagerConfig } from "./config.ts";
import { createFormatter, type OutputFormatter } from "./output.ts";

export type GlobalOptions = {
  root?: string;
  format?: string;
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Settings shared by every command, fixed when the program is created.
 */
export type ProgramOptions = {
  env?: Record<string, string | undefined>;
  /** Backend drivers (default: built from the config) */
  drivers?: BackendDrivers;
  now?: () => Date;
  /** Destination of file contents written by commands (default: process.stdout) */
  stdout?: Writable;
  /** Asks before destructive commands run without --force (default: a prompt on stdin) */
  confirm?: (question: string) => Promise<boolean>;
};

export type CommandContext = {
  formatter: OutputFormatter;
  config: Config;
  manager: CacheManager;
};

export function createContext(program: Command, options: ProgramOptions = {}): CommandContext {
  const opts = program.opts<GlobalOptions>();
  const formatter = createFormatter(opts);
  const env = options.env ?? process.env;
  const config = loadConfig(env);
  const managerConfig = toManagerConfig(config, { root: opts.root, env });

  const manager = createCacheManager({
    ...managerConfig,
    drivers: options.drivers ?? managerConfig.drivers,
    logger: formatter.toLogger(),
    ...(options.now ? { now: options.now } : {}),
  });
  formatter.debug(`cache root: ${manager.root}`);

  return { formatter, config, manager };
}

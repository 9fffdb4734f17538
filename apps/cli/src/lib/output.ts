import type { CacheLogger } from "@skiff/cache";
import chalk from "chalk";
import Table from "cli-table3";
import ora, { type Ora } from "ora";
import YAML from "yaml";

export const OUTPUT_FORMATS = ["text", "json", "yaml", "table"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface OutputOptions {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
}

const isOutputFormat = (value: string): value is OutputFormat =>
  OUTPUT_FORMATS.some((format) => format === value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export class OutputFormatter {
  constructor(private options: OutputOptions) {}

  get format(): OutputFormat {
    return this.options.format;
  }

  get isQuiet(): boolean {
    return this.options.quiet;
  }

  get isVerbose(): boolean {
    return this.options.verbose;
  }

  // Output structured data
  output<T>(data: T, textFormatter?: (data: T) => string): void {
    if (this.options.quiet && this.options.format === "text") {
      return;
    }

    switch (this.options.format) {
      case "json":
        console.log(JSON.stringify(data, null, 2));
        break;
      case "yaml":
        console.log(YAML.stringify(data));
        break;
      case "table":
        if (Array.isArray(data)) {
          this.printTable(data.filter(isRecord));
        } else if (isRecord(data)) {
          this.printObjectTable(data);
        } else {
          console.log(String(data));
        }
        break;
      default:
        if (textFormatter) {
          console.log(textFormatter(data));
        } else {
          console.log(data);
        }
    }
  }

  // Print array as table
  printTable(rows: Array<Record<string, unknown>>, columns?: string[]): void {
    const firstRow = rows[0];
    if (!firstRow) {
      console.log("(empty)");
      return;
    }

    const cols = columns || Object.keys(firstRow);
    const table = new Table({
      head: cols.map((c) => chalk.bold(c.toUpperCase())),
      style: { head: [], border: [] },
    });

    for (const row of rows) {
      table.push(cols.map((c) => String(row[c] ?? "")));
    }

    console.log(table.toString());
  }

  // Print object as key-value table
  printObjectTable(obj: Record<string, unknown>): void {
    const table = new Table({
      style: { head: [], border: [] },
    });

    for (const [key, value] of Object.entries(obj)) {
      table.push([chalk.bold(key), formatValue(value)]);
    }

    console.log(table.toString());
  }

  // Print success message
  success(message: string): void {
    if (!this.options.quiet) {
      console.error(chalk.green("✓"), message);
    }
  }

  // Print error message
  error(message: string): void {
    console.error(chalk.red("✗"), message);
  }

  // Print warning message
  warn(message: string): void {
    if (!this.options.quiet) {
      console.error(chalk.yellow("⚠"), message);
    }
  }

  // Print info message
  info(message: string): void {
    if (!this.options.quiet) {
      console.error(chalk.blue("ℹ"), message);
    }
  }

  // Print verbose/debug message
  debug(message: string): void {
    if (this.options.verbose) {
      console.error(chalk.gray("⋯"), chalk.gray(message));
    }
  }

  // Print raw text (no formatting)
  raw(text: string): void {
    console.log(text);
  }

  /**
   * Spinner on stderr; null when output is quiet, structured or not a TTY.
   */
  spinner(text: string): Ora | null {
    if (this.options.quiet || this.options.format !== "text" || !process.stderr.isTTY) {
      return null;
    }
    return ora({ text, stream: process.stderr }).start();
  }

  /**
   * Cache logger backed by this formatter. Cache progress is shown only
   * with --verbose; warnings always.
   */
  toLogger(): CacheLogger {
    return {
      debug: (message) => this.debug(message),
      info: (message) => this.debug(message),
      warn: (message) => this.warn(message),
    };
  }
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray("-");
  }
  if (typeof value === "boolean") {
    return value ? chalk.green("true") : chalk.red("false");
  }
  if (typeof value === "number") {
    return chalk.cyan(String(value));
  }
  if (Array.isArray(value)) {
    return value.join(", ");
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

// Helper to create formatter from command options
export function createFormatter(options: {
  format?: string;
  quiet?: boolean;
  verbose?: boolean;
}): OutputFormatter {
  const format = options.format ?? "text";
  return new OutputFormatter({
    format: isOutputFormat(format) ? format : "text",
    quiet: options.quiet || false,
    verbose: options.verbose || false,
  });
}

// Format relative time
export function formatRelativeTime(date: Date | number | string, now = Date.now()): string {
  const timestamp = typeof date === "number" ? date : new Date(date).getTime();
  const diff = now - timestamp;

  const seconds = Math.floor(diff / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 30) {
    return new Date(timestamp).toISOString().slice(0, 10);
  }
  if (days > 0) return `${days}d ago`;
  if (hours > 0) return `${hours}h ago`;
  if (minutes > 0) return `${minutes}m ago`;
  return "just now";
}

// Format file size
export function formatSize(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB", "TB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  const size = bytes / 1024 ** i;
  return `${size.toFixed(i === 0 ? 0 : 2)} ${units[i]}`;
}

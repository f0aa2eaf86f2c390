import { consola } from "consola";

interface GlobalFlags {
  verbose: boolean;
  dryRun: boolean;
  json: boolean;
}

const flags: GlobalFlags = { verbose: false, dryRun: false, json: false };

/**
 * Read --verbose, --dry-run and --json before citty parses the subcommand,
 * so every module sees them. cli.ts calls this ahead of runMain().
 */
export function initFlags(argv: string[] = process.argv): void {
  flags.verbose = argv.includes("--verbose") || argv.includes("-v");
  flags.dryRun = argv.includes("--dry-run");
  flags.json = argv.includes("--json");
  if (flags.verbose) consola.level = 4;
}

export function isDryRun(): boolean {
  return flags.dryRun;
}

export function isJsonOutput(): boolean {
  return flags.json;
}

/** Debug line for --verbose runs: resolution steps, spawned commands */
export function verbose(msg: string, ...args: unknown[]): void {
  if (flags.verbose) consola.debug(msg, ...args);
}

/** Write a result or plan to stdout as JSON under --json */
export function output(data: unknown): void {
  if (flags.json) {
    console.log(JSON.stringify(data, null, 2));
  }
}

/** Under --json stdout carries only the JSON document */
export function suppressHumanOutput(): void {
  if (flags.json) consola.level = -1;
}

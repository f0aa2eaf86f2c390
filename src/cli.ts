#!/usr/bin/env node
import { defineCommand, runMain } from "citty";
import { initFlags } from "./utils/logger.js";
import { showBanner } from "./utils/banner.js";

initFlags();

const SUBCOMMANDS = ["run", "list", "folder"];

// Show banner when running without subcommand or with --help
const args = process.argv.slice(2);
const hasSubcommand = args.some(
  (arg) => !arg.startsWith("-") && SUBCOMMANDS.includes(arg)
);
if (!hasSubcommand) {
  showBanner();
}

const main = defineCommand({
  meta: {
    name: "runtime-checker",
    version: "0.1.0",
    description: "Time how long a Python, Java, C or C++ program takes to run",
  },
  args: {
    verbose: {
      type: "boolean",
      alias: "v",
      description: "Enable verbose debug logging",
      default: false,
    },
    "dry-run": {
      type: "boolean",
      description: "Print the commands that would run without executing them",
      default: false,
    },
    json: {
      type: "boolean",
      description: "Output machine-readable JSON",
      default: false,
    },
  },
  subCommands: {
    run: () => import("./commands/run.js").then((m) => m.default),
    list: () => import("./commands/list.js").then((m) => m.default),
    folder: () => import("./commands/folder.js").then((m) => m.default),
  },
});

void runMain(main);

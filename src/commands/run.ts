import { defineCommand } from "citty";
import { basename } from "node:path";
import { consola } from "consola";
import pc from "picocolors";
import { resolveWorkingFolder } from "../core/config.js";
import { checkRuntime, staticToolchain } from "../core/runner.js";
import { createPlan, detectLanguage, formatCommand, readToolchainEnv } from "../core/languages.js";
import { exitCodeFor, reportResult } from "../core/reporter.js";
import { resolveTargetFile, selectTargetFile } from "../core/targets.js";
import type { CheckOptions } from "../types.js";
import { errorMessage, errorWithSuggestion, findSuggestion } from "../utils/errors.js";
import { readProgramInput } from "../utils/input.js";
import { isDryRun, isJsonOutput, output, suppressHumanOutput, verbose } from "../utils/logger.js";
import { getBuildDir, getToolHome } from "../utils/paths.js";
import { Timer } from "../utils/timer.js";

export default defineCommand({
  meta: {
    name: "run",
    description: "Compile and run a source file, reporting how long it took",
  },
  args: {
    file: {
      type: "positional",
      description: "File to time (default: pick one from the working folder)",
      required: false,
    },
    input: {
      type: "string",
      description: "Text sent to the program's standard input (\\n for new lines)",
    },
    "input-file": {
      type: "string",
      description: "File whose contents are sent to the program's standard input",
    },
    clean: {
      type: "boolean",
      description: "Remove compiled artifacts after the run",
      default: false,
    },
  },
  async run({ args }) {
    suppressHumanOutput();
    const timer = new Timer();

    try {
      const folder = await resolveWorkingFolder(getToolHome());
      verbose(`[run] working folder ${folder.path} (${folder.source})`);

      const target = args.file
        ? await resolveTargetFile(args.file, folder.path)
        : await selectTargetFile(folder.path, {
            interactive: Boolean(process.stdin.isTTY) && !isJsonOutput(),
            prompt: promptForFile,
          });
      if (!target) {
        errorWithSuggestion(`No supported code files found in ${folder.path}`);
        process.exitCode = 1;
        return;
      }

      const options: CheckOptions = {
        buildDir: getBuildDir(folder.path),
        input: await readProgramInput({
          input: args.input,
          inputFile: args["input-file"],
        }),
        clean: args.clean,
        toolchain: readToolchainEnv(),
      };

      if (isDryRun()) {
        previewRun(target, options);
        return;
      }

      consola.start(`Running ${pc.cyan(basename(target))}`);
      const result = await checkRuntime(target, options);
      reportResult(result);
      output(result);

      if (result.status !== "success") {
        const suggestion = findSuggestion(result.error);
        if (suggestion && result.status !== "runtime-error" && result.status !== "compile-error") {
          consola.info(`${pc.dim("Suggestion:")} ${suggestion}`);
        }
        process.exitCode = exitCodeFor(result);
      }
      verbose(`[run] finished in ${timer.elapsed()}`);
    } catch (err) {
      errorWithSuggestion(errorMessage(err));
      process.exitCode = 1;
    }
  },
});

/** Offer the candidate files through consola's select prompt */
async function promptForFile(message: string, choices: string[]): Promise<string | null> {
  const selected = await consola.prompt(message, { type: "select", options: choices });
  return typeof selected === "string" ? selected : null;
}

/** Show the commands a run would execute without spawning anything */
function previewRun(target: string, options: CheckOptions): void {
  const match = detectLanguage(target);
  if (match.kind === "unsupported") {
    errorWithSuggestion(`Unsupported file extension '${match.extension || "(none)"}'`);
    process.exitCode = 1;
    return;
  }

  const plan = createPlan(match.language, target, options.buildDir, staticToolchain(options.toolchain));
  consola.info(`[dry-run] ${pc.cyan(basename(target))} (${plan.language})`);
  if (plan.compile) {
    consola.log(`  compile: ${formatCommand(plan.compile.command, plan.compile.args)}`);
  }
  consola.log(`  run:     ${formatCommand(plan.run.command, plan.run.args)}`);
  output(plan);
}

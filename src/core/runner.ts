import { readFile, stat } from "node:fs/promises";
import { resolve } from "node:path";
import type {
  CheckOptions,
  CommandSpec,
  LanguageId,
  RunResult,
  Toolchain,
} from "../types.js";
import { ensureDir, isNodeError, removeDirIfEmpty, removePaths } from "../utils/fs.js";
import { verbose } from "../utils/logger.js";
import { Timer } from "../utils/timer.js";
import { spawnCommand, type CommandExecutor } from "./executor.js";
import {
  DEFAULT_TOOLCHAIN,
  PYTHON_CANDIDATES,
  SUPPORTED_EXTENSIONS,
  createPlan,
  detectLanguage,
} from "./languages.js";

function emptyResult(file: string): RunResult {
  return {
    status: "success",
    file,
    language: null,
    runtimeMs: null,
    output: "",
    error: "",
    exitCode: null,
  };
}

/**
 * Pick the first Python interpreter whose `--version` exits cleanly.
 * Returns null when none of the candidates can be run.
 */
export async function findPythonInterpreter(
  exec: CommandExecutor = spawnCommand,
  candidates: readonly string[] = PYTHON_CANDIDATES
): Promise<string | null> {
  for (const candidate of candidates) {
    const outcome = await exec({ command: candidate, args: ["--version"], cwd: process.cwd() });
    if (outcome.kind === "exited" && outcome.exitCode === 0) {
      verbose(`[python] using ${candidate}`);
      return candidate;
    }
  }
  return null;
}

/**
 * Fill in the commands a language needs. Python is looked up only when it is
 * the language being run and no override is configured.
 */
export async function resolveToolchain(
  language: LanguageId,
  overrides: Partial<Toolchain> = {},
  exec: CommandExecutor = spawnCommand
): Promise<Toolchain | null> {
  let python = overrides.python;
  if (python === undefined) {
    python = language === "python"
      ? (await findPythonInterpreter(exec)) ?? undefined
      : PYTHON_CANDIDATES[0];
  }
  if (python === undefined) return null;
  return { ...DEFAULT_TOOLCHAIN, ...overrides, python };
}

/** Toolchain without probing, for previews such as --dry-run */
export function staticToolchain(overrides: Partial<Toolchain> = {}): Toolchain {
  return { ...DEFAULT_TOOLCHAIN, python: PYTHON_CANDIDATES[0], ...overrides };
}

function describeSpawnError(spec: CommandSpec, error: Error): string {
  const code = isNodeError(error) && error.code ? ` (${error.code})` : "";
  return `'${spec.command}' could not be started${code}: ${error.message}`;
}

/**
 * Compile (when needed) and run a source file, timing only the run step.
 *
 * Failures are reported through the result's status rather than thrown;
 * filesystem errors while preparing the build directory still propagate.
 */
export async function checkRuntime(
  file: string,
  options: CheckOptions,
  exec: CommandExecutor = spawnCommand
): Promise<RunResult> {
  const path = resolve(file);
  const result = emptyResult(path);

  // 1. The file must exist and hold something
  let content: string;
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      return { ...result, status: "file-error", error: `${path} is not a file.` };
    }
  } catch (err) {
    if (isNodeError(err) && err.code === "ENOENT") {
      return { ...result, status: "file-error", error: `File not found at '${path}'.` };
    }
    throw err;
  }

  // 2. Pick the language from the extension
  const match = detectLanguage(path);
  if (match.kind === "unsupported") {
    const supported = Object.keys(SUPPORTED_EXTENSIONS).join(", ");
    return {
      ...result,
      status: "unsupported",
      error: `Unsupported file extension '${match.extension || "(none)"}'. Supported: ${supported}`,
    };
  }
  const language = match.language;

  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    return {
      ...result,
      language,
      status: "file-error",
      error: `Error reading file: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
  if (content.trim() === "") {
    return {
      ...result,
      language,
      status: "file-error",
      error: "The provided file is empty or contains only whitespace.",
    };
  }

  // 3. Work out the commands
  const toolchain = await resolveToolchain(language, options.toolchain, exec);
  if (!toolchain) {
    return {
      ...result,
      language,
      status: "not-started",
      error: `No Python interpreter found (tried ${PYTHON_CANDIDATES.join(", ")}).`,
    };
  }
  const plan = createPlan(language, path, options.buildDir, toolchain);

  try {
    // 4. Compile; a failed build is never executed
    if (plan.compile) {
      await ensureDir(options.buildDir);
      const compiled = await exec(plan.compile);
      if (compiled.kind === "spawn-error") {
        return {
          ...result,
          language,
          status: "not-started",
          error: describeSpawnError(plan.compile, compiled.error),
        };
      }
      if (compiled.exitCode !== 0) {
        return {
          ...result,
          language,
          status: "compile-error",
          exitCode: compiled.exitCode,
          error:
            compiled.stderr.trim() ||
            compiled.stdout.trim() ||
            `Compiler exited with status ${compiled.exitCode ?? compiled.signal}`,
        };
      }
    }

    // 5. Run and time
    const timer = new Timer();
    const ran = await exec(plan.run, { input: options.input });
    const runtimeMs = timer.elapsedMs();

    if (ran.kind === "spawn-error") {
      return {
        ...result,
        language,
        status: "not-started",
        error: describeSpawnError(plan.run, ran.error),
      };
    }

    const output = ran.stdout.trim();
    let error = ran.stderr.trim();
    if (ran.exitCode === 0) {
      return { ...result, language, status: "success", runtimeMs, output, error, exitCode: 0 };
    }
    if (!error) {
      error = ran.exitCode === null
        ? `Process was terminated by signal ${ran.signal ?? "unknown"}`
        : `Process exited with non-zero status code: ${ran.exitCode}`;
    }
    return {
      ...result,
      language,
      status: "runtime-error",
      runtimeMs,
      output,
      error,
      exitCode: ran.exitCode,
    };
  } finally {
    if (options.clean && plan.artifacts.length > 0) {
      await removePaths(plan.artifacts);
      await removeDirIfEmpty(options.buildDir);
    }
  }
}

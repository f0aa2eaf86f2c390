// Public API for programmatic usage
export { checkRuntime, findPythonInterpreter, resolveToolchain } from "./core/runner.js";
export { resolveWorkingFolder, setWorkingFolder, readPointer, writePointer } from "./core/config.js";
export { detectLanguage, createPlan, readToolchainEnv, SUPPORTED_EXTENSIONS } from "./core/languages.js";
export { listTargetFiles, resolveTargetFile, selectTargetFile } from "./core/targets.js";
export type { SelectTargetOptions } from "./core/targets.js";
export { formatReport, exitCodeFor } from "./core/reporter.js";
export { spawnCommand } from "./core/executor.js";
export type { CommandExecutor, ProcessOutcome, ExecOptions } from "./core/executor.js";
export { Timer, formatSeconds } from "./utils/timer.js";
export type * from "./types.js";

import { join, resolve } from "node:path";
import { consola } from "consola";
import pc from "picocolors";
import { exists, listFiles } from "../utils/fs.js";
import { isSupportedFile } from "./languages.js";

/** Supported source files directly inside the working folder, sorted by name */
export async function listTargetFiles(folder: string): Promise<string[]> {
  const files = await listFiles(folder);
  return files.filter(isSupportedFile);
}

/**
 * Resolve the file named on the command line.
 * An existing path relative to the current directory wins; otherwise the
 * name is taken to be inside the working folder. The returned path may not exist.
 */
export async function resolveTargetFile(
  arg: string,
  workingFolder: string,
  cwd: string = process.cwd()
): Promise<string> {
  const fromCwd = resolve(cwd, arg);
  if (await exists(fromCwd)) return fromCwd;
  return join(workingFolder, arg);
}

export interface SelectTargetOptions {
  /** Whether a prompt can be shown (a TTY and no --json) */
  interactive: boolean;
  /** Ask the user to pick one of the file names; null when they cancel */
  prompt: (message: string, choices: string[]) => Promise<string | null>;
}

/**
 * Choose a file from the working folder when none was named: a lone
 * candidate is used directly, several are offered through the prompt.
 * Returns null when the folder holds no supported files.
 */
export async function selectTargetFile(
  folder: string,
  { interactive, prompt }: SelectTargetOptions
): Promise<string | null> {
  const files = await listTargetFiles(folder);
  if (files.length === 0) return null;
  if (files.length === 1) {
    consola.info(`Using the only code file in the folder: ${pc.cyan(files[0])}`);
    return join(folder, files[0]);
  }

  if (!interactive) {
    throw new Error(
      `Several code files found (${files.join(", ")}). Name one: runtime-checker run <file>`
    );
  }

  const selected = await prompt("Which file do you want to check?", files);
  if (selected === null || !files.includes(selected)) {
    throw new Error("No file selected");
  }
  return join(folder, selected);
}

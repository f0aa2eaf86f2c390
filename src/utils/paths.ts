import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

/** Pointer file recording the working folder's absolute path */
export const POINTER_FILE = "dest.txt";

/** Conventional name of the working folder */
export const CODE_FOLDER_NAME = "check_code";

/** Subdirectory of the working folder that receives compiled artifacts */
export const BUILD_DIR_NAME = "temp_files";

/**
 * Directory the tool keeps dest.txt and its default check_code in.
 * Defaults to the package root (override with RUNTIME_CHECKER_HOME env var).
 */
export function getToolHome(): string {
  if (process.env.RUNTIME_CHECKER_HOME) {
    return resolve(process.env.RUNTIME_CHECKER_HOME);
  }
  // src/utils/paths.ts and dist/utils/paths.js both sit two levels below the root
  return resolve(dirname(fileURLToPath(import.meta.url)), "..", "..");
}

/** dest.txt inside the tool home */
export function getPointerPath(home: string): string {
  return join(home, POINTER_FILE);
}

/** check_code alongside the tool */
export function getLocalCodeFolder(home: string): string {
  return join(home, CODE_FOLDER_NAME);
}

/** temp_files/ inside a working folder */
export function getBuildDir(workingFolder: string): string {
  return join(workingFolder, BUILD_DIR_NAME);
}

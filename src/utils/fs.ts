import { mkdir, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { verbose } from "./logger.js";

/** Type guard for Node.js system errors with an error code */
export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/** Ensure a directory exists */
export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true });
}

/** Check if a path exists */
export async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/** Check if a path exists and is a directory */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (isNodeError(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
      return false;
    }
    throw err;
  }
}

/**
 * Write a file atomically by writing to a temp file then renaming.
 * Prevents corruption if the process crashes mid-write.
 */
export async function atomicWriteFile(
  filePath: string,
  data: string
): Promise<void> {
  const tmpPath = filePath + ".tmp";
  await writeFile(tmpPath, data);
  await rename(tmpPath, filePath);
}

/** List the names of regular files directly inside a directory, sorted */
export async function listFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile())
    .map((e) => e.name)
    .sort((a, b) => a.localeCompare(b));
}

/** Remove files or directories recursively, no error if they don't exist */
export async function removePaths(paths: string[]): Promise<void> {
  await Promise.all(
    paths.map(async (p) => {
      verbose(`[clean] removing ${p}`);
      await rm(p, { recursive: true, force: true });
    })
  );
}

/** Remove a directory only when it holds nothing */
export async function removeDirIfEmpty(dir: string): Promise<void> {
  try {
    const entries = await readdir(dir);
    if (entries.length === 0) await rm(dir, { recursive: true, force: true });
  } catch (err) {
    if (isNodeError(err) && err.code === "ENOENT") return;
    throw err;
  }
}

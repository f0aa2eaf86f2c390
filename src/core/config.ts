import { readFile } from "node:fs/promises";
import { basename, resolve } from "node:path";
import { consola } from "consola";
import pc from "picocolors";
import type { WorkingFolder } from "../types.js";
import {
  CODE_FOLDER_NAME,
  POINTER_FILE,
  getLocalCodeFolder,
  getPointerPath,
} from "../utils/paths.js";
import {
  atomicWriteFile,
  ensureDir,
  exists,
  isDirectory,
  isNodeError,
} from "../utils/fs.js";
import { verbose } from "../utils/logger.js";

/** Read dest.txt, returning its trimmed content or null if the file is missing */
export async function readPointer(home: string): Promise<string | null> {
  try {
    const content = await readFile(getPointerPath(home), "utf-8");
    return content.trim();
  } catch (err) {
    if (isNodeError(err) && err.code === "ENOENT") return null;
    throw err;
  }
}

/** Overwrite dest.txt with a single absolute directory path */
export async function writePointer(home: string, folder: string): Promise<void> {
  await ensureDir(home);
  await atomicWriteFile(getPointerPath(home), resolve(folder));
}

/**
 * Locate the working folder, creating it and the pointer file when needed.
 *
 * Resolution order:
 * 1. `check_code` beside the tool: used as-is, and dest.txt is rewritten to it.
 * 2. dest.txt naming an existing directory: that directory is used.
 * 3. Otherwise a fresh `check_code` is created beside the tool and recorded.
 *
 * Filesystem errors propagate to the caller.
 */
export async function resolveWorkingFolder(home: string): Promise<WorkingFolder> {
  const pointerPath = getPointerPath(home);
  const localFolder = getLocalCodeFolder(home);

  if (await isDirectory(localFolder)) {
    verbose(`[config] using ${localFolder} beside the tool`);
    await writePointer(home, localFolder);
    return { path: localFolder, source: "local", pointerPath };
  }

  const stored = await readPointer(home);
  if (stored) {
    if (await isDirectory(stored)) {
      verbose(`[config] using ${stored} from ${POINTER_FILE}`);
      if (basename(resolve(stored)) !== CODE_FOLDER_NAME) {
        verbose(`[config] ${stored} is not named ${CODE_FOLDER_NAME}; using it anyway`);
      }
      return { path: resolve(stored), source: "pointer", pointerPath };
    }
    consola.warn(
      `${POINTER_FILE} points to ${pc.cyan(stored)}, which is not an existing directory. Creating a new ${CODE_FOLDER_NAME} folder.`
    );
  } else if (stored === "") {
    consola.warn(`${POINTER_FILE} is empty. Creating a new ${CODE_FOLDER_NAME} folder.`);
  }

  await ensureDir(localFolder);
  await writePointer(home, localFolder);
  consola.success(`Created ${pc.cyan(localFolder)} and recorded it in ${POINTER_FILE}`);
  return { path: localFolder, source: "created", pointerPath };
}

/**
 * Point dest.txt at another directory, creating it when missing.
 * Throws when the path names something other than a directory.
 */
export async function setWorkingFolder(home: string, dir: string): Promise<string> {
  const target = resolve(dir);
  if ((await exists(target)) && !(await isDirectory(target))) {
    throw new Error(`${target} is not a directory`);
  }
  await ensureDir(target);
  await writePointer(home, target);
  return target;
}

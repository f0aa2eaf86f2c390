import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, readFile, writeFile, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  readPointer,
  resolveWorkingFolder,
  setWorkingFolder,
  writePointer,
} from "../config.js";
import { listTargetFiles } from "../targets.js";
import { initFlags } from "../../utils/logger.js";

vi.mock("consola", () => ({
  consola: {
    level: 3,
    warn: vi.fn(),
    success: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

describe("resolveWorkingFolder", () => {
  let home: string;
  let elsewhere: string;

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), "runtime-checker-home-"));
    elsewhere = await mkdtemp(join(tmpdir(), "runtime-checker-elsewhere-"));
    const { consola } = await import("consola");
    vi.mocked(consola.warn).mockClear();
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
    await rm(elsewhere, { recursive: true, force: true });
  });

  it("creates check_code and dest.txt on the first run", async () => {
    const folder = await resolveWorkingFolder(home);
    const expected = join(home, "check_code");

    expect(folder).toEqual({
      path: expected,
      source: "created",
      pointerPath: join(home, "dest.txt"),
    });
    expect((await stat(expected)).isDirectory()).toBe(true);
    expect(await readFile(join(home, "dest.txt"), "utf-8")).toBe(expected);
  });

  it("prefers check_code beside the tool and rewrites dest.txt to it", async () => {
    const local = join(home, "check_code");
    await mkdir(local);
    await writeFile(join(home, "dest.txt"), elsewhere);

    const folder = await resolveWorkingFolder(home);

    expect(folder.source).toBe("local");
    expect(folder.path).toBe(local);
    expect(await readFile(join(home, "dest.txt"), "utf-8")).toBe(local);
  });

  it("uses a relocated folder named in dest.txt", async () => {
    const relocated = join(elsewhere, "check_code");
    await mkdir(relocated);
    await writeFile(join(relocated, "solve.py"), "print(1)\n");
    await writeFile(join(home, "dest.txt"), `${relocated}\n`);

    const folder = await resolveWorkingFolder(home);

    expect(folder.source).toBe("pointer");
    expect(folder.path).toBe(relocated);
    expect(await listTargetFiles(folder.path)).toEqual(["solve.py"]);
  });

  it("regenerates the folder when dest.txt points nowhere", async () => {
    await writeFile(join(home, "dest.txt"), join(elsewhere, "gone"));
    const { consola } = await import("consola");

    const folder = await resolveWorkingFolder(home);

    expect(folder.source).toBe("created");
    expect(folder.path).toBe(join(home, "check_code"));
    expect(await readFile(join(home, "dest.txt"), "utf-8")).toBe(join(home, "check_code"));
    expect(consola.warn).toHaveBeenCalledTimes(1);
  });

  it("regenerates the folder when dest.txt is empty", async () => {
    await writeFile(join(home, "dest.txt"), "  \n");
    const { consola } = await import("consola");

    const folder = await resolveWorkingFolder(home);

    expect(folder.source).toBe("created");
    expect(consola.warn).toHaveBeenCalledWith("dest.txt is empty. Creating a new check_code folder.");
  });

  it("ignores a pointer that names a regular file", async () => {
    const file = join(elsewhere, "notes.txt");
    await writeFile(file, "x");
    await writeFile(join(home, "dest.txt"), file);

    const folder = await resolveWorkingFolder(home);

    expect(folder.source).toBe("created");
  });

  it("surfaces filesystem errors when the home cannot hold a folder", async () => {
    const blocked = join(elsewhere, "blocked");
    await writeFile(blocked, "not a directory");

    await expect(resolveWorkingFolder(blocked)).rejects.toThrow();
  });
});

describe("pointer file", () => {
  let home: string;

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), "runtime-checker-home-"));
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
  });

  it("readPointer returns null when dest.txt is missing", async () => {
    expect(await readPointer(home)).toBeNull();
  });

  it("writePointer stores a single absolute path that readPointer trims back", async () => {
    await writePointer(home, join(home, "somewhere"));
    expect(await readFile(join(home, "dest.txt"), "utf-8")).toBe(join(home, "somewhere"));
    expect(await readPointer(home)).toBe(join(home, "somewhere"));
  });

  it("setWorkingFolder creates the directory and repoints dest.txt", async () => {
    const target = join(home, "moved", "check_code");
    expect(await setWorkingFolder(home, target)).toBe(target);
    expect((await stat(target)).isDirectory()).toBe(true);
    expect(await readPointer(home)).toBe(target);

    const folder = await resolveWorkingFolder(home);
    expect(folder).toEqual({ path: target, source: "pointer", pointerPath: join(home, "dest.txt") });
  });

  it("setWorkingFolder refuses a regular file", async () => {
    const file = join(home, "file.txt");
    await writeFile(file, "x");
    await expect(setWorkingFolder(home, file)).rejects.toThrow(`${file} is not a directory`);
  });
});

// Turns --verbose on for the rest of this file
describe("resolveWorkingFolder under --verbose", () => {
  let home: string;
  let elsewhere: string;

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), "runtime-checker-home-"));
    elsewhere = await mkdtemp(join(tmpdir(), "runtime-checker-elsewhere-"));
    initFlags(["node", "runtime-checker", "run", "--verbose"]);
    const { consola } = await import("consola");
    vi.mocked(consola.debug).mockClear();
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
    await rm(elsewhere, { recursive: true, force: true });
  });

  it("notes a pointer folder that is not named check_code", async () => {
    const projects = join(elsewhere, "projects");
    await mkdir(projects);
    await writeFile(join(home, "dest.txt"), projects);
    const { consola } = await import("consola");

    const folder = await resolveWorkingFolder(home);

    expect(folder.source).toBe("pointer");
    expect(consola.debug).toHaveBeenCalledWith(`[config] ${projects} is not named check_code; using it anyway`);
  });

  it("stays quiet about a pointer folder named check_code", async () => {
    const relocated = join(elsewhere, "check_code");
    await mkdir(relocated);
    await writeFile(join(home, "dest.txt"), relocated);
    const { consola } = await import("consola");

    await resolveWorkingFolder(home);

    expect(consola.debug).toHaveBeenCalledWith(`[config] using ${relocated} from dest.txt`);
    expect(consola.debug).toHaveBeenCalledTimes(1);
  });
});

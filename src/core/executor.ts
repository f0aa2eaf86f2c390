import { spawn } from "node:child_process";
import type { CommandSpec } from "../types.js";
import { verbose } from "../utils/logger.js";
import { formatCommand } from "./languages.js";

export type ProcessOutcome =
  | {
      kind: "exited";
      /** null when the process was killed by a signal */
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      stdout: string;
      stderr: string;
    }
  | { kind: "spawn-error"; error: Error };

export interface ExecOptions {
  /** Written to the child's stdin, which is then closed */
  input?: string;
}

/** Runs one command to completion; swapped for a stand-in in tests */
export type CommandExecutor = (
  spec: CommandSpec,
  options?: ExecOptions
) => Promise<ProcessOutcome>;

/**
 * Spawn a command and wait for it to exit, capturing stdout and stderr.
 * Never rejects: a command that cannot be started resolves to a spawn-error.
 */
export const spawnCommand: CommandExecutor = (spec, options = {}) =>
  new Promise((resolve) => {
    verbose(`[exec] ${formatCommand(spec.command, spec.args)} (cwd: ${spec.cwd})`);

    const child = spawn(spec.command, spec.args, {
      cwd: spec.cwd,
      stdio: ["pipe", "pipe", "pipe"],
      windowsHide: true,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    // A program that exits without reading its input closes the pipe early
    child.stdin.on("error", (err) => {
      verbose(`[exec] stdin closed early: ${err.message}`);
    });
    child.stdin.end(options.input ?? "");

    child.on("error", (error) => {
      if (settled) return;
      settled = true;
      resolve({ kind: "spawn-error", error });
    });

    child.on("close", (exitCode, signal) => {
      if (settled) return;
      settled = true;
      resolve({
        kind: "exited",
        exitCode,
        signal,
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
      });
    });
  });

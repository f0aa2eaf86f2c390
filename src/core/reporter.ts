import { consola } from "consola";
import pc from "picocolors";
import type { RunResult, RunStatus } from "../types.js";
import { formatSeconds } from "../utils/timer.js";

const STATUS_LABELS: Record<RunStatus, string> = {
  success: "Success",
  "file-error": "File Error",
  unsupported: "Unsupported File Type",
  "compile-error": "Compilation Error",
  "runtime-error": "Runtime Error",
  "not-started": "Could Not Start",
};

export function statusLabel(status: RunStatus): string {
  return STATUS_LABELS[status];
}

type ReportLineKind = "status" | "language" | "runtime" | "heading" | "body" | "note";

interface ReportLine {
  kind: ReportLineKind;
  text: string;
}

/**
 * The runtime line is present only when the program actually ran, so
 * "timed but failed" differs from "never ran".
 */
function buildReport(result: RunResult): ReportLine[] {
  const lines: ReportLine[] = [
    { kind: "status", text: `Status: ${statusLabel(result.status)}` },
    { kind: "language", text: `Language: ${result.language ?? "unknown"}` },
  ];
  if (result.runtimeMs !== null) {
    lines.push({ kind: "runtime", text: `Runtime: ${formatSeconds(result.runtimeMs)}` });
  }
  if (result.output) {
    lines.push({ kind: "heading", text: "Output:" }, { kind: "body", text: result.output });
  }
  if (result.error) {
    lines.push({ kind: "heading", text: "Error:" }, { kind: "body", text: result.error });
  }
  if (result.runtimeMs !== null && result.status !== "success") {
    lines.push({ kind: "note", text: "Note: the program failed; the runtime covers the failed run." });
  }
  return lines;
}

/** Plain-text report lines for a run */
export function formatReport(result: RunResult): string[] {
  return buildReport(result).map((line) => line.text);
}

/** Process exit status mirroring the compiler's or program's failure */
export function exitCodeFor(result: RunResult): number {
  switch (result.status) {
    case "success":
      return 0;
    case "compile-error":
    case "runtime-error":
      return result.exitCode !== null && result.exitCode !== 0 ? result.exitCode : 1;
    default:
      return 1;
  }
}

/** Print a run's result through consola, one report line at a time */
export function reportResult(result: RunResult): void {
  for (const line of buildReport(result)) {
    switch (line.kind) {
      case "status":
        if (result.status === "success") consola.success(line.text);
        else consola.error(line.text);
        break;
      case "language":
        consola.log(pc.dim(line.text));
        break;
      case "runtime":
        consola.log(pc.bold(pc.green(line.text)));
        break;
      case "heading":
        consola.log(pc.cyan(line.text));
        break;
      case "body":
        consola.log(line.text);
        break;
      case "note":
        consola.warn(line.text);
        break;
    }
  }
}

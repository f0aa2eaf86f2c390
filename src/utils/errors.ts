import { consola } from "consola";
import pc from "picocolors";

interface Suggestion {
  pattern: RegExp;
  message: string;
}

const SUGGESTIONS: Suggestion[] = [
  {
    pattern: /Unsupported file extension/i,
    message: "Supported extensions: .py, .java, .c, .cpp, .cc, .cxx.",
  },
  {
    pattern: /No supported code files/i,
    message: "Place a .py, .java, .c or .cpp file in the working folder, or pass a path to 'runtime-checker run'.",
  },
  {
    pattern: /could not be started|ENOENT.*spawn|spawn.*ENOENT/i,
    message: "Install the compiler or interpreter and make sure it is on your PATH, or point CC, CXX, JAVAC, JAVA or RUNTIME_CHECKER_PYTHON at it.",
  },
  {
    pattern: /No Python interpreter/i,
    message: "Install Python 3, or set RUNTIME_CHECKER_PYTHON to the interpreter's path.",
  },
  {
    pattern: /is empty/i,
    message: "Write some code into the file before timing it.",
  },
  {
    pattern: /File not found/i,
    message: "Run 'runtime-checker list' to see the files in the working folder.",
  },
  {
    pattern: /EACCES|EPERM/i,
    message: "Permission denied. Try running with elevated privileges or check file ownership.",
  },
  {
    pattern: /ENOSPC/i,
    message: "Disk is full. Free up some space and try again.",
  },
  {
    pattern: /not a directory|ENOTDIR|EEXIST/i,
    message: "Check that the path exists and is a directory.",
  },
];

/** Return the first suggestion matching a message, if any */
export function findSuggestion(message: string): string | null {
  for (const { pattern, message: suggestion } of SUGGESTIONS) {
    if (pattern.test(message)) return suggestion;
  }
  return null;
}

/**
 * Log an error with an actionable suggestion if one matches.
 */
export function errorWithSuggestion(message: string): void {
  consola.error(message);
  const suggestion = findSuggestion(message);
  if (suggestion) {
    consola.info(`${pc.dim("Suggestion:")} ${suggestion}`);
  }
}

/** Extract a printable message from anything thrown */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

import { readFile } from "node:fs/promises";

/**
 * Turn the two-character sequence `\n` typed on a command line into real
 * newlines, so multi-line stdin fits in a single argument.
 */
export function decodeInputText(text: string): string {
  return text.replace(/\\r\\n|\\n/g, "\n");
}

/** Resolve program input from --input-file or --input; file wins */
export async function readProgramInput(options: {
  input?: string;
  inputFile?: string;
}): Promise<string | undefined> {
  if (options.inputFile) {
    return readFile(options.inputFile, "utf-8");
  }
  if (typeof options.input === "string") {
    return decodeInputText(options.input);
  }
  return undefined;
}

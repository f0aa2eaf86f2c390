import { basename, extname, join, resolve, dirname } from "node:path";
import { platform } from "node:os";
import type {
  ExecutionPlan,
  LanguageId,
  LanguageMatch,
  Toolchain,
} from "../types.js";

/** File extension → language (lowercase, checked case-insensitively) */
export const SUPPORTED_EXTENSIONS: Readonly<Record<string, LanguageId>> = {
  ".py": "python",
  ".java": "java",
  ".c": "c",
  ".cpp": "cpp",
  ".cc": "cpp",
  ".cxx": "cpp",
};

/** Interpreters tried, in order, when no Python override is configured */
export const PYTHON_CANDIDATES = ["python3", "python"] as const;

export const DEFAULT_TOOLCHAIN: Omit<Toolchain, "python"> = {
  cc: "gcc",
  cxx: "g++",
  javac: "javac",
  java: "java",
};

/** Toolchain overrides from RUNTIME_CHECKER_PYTHON, CC, CXX, JAVAC and JAVA */
export function readToolchainEnv(
  env: NodeJS.ProcessEnv = process.env
): Partial<Toolchain> {
  const overrides: Partial<Toolchain> = {};
  if (env.RUNTIME_CHECKER_PYTHON) overrides.python = env.RUNTIME_CHECKER_PYTHON;
  if (env.CC) overrides.cc = env.CC;
  if (env.CXX) overrides.cxx = env.CXX;
  if (env.JAVAC) overrides.javac = env.JAVAC;
  if (env.JAVA) overrides.java = env.JAVA;
  return overrides;
}

export function detectLanguage(file: string): LanguageMatch {
  const extension = extname(file).toLowerCase();
  const language = SUPPORTED_EXTENSIONS[extension];
  if (language === undefined) {
    return { kind: "unsupported", extension };
  }
  return { kind: "supported", language };
}

export function isSupportedFile(file: string): boolean {
  return detectLanguage(file).kind === "supported";
}

/** File name without its extension: "Main.java" → "Main" */
function stemOf(file: string): string {
  return basename(file, extname(file));
}

/** Named by stem and extension: "Sum.cc" → "Sum_cc", "Sum.cpp" → "Sum_cpp" */
function binaryPath(buildDir: string, file: string): string {
  const suffix = platform() === "win32" ? ".exe" : "";
  const ext = extname(file).slice(1).toLowerCase();
  return join(buildDir, `${stemOf(file)}_${ext}${suffix}`);
}

/**
 * Build the command sequence that compiles (when needed) and runs a file.
 * Compiled output goes under `buildDir` and is listed in `artifacts`.
 */
export function createPlan(
  language: LanguageId,
  file: string,
  buildDir: string,
  toolchain: Toolchain
): ExecutionPlan {
  const source = resolve(file);
  const cwd = dirname(source);

  switch (language) {
    case "python":
      return {
        language,
        run: { command: toolchain.python, args: [source], cwd },
        artifacts: [],
      };
    case "java": {
      // javac names the class file after the public class, which must match the file stem
      const classDir = join(buildDir, `${stemOf(source)}_java`);
      return {
        language,
        compile: { command: toolchain.javac, args: ["-d", classDir, source], cwd },
        run: { command: toolchain.java, args: ["-cp", classDir, stemOf(source)], cwd },
        artifacts: [classDir],
      };
    }
    case "c":
    case "cpp": {
      const binary = binaryPath(buildDir, source);
      const compiler = language === "c" ? toolchain.cc : toolchain.cxx;
      return {
        language,
        compile: { command: compiler, args: [source, "-o", binary], cwd },
        run: { command: binary, args: [], cwd },
        artifacts: [binary],
      };
    }
    default: {
      const unreachable: never = language;
      throw new Error(`Unsupported language: ${String(unreachable)}`);
    }
  }
}

/** Render a command the way a shell user would type it */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}

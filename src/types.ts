/** Languages the checker knows how to compile and run */
export type LanguageId = "python" | "java" | "c" | "cpp";

/** Result of mapping a file extension to a language */
export type LanguageMatch =
  | { kind: "supported"; language: LanguageId }
  | { kind: "unsupported"; extension: string };

/** A single external process invocation */
export interface CommandSpec {
  command: string;
  args: string[];
  cwd: string;
}

/** Commands needed to time one target file */
export interface ExecutionPlan {
  language: LanguageId;
  /** Absent for interpreted languages */
  compile?: CommandSpec;
  run: CommandSpec;
  /** Files and directories the plan leaves behind in the build directory */
  artifacts: string[];
}

/** External commands used for each language (overridable through env) */
export interface Toolchain {
  python: string;
  cc: string;
  cxx: string;
  javac: string;
  java: string;
}

/** How the working folder was located */
export type FolderSource = "local" | "pointer" | "created";

export interface WorkingFolder {
  path: string;
  source: FolderSource;
  /** Path of the dest.txt pointer file */
  pointerPath: string;
}

export type RunStatus =
  | "success"
  | "file-error"
  | "unsupported"
  | "compile-error"
  | "runtime-error"
  | "not-started";

export interface RunResult {
  status: RunStatus;
  file: string;
  language: LanguageId | null;
  /** Wall-clock duration of the run step; null when the program never ran */
  runtimeMs: number | null;
  output: string;
  error: string;
  /** Exit status of the failing compiler or program, when there was one */
  exitCode: number | null;
}

/** Options for a single timing run */
export interface CheckOptions {
  /** Directory that receives compiled artifacts */
  buildDir: string;
  /** Text passed to the program's standard input */
  input?: string;
  /** Remove compiled artifacts once the run finishes */
  clean?: boolean;
  toolchain?: Partial<Toolchain>;
}

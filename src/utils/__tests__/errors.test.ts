import { describe, it, expect, vi, beforeEach } from "vitest";
import { errorMessage, errorWithSuggestion, findSuggestion } from "../errors.js";

vi.mock("consola", () => ({
  consola: {
    level: 3,
    error: vi.fn(),
    info: vi.fn(),
  },
}));

describe("findSuggestion", () => {
  it("suggests the supported extensions for an unsupported file", () => {
    expect(findSuggestion("Unsupported file extension '.rb'")).toBe(
      "Supported extensions: .py, .java, .c, .cpp, .cc, .cxx."
    );
  });

  it("points at the toolchain env vars when a compiler cannot start", () => {
    expect(findSuggestion("'gcc' could not be started (ENOENT): spawn gcc ENOENT")).toBe(
      "Install the compiler or interpreter and make sure it is on your PATH, or point CC, CXX, JAVAC, JAVA or RUNTIME_CHECKER_PYTHON at it."
    );
  });

  it("suggests adding code to an empty file", () => {
    expect(findSuggestion("The provided file is empty or contains only whitespace.")).toBe(
      "Write some code into the file before timing it."
    );
  });

  it("recognises permission errors", () => {
    expect(findSuggestion("EACCES: permission denied, mkdir '/opt/check_code'")).toBe(
      "Permission denied. Try running with elevated privileges or check file ownership."
    );
  });

  it("returns null when nothing matches", () => {
    expect(findSuggestion("something else went wrong")).toBeNull();
  });
});

describe("errorWithSuggestion", () => {
  beforeEach(async () => {
    const { consola } = await import("consola");
    vi.mocked(consola.error).mockClear();
    vi.mocked(consola.info).mockClear();
  });

  it("logs the error followed by the matching suggestion", async () => {
    const { consola } = await import("consola");
    errorWithSuggestion("No supported code files found in /work/check_code");

    expect(consola.error).toHaveBeenCalledWith(
      "No supported code files found in /work/check_code"
    );
    expect(consola.info).toHaveBeenCalledTimes(1);
    expect(consola.info).toHaveBeenCalledWith(
      expect.stringContaining("Place a .py, .java, .c or .cpp file in the working folder")
    );
  });

  it("logs only the error when no suggestion matches", async () => {
    const { consola } = await import("consola");
    errorWithSuggestion("something else went wrong");

    expect(consola.error).toHaveBeenCalledWith("something else went wrong");
    expect(consola.info).not.toHaveBeenCalled();
  });
});

describe("errorMessage", () => {
  it("uses the message of an Error", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
  });

  it("stringifies anything else", () => {
    expect(errorMessage(42)).toBe("42");
  });
});

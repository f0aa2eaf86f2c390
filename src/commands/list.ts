import { defineCommand } from "citty";
import { consola } from "consola";
import pc from "picocolors";
import { resolveWorkingFolder } from "../core/config.js";
import { detectLanguage } from "../core/languages.js";
import { listTargetFiles } from "../core/targets.js";
import { errorMessage, errorWithSuggestion } from "../utils/errors.js";
import { output, suppressHumanOutput } from "../utils/logger.js";
import { getToolHome } from "../utils/paths.js";

export default defineCommand({
  meta: {
    name: "list",
    description: "List the code files in the working folder",
  },
  async run() {
    suppressHumanOutput();
    try {
      const folder = await resolveWorkingFolder(getToolHome());
      const files = (await listTargetFiles(folder.path)).map((name) => {
        const match = detectLanguage(name);
        return { name, language: match.kind === "supported" ? match.language : null };
      });

      if (files.length === 0) {
        consola.info(`No code files in ${pc.cyan(folder.path)}`);
        consola.log(pc.dim("  Place .py, .java, .c or .cpp files there to time them."));
        output({ folder: folder.path, files });
        return;
      }

      consola.info(`Code files in ${pc.cyan(folder.path)} (${files.length}):\n`);
      files.forEach((file, i) => {
        consola.log(`  ${pc.cyan(`${i + 1}.`)} ${file.name} ${pc.dim(`(${file.language})`)}`);
      });
      output({ folder: folder.path, files });
    } catch (err) {
      errorWithSuggestion(errorMessage(err));
      process.exit(1);
    }
  },
});

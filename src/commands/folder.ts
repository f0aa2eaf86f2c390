import { defineCommand } from "citty";
import { consola } from "consola";
import pc from "picocolors";
import { resolveWorkingFolder, setWorkingFolder } from "../core/config.js";
import { errorMessage, errorWithSuggestion } from "../utils/errors.js";
import { isDirectory } from "../utils/fs.js";
import { output, suppressHumanOutput } from "../utils/logger.js";
import { POINTER_FILE, getLocalCodeFolder, getPointerPath, getToolHome } from "../utils/paths.js";

export default defineCommand({
  meta: {
    name: "folder",
    description: "Show the working folder, or point dest.txt at another one",
  },
  args: {
    path: {
      type: "positional",
      description: "New working folder (created if missing)",
      required: false,
    },
  },
  async run({ args }) {
    suppressHumanOutput();
    const home = getToolHome();

    try {
      if (args.path) {
        const target = await setWorkingFolder(home, args.path);
        consola.success(`${POINTER_FILE} now points to ${pc.cyan(target)}`);
        const local = getLocalCodeFolder(home);
        if (await isDirectory(local)) {
          consola.warn(
            `${pc.cyan(local)} exists beside the tool and takes precedence. Move or rename it to use the new folder.`
          );
        }
        output({ path: target, pointerPath: getPointerPath(home) });
        return;
      }

      const folder = await resolveWorkingFolder(home);
      consola.info(`Working folder: ${pc.cyan(folder.path)} ${pc.dim(`(${folder.source})`)}`);
      consola.log(pc.dim(`  recorded in ${folder.pointerPath}`));
      output(folder);
    } catch (err) {
      errorWithSuggestion(errorMessage(err));
      process.exit(1);
    }
  },
});

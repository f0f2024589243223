import { Command } from "commander";
import { parseIntOption, printJson, withService } from "./context";

export function registerSimilarCommand(program: Command): void {
  program
    .command("similar <file>")
    .description("Find indexed files similar to a given file")
    .option("--project <project...>", "Restrict to these projects (id or path)")
    .option("--limit <n>", "Maximum number of files", "5")
    .option("--json", "JSON output")
    .action(async (file: string, options: { project?: string[]; limit: string; json?: boolean }) => {
      const limit = parseIntOption(options.limit, "--limit", 1);
      await withService(async (service) => {
        const similar = await service.findSimilar(file, { projects: options.project, limit });
        if (options.json) {
          printJson({ file, similar });
          return;
        }
        if (similar.length === 0) {
          console.log("No similar files.");
          return;
        }
        for (const entry of similar) {
          console.log(`${entry.score.toFixed(4)}  ${entry.absPath}`);
        }
      });
    });
}

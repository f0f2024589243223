import { Command } from "commander";
import { parseIntOption, printJson, withService } from "./context";

type SearchCommandOptions = {
  project?: string[];
  file?: string;
  limit?: string;
  json?: boolean;
};

export function registerSearchCommand(program: Command): void {
  program
    .command("search <query...>")
    .description("Semantic search over indexed projects")
    .option("--project <project...>", "Restrict to these projects (id or path)")
    .option("--file <relPath>", "Restrict to one file, relative to its project root")
    .option("--limit <n>", "Limit number of results (overrides settings.json)")
    .option("--json", "JSON output")
    .action(async (queryParts: string[], options: SearchCommandOptions) => {
      const query = queryParts.join(" ").trim();
      if (!query) {
        throw new Error("Provide a search query.");
      }
      const limit = parseIntOption(options.limit, "--limit", 1);

      await withService(async (service) => {
        const results = await service.search(query, {
          projects: options.project,
          limit,
          filePath: options.file
        });

        if (options.json) {
          printJson({ query, results });
          return;
        }
        if (results.length === 0) {
          console.log("No results.");
          return;
        }
        console.log(`Found ${results.length} result(s):`);
        for (const result of results) {
          console.log(`${result.absPath}:${result.lineStart}-${result.lineEnd}`);
          console.log(result.snippet);
          console.log(`score: ${result.score.toFixed(4)}`);
          console.log("");
        }
      });
    });
}

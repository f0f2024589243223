import { Command } from "commander";
import { discoverProjects } from "../core/discovery";
import { formatErrorMessage } from "../core/errors";
import { parseIntOption, printJson, withService } from "./context";

export function registerDiscoverCommand(program: Command): void {
  program
    .command("discover <dir>")
    .description("Find project roots by marker files (.git, package.json, go.mod, ...)")
    .option("--depth <n>", "Maximum directory depth to search", "3")
    .option("--register", "Register every project found")
    .option("--json", "JSON output")
    .action(async (dir: string, options: { depth: string; register?: boolean; json?: boolean }) => {
      const maxDepth = parseIntOption(options.depth, "--depth") ?? 3;
      await withService(async (service, settings) => {
        const roots = await discoverProjects(dir, { maxDepth, excludeDirs: settings.files.excludeDirs });
        const results: Array<{ root: string; projectId?: string; error?: string }> = [];
        for (const root of roots) {
          if (!options.register) {
            results.push({ root });
            continue;
          }
          try {
            const project = await service.registerProject(root);
            results.push({ root, projectId: project.id });
          } catch (err) {
            results.push({ root, error: formatErrorMessage(err) });
          }
        }

        if (options.json) {
          printJson({ dir, projects: results });
          return;
        }
        if (results.length === 0) {
          console.log("No projects found.");
          return;
        }
        for (const result of results) {
          if (result.error) console.log(`${result.root}  (failed: ${result.error})`);
          else if (result.projectId) console.log(`${result.root}  -> ${result.projectId}`);
          else console.log(result.root);
        }
      });
    });
}

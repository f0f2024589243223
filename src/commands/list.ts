import { Command } from "commander";
import { printJson, withService } from "./context";

export function registerListCommand(program: Command): void {
  program
    .command("list")
    .description("List registered projects")
    .option("--json", "JSON output")
    .action(async (options: { json?: boolean }) => {
      await withService(async (service) => {
        const projects = service.listProjects();
        if (options.json) {
          printJson({ projects });
          return;
        }
        if (projects.length === 0) {
          console.log("No projects registered.");
          return;
        }
        for (const project of projects) {
          console.log(`${project.id}\t${project.root}`);
        }
      });
    });
}

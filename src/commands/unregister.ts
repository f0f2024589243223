import { Command } from "commander";
import { printJson, withService } from "./context";

export function registerUnregisterCommand(program: Command): void {
  program
    .command("unregister <project>")
    .description("Stop watching a project and delete its vectors and metadata")
    .option("--json", "JSON output")
    .action(async (ref: string, options: { json?: boolean }) => {
      await withService(async (service) => {
        const project = await service.unregisterProject(ref);
        if (options.json) {
          printJson({ unregistered: project.id, root: project.root });
          return;
        }
        console.log(`Unregistered ${project.id} (${project.root})`);
      });
    });
}

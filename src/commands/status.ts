import { Command } from "commander";
import type { ProjectStatus } from "../core/service";
import { printJson, withService } from "./context";

function printStatus(status: ProjectStatus): void {
  console.log(`Project: ${status.projectId}`);
  console.log(`Root: ${status.root}${status.rootMissing ? " (missing)" : ""}`);
  console.log(`State: ${status.state}`);
  console.log(`Last sync: ${status.lastSyncAt ?? "never"}${status.lastOutcome ? ` (${status.lastOutcome})` : ""}`);
  console.log(`Files: ${status.fileCount}`);
  console.log(`Chunks: ${status.chunkCount ?? "unknown"}`);
  console.log(`Pending: ${status.pendingCount}`);
  for (const relPath of status.deferredPaths) {
    console.log(`  deferred: ${relPath}`);
  }
  if (status.lastError) {
    console.log(`Last error: ${status.lastError}`);
  }
}

export function registerStatusCommand(program: Command): void {
  program
    .command("status [project]")
    .description("Show index state for one project or all of them")
    .option("--json", "JSON output")
    .action(async (ref: string | undefined, options: { json?: boolean }) => {
      await withService(async (service) => {
        const refs = ref ? [ref] : service.listProjects().map((project) => project.id);
        const statuses: ProjectStatus[] = [];
        for (const entry of refs) {
          statuses.push(await service.status(entry));
        }
        if (options.json) {
          printJson(ref ? statuses[0] : { projects: statuses });
          return;
        }
        if (statuses.length === 0) {
          console.log("No projects registered.");
          return;
        }
        statuses.forEach((status, index) => {
          if (index > 0) console.log("");
          printStatus(status);
        });
      });
    });
}

import { Command } from "commander";
import type { SyncResult } from "../core/sync";
import { printJson, withService } from "./context";

function describe(projectId: string, result: SyncResult): string {
  switch (result.status) {
    case "already-running":
      return `${projectId}: already running`;
    case "unregistered":
      return `${projectId}: no longer registered`;
    case "failed":
      return `${projectId}: failed (${result.error.message})`;
    case "completed":
    case "cancelled": {
      const { report } = result;
      const parts = [
        `added ${report.added}`,
        `modified ${report.modified}`,
        `deleted ${report.deleted}`,
        `deferred ${report.deferred}`
      ];
      const suffix = report.rootMissing ? " [root missing]" : result.status === "cancelled" ? " [cancelled]" : "";
      return `${projectId}: ${parts.join(", ")}${suffix}`;
    }
  }
}

function toJson(projectId: string, result: SyncResult): Record<string, unknown> {
  if (result.status === "failed") return { projectId, status: result.status, error: result.error.message };
  if (result.status === "already-running" || result.status === "unregistered") {
    return { projectId, status: result.status };
  }
  return { projectId, status: result.status, ...result.report };
}

export function registerSyncCommand(program: Command): void {
  program
    .command("sync [project]")
    .description("Bring a project's index up to date now")
    .option("--all", "Sync every registered project")
    .option("--force", "Re-embed every file even if unchanged")
    .option("--json", "JSON output")
    .action(async (ref: string | undefined, options: { all?: boolean; force?: boolean; json?: boolean }) => {
      if (Boolean(options.all) === Boolean(ref)) {
        throw new Error("Provide a project or --all.");
      }
      await withService(async (service) => {
        const projectIds = options.all
          ? service.listProjects().map((project) => project.id)
          : ref
            ? [service.findProject(ref)?.id ?? ref]
            : [];
        const results = await Promise.all(
          projectIds.map(async (projectId) => ({
            projectId,
            result: await service.syncNow(projectId, { force: Boolean(options.force) })
          }))
        );

        if (options.json) {
          const payload = results.map(({ projectId, result }) => toJson(projectId, result));
          printJson(options.all ? { projects: payload } : payload[0]);
        } else if (results.length === 0) {
          console.log("No projects registered.");
        } else {
          for (const { projectId, result } of results) console.log(describe(projectId, result));
        }

        if (results.some(({ result }) => result.status === "failed")) {
          process.exitCode = 1;
        }
      });
    });
}

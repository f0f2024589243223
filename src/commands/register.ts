import { Command } from "commander";
import type { ProjectRules } from "../core/project";
import { parseIntOption, printJson, withService } from "./context";

type RegisterOptions = {
  ext?: string[];
  exclude?: string[];
  maxFileBytes?: string;
  chunkSize?: string;
  chunkOverlap?: string;
  json?: boolean;
};

export function registerRegisterCommand(program: Command): void {
  program
    .command("register <path>")
    .description("Watch a project root (re-registering updates its rules)")
    .option("--ext <ext...>", "File extensions to index (replaces the defaults)")
    .option("--exclude <dir...>", "Directory names to skip (replaces the defaults)")
    .option("--max-file-bytes <n>", "Skip files larger than this")
    .option("--chunk-size <n>", "Characters per chunk")
    .option("--chunk-overlap <n>", "Characters shared by consecutive chunks")
    .option("--json", "JSON output")
    .action(async (root: string, options: RegisterOptions) => {
      const overrides: Partial<ProjectRules> = {};
      if (options.ext) overrides.extensions = options.ext;
      if (options.exclude) overrides.excludeDirs = options.exclude;
      overrides.maxFileBytes = parseIntOption(options.maxFileBytes, "--max-file-bytes", 1);
      overrides.chunkSize = parseIntOption(options.chunkSize, "--chunk-size", 1);
      overrides.chunkOverlap = parseIntOption(options.chunkOverlap, "--chunk-overlap");

      await withService(async (service) => {
        const project = await service.registerProject(root, overrides);
        if (options.json) {
          printJson(project);
          return;
        }
        console.log(`Registered ${project.id}`);
        console.log(`Root: ${project.root}`);
        console.log(`Chunking: ${project.rules.chunkSize} chars, ${project.rules.chunkOverlap} overlap`);
        console.log(`Extensions: ${project.rules.extensions.join(" ")}`);
      });
    });
}

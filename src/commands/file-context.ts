import { Command } from "commander";
import type { FileContext } from "../core/file-context";
import { parseIntOption, printJson, withService } from "./context";

function printContext(context: FileContext): void {
  const owner = context.projectId ? ` [${context.projectId}]` : "";
  console.log(`File: ${context.absPath}${owner}`);
  if (context.totalLines === 0) {
    console.log("(empty file)");
    return;
  }
  console.log(`Lines ${context.startLine}-${context.endLine} of ${context.totalLines}`);
  for (const line of context.lines) {
    const marker = line.number === context.focusLine ? ">>> " : "    ";
    console.log(`${String(line.number).padStart(4)}${marker}${line.text}`);
  }
  for (const chunk of context.chunks) {
    console.log(`chunk ${chunk.ordinal}: lines ${chunk.lineStart}-${chunk.lineEnd}`);
  }
}

export function registerContextCommand(program: Command): void {
  program
    .command("context <file>")
    .description("Show the lines around a file's head or one of its lines")
    .option("--line <n>", "Center on this 1-based line")
    .option("--lines <n>", "Number of lines to show", "50")
    .option("--json", "JSON output")
    .action(async (file: string, options: { line?: string; lines: string; json?: boolean }) => {
      const line = parseIntOption(options.line, "--line", 1);
      const contextLines = parseIntOption(options.lines, "--lines", 1);
      await withService(async (service) => {
        const context = await service.fileContext(file, { line, contextLines });
        if (options.json) {
          printJson(context);
          return;
        }
        printContext(context);
      });
    });
}
